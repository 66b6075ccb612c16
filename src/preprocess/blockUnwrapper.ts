import { StructuralError } from '../errors/stripErrors';
import { createScannerState, ScanContext, step } from './scannerState';

export const SPEC_BLOCK_MARKER = 'verus!';

/** One `verus! { … }` wrapper located in a source text. Offsets are 0-based. */
export type SpecBlock = {
  /** Offset of the `v` in `verus!`. */
  markerStart: number;
  /** Offset of the opening `{`. */
  open: number;
  /** Offset of the matching `}`. */
  close: number;
};

/**
 * Find the `}` matching the `{` at `openIndex`, ignoring braces inside string
 * literals, character literals and comments.
 */
export function findMatchingBrace(source: string, openIndex: number): number {
  if (source.charAt(openIndex) !== '{') {
    throw new StructuralError(`Expected '{' at offset ${openIndex}`);
  }
  const state = createScannerState(openIndex + 1, 1);
  while (state.position < source.length) {
    const wasNormal = state.context === ScanContext.Normal && !state.pendingEscape;
    const ch = source.charAt(state.position);
    state.position += step(source, state);
    if (wasNormal && ch === '}' && state.depth === 0) return state.position - 1;
  }
  throw new StructuralError(`Unmatched braces in ${SPEC_BLOCK_MARKER} block opened at offset ${openIndex}`);
}

function isIdentChar(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

/**
 * Locate every `verus! {` wrapper that appears in code context, including
 * wrappers nested inside other wrappers. A marker not followed by `{` is not a
 * wrapper and is skipped.
 */
export function findSpecBlocks(source: string): SpecBlock[] {
  const blocks: SpecBlock[] = [];
  const state = createScannerState(0);

  while (state.position < source.length) {
    const i = state.position;
    if (
      state.context === ScanContext.Normal &&
      !state.pendingEscape &&
      source.startsWith(SPEC_BLOCK_MARKER, i) &&
      !isIdentChar(source.charAt(i - 1))
    ) {
      let open = i + SPEC_BLOCK_MARKER.length;
      while (open < source.length && /\s/.test(source.charAt(open))) open++;
      if (source.charAt(open) === '{') {
        blocks.push({ markerStart: i, open, close: findMatchingBrace(source, open) });
        // Keep scanning inside the block so nested wrappers are found too.
        state.position = open + 1;
        continue;
      }
    }
    state.position += step(source, state);
  }
  return blocks;
}

/**
 * Remove every wrapper, keeping the inner text where it was: the marker and
 * opening brace become blanks (line breaks kept) and the closing brace becomes
 * a single space, so line and column numbers of the content do not move.
 */
export function unwrapSpecBlocks(source: string): string {
  const blocks = findSpecBlocks(source);
  if (blocks.length === 0) return source;

  const chars = source.split('');
  for (const block of blocks) {
    for (let i = block.markerStart; i <= block.open; i++) {
      if (chars[i] !== '\n' && chars[i] !== '\r') chars[i] = ' ';
    }
    chars[block.close] = ' ';
  }
  return chars.join('');
}
