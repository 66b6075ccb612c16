import type { RunSummary } from '../process/outcome';

export type StripErrorCode = 'E_STRUCTURE' | 'E_PARSE' | 'E_READ' | 'E_WRITE' | 'E_CONFIG' | 'E_BATCH';

export type SourceLocation = {
  /** Display path of the file, or `<string>` for in-memory sources. */
  file: string;
  /** 1-based. */
  line: number;
  /** 1-based. */
  column: number;
};

/**
 * Base class for every failure the strip pipeline reports. `hint` is a short
 * remediation suggestion shown after the message.
 */
export class StripError extends Error {
  readonly code: StripErrorCode;
  readonly hint?: string;

  constructor(code: StripErrorCode, message: string, options: { hint?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.hint = options.hint;
  }
}

/** Unmatched braces in a `verus! { ... }` wrapper. Aborts the file. */
export class StructuralError extends StripError {
  constructor(message: string, cause?: unknown) {
    super('E_STRUCTURE', message, {
      hint: 'Check that every `verus! {` block has a matching closing brace',
      cause,
    });
  }
}

export class ParseError extends StripError {
  readonly location?: SourceLocation;

  constructor(message: string, location?: SourceLocation, cause?: unknown) {
    super('E_PARSE', location ? `${location.file}:${location.line}:${location.column}: ${message}` : message, {
      hint: 'Ensure the file is valid Verus syntax and compiles with Verus',
      cause,
    });
    this.location = location;
  }
}

export class ReadError extends StripError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('E_READ', `Failed to read file ${path}`, { cause });
    this.path = path;
  }
}

export class WriteError extends StripError {
  readonly path?: string;

  constructor(path: string | undefined, cause: unknown) {
    super('E_WRITE', path ? `Failed to write to ${path}` : 'Failed to write output', { cause });
    this.path = path;
  }
}

export class ConfigError extends StripError {
  constructor(message: string, hint?: string) {
    super('E_CONFIG', `Configuration error: ${message}`, { hint });
  }
}

/** Directory mode: at least one file failed; the walk itself completed. */
export class BatchError extends StripError {
  readonly summary: RunSummary;

  constructor(summary: RunSummary) {
    super('E_BATCH', `${summary.failed} of ${summary.processed} file(s) had errors`);
    this.summary = summary;
  }
}

export function isStripError(e: unknown): e is StripError {
  return e instanceof StripError;
}

export function describeCause(cause: unknown): string {
  if (typeof cause === 'object' && cause !== null && 'message' in cause && typeof cause.message === 'string') {
    return cause.message;
  }
  return String(cause);
}

/** `message: cause` on one line, for per-file log lines. */
export function formatErrorLine(error: StripError): string {
  return error.cause === undefined ? error.message : `${error.message}: ${describeCause(error.cause)}`;
}

/** `Error:`, then `Caused by:` and `Hint:` when present. */
export function formatErrorReport(error: StripError): string[] {
  const lines = [`Error: ${error.message}`];
  if (error.cause !== undefined) lines.push(`Caused by: ${describeCause(error.cause)}`);
  if (error.hint) lines.push(`Hint: ${error.hint}`);
  return lines;
}
