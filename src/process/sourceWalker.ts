import fg from 'fast-glob';
import path from 'node:path';
import { toPosixPath } from '../util/path';

export type SourceWalkOptions = {
  sourceRoot: string;
  /** Additional exclude globs (evaluated relative to sourceRoot). */
  excludeGlobs?: string[];
};

const DEFAULT_EXCLUDES = ['**/target/**', '**/.git/**', '**/node_modules/**'];

const DEFAULT_INCLUDES = ['**/*.rs'];

/**
 * Deterministically discovers Rust source files under a directory.
 * Returns a stable, sorted list of relative paths (posix-style) from sourceRoot.
 */
export async function findSourceFiles(opts: SourceWalkOptions): Promise<string[]> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const matches = await fg(DEFAULT_INCLUDES, {
    cwd: sourceRoot,
    onlyFiles: true,
    unique: true,
    dot: true,
    followSymbolicLinks: false,
    ignore: [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])],
  });

  const rel = matches.map(toPosixPath);
  rel.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return rel;
}
