import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { findSourceFiles } from '../sourceWalker';

function writeFile(p: string, content: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, 'utf8');
}

describe('findSourceFiles', () => {
  test('finds .rs files recursively, sorted, skipping build output', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'verus-strip-walk-'));
    writeFile(path.join(dir, 'src', 'lib.rs'), '');
    writeFile(path.join(dir, 'src', 'a', 'mod.rs'), '');
    writeFile(path.join(dir, 'build.rs'), '');
    writeFile(path.join(dir, 'target', 'debug', 'gen.rs'), '');
    writeFile(path.join(dir, 'README.md'), '');

    expect(await findSourceFiles({ sourceRoot: dir })).toEqual(['build.rs', 'src/a/mod.rs', 'src/lib.rs']);
  });

  test('applies extra exclude globs', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'verus-strip-walk-'));
    writeFile(path.join(dir, 'keep.rs'), '');
    writeFile(path.join(dir, 'examples', 'skip.rs'), '');

    expect(await findSourceFiles({ sourceRoot: dir, excludeGlobs: ['examples/**'] })).toEqual(['keep.rs']);
  });
});
