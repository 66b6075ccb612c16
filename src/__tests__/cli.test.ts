import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { runStrip } from '../cli';
import { toCliOptions } from '../cli/args';
import { MemoryLogger } from '../util/logger';

const ANNOTATED = 'verus! {\nfn id(x: u32) -> u32\n    ensures x == x,\n{\n    x\n}\n}\n';
const STRIPPED = 'fn id(x: u32) -> u32 {\n    x\n}\n';

function mkTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'verus-strip-cli-'));
}

function writeFile(p: string, content: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, 'utf8');
}

function deps() {
  const logger = new MemoryLogger();
  const out: string[] = [];
  return { logger, out, stdout: (text: string) => out.push(text) };
}

describe('runStrip', () => {
  test('returns 0 and prints the stripped file', async () => {
    const file = path.join(mkTmpDir(), 'a.rs');
    writeFile(file, ANNOTATED);
    const d = deps();

    expect(await runStrip(toCliOptions(file, {}), d)).toBe(0);
    expect(d.out).toEqual([STRIPPED]);
  });

  test('returns 1 and prints the error with its hint', async () => {
    const file = path.join(mkTmpDir(), 'bad.rs');
    writeFile(file, 'let x = 1;');
    const d = deps();

    expect(await runStrip(toCliOptions(file, {}), d)).toBe(1);
    expect(d.logger.messages('error')).toEqual([
      `Error: ${file}:1:1: expected an item, found 'let'`,
      'Hint: Ensure the file is valid Verus syntax and compiles with Verus',
    ]);
  });

  test('returns 1 for a directory without --recursive', async () => {
    const dir = mkTmpDir();
    const d = deps();

    expect(await runStrip(toCliOptions(dir, {}), d)).toBe(1);
    expect(d.logger.messages('error')).toEqual([
      `Error: Configuration error: ${dir} is a directory`,
      'Hint: Use --recursive to process every .rs file under it',
    ]);
  });

  test('flags override values from --config', async () => {
    const dir = mkTmpDir();
    const file = path.join(dir, 'a.rs');
    const config = path.join(dir, 'strip.json');
    writeFile(file, ANNOTATED);
    writeFile(config, JSON.stringify({ check: true, inPlace: true }));
    const d = deps();

    expect(await runStrip(toCliOptions(file, { config, check: undefined }), d)).toBe(0);
    expect(d.out).toEqual([`✓ ${file} would be stripped successfully\n`]);
    expect(fs.readFileSync(file, 'utf8')).toBe(ANNOTATED);
  });

  test('writes a JSON report for a directory run with failures', async () => {
    const dir = mkTmpDir();
    const src = path.join(dir, 'src');
    writeFile(path.join(src, 'good.rs'), ANNOTATED);
    writeFile(path.join(src, 'bad.rs'), 'fn f( {');
    const report = path.join(dir, 'out', 'report.json');
    const d = deps();

    const code = await runStrip(toCliOptions(src, { recursive: true, check: true, report, reportFormat: 'json' }), d);

    expect(code).toBe(1);
    const parsed: unknown = JSON.parse(fs.readFileSync(report, 'utf8'));
    expect(parsed).toMatchObject({
      schema: 'strip-report-v1',
      tool: { name: 'verus-strip' },
      filesProcessed: 2,
      filesFailed: 1,
      counts: { removedByKind: { contractsRemoved: 1 } },
    });
    expect(d.logger.messages('error')).toContain('Error: 1 of 2 file(s) had errors');
  });

  test('writes a Markdown report by default', async () => {
    const dir = mkTmpDir();
    const file = path.join(dir, 'a.rs');
    const report = path.join(dir, 'report.md');
    writeFile(file, ANNOTATED);

    expect(await runStrip(toCliOptions(file, { report }), deps())).toBe(0);
    expect(fs.readFileSync(report, 'utf8')).toContain('| contractsRemoved | 1 |');
  });
});
