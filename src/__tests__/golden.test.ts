import fs from 'node:fs';
import path from 'node:path';

import { stripSource } from '../strip/stripSource';

const FIXTURES = path.join(__dirname, 'fixtures');

function fixtureNames(): string[] {
  return fs
    .readdirSync(path.join(FIXTURES, 'input'))
    .filter((f) => f.endsWith('.rs'))
    .sort();
}

function readFixture(kind: 'input' | 'expected', name: string): string {
  return fs.readFileSync(path.join(FIXTURES, kind, name), 'utf8');
}

describe('golden fixtures', () => {
  test('every input has an expected output', () => {
    const names = fixtureNames();
    expect(names).toEqual(['ghost_locals.rs', 'loops.rs', 'traits.rs']);
    for (const name of names) expect(fs.existsSync(path.join(FIXTURES, 'expected', name))).toBe(true);
  });

  test.each(fixtureNames())('%s strips to the expected output', (name) => {
    expect(stripSource(readFixture('input', name), { fileName: name }).text).toBe(readFixture('expected', name));
  });

  test.each(fixtureNames())('%s is a fixed point once stripped', (name) => {
    const expected = readFixture('expected', name);
    expect(stripSource(expected, { fileName: name }).text).toBe(expected);
  });
});
