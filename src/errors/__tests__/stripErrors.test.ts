import { ParseError, ReadError, describeCause, formatErrorReport } from '../stripErrors';

describe('stripErrors', () => {
  test('describes causes from another realm by their message', () => {
    const foreign = { code: 'ENOENT', message: "ENOENT: no such file or directory, open 'a.rs'" };
    expect(describeCause(foreign)).toBe("ENOENT: no such file or directory, open 'a.rs'");
    expect(describeCause('plain')).toBe('plain');
  });

  test('formats the error, its cause and its hint', () => {
    expect(formatErrorReport(new ReadError('a.rs', { message: 'EACCES: permission denied' }))).toEqual([
      'Error: Failed to read file a.rs',
      'Caused by: EACCES: permission denied',
    ]);
    expect(formatErrorReport(new ParseError("expected an item, found 'let'", { file: 'a.rs', line: 2, column: 5 }))).toEqual([
      "Error: a.rs:2:5: expected an item, found 'let'",
      'Hint: Ensure the file is valid Verus syntax and compiles with Verus',
    ]);
  });
});
