import { ConfigError } from '../../errors/stripErrors';
import { toCliOptions } from '../args';

describe('toCliOptions', () => {
  test('maps commander options to typed options', () => {
    const opts = toCliOptions('src', {
      output: 'out.rs',
      recursive: true,
      specAsComments: true,
      report: 'report.md',
      reportFormat: 'json',
      verbose: true,
    });
    expect(opts).toEqual({
      input: 'src',
      flags: {
        output: 'out.rs',
        inPlace: undefined,
        recursive: true,
        check: undefined,
        keepEmpty: undefined,
        specAsComments: true,
      },
      config: undefined,
      report: 'report.md',
      reportFormat: 'json',
      verbose: true,
    });
  });

  test('leaves absent flags unset so a config file can supply them', () => {
    const opts = toCliOptions('a.rs', { verbose: false });
    expect(Object.values(opts.flags).every((v) => v === undefined)).toBe(true);
    expect(opts.reportFormat).toBe('md');
  });

  test('treats blank paths as absent', () => {
    expect(toCliOptions('a.rs', { output: '  ', config: '' })).toMatchObject({ flags: { output: undefined }, config: undefined });
  });

  test('rejects an unknown report format', () => {
    expect(() => toCliOptions('a.rs', { reportFormat: 'html' })).toThrow(ConfigError);
  });
});
