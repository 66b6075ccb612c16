import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ConfigError } from '../../errors/stripErrors';
import { loadConfigFile, parseConfigText } from '../loadConfigFile';
import { createStripConfig, DEFAULT_STRIP_CONFIG, validateStripConfig } from '../stripConfig';

describe('createStripConfig', () => {
  test('starts from the defaults', () => {
    expect(createStripConfig()).toEqual(DEFAULT_STRIP_CONFIG);
  });

  test('later layers win and undefined never overrides', () => {
    const config = createStripConfig({ recursive: true, output: 'a.rs' }, { recursive: undefined, check: true });
    expect(config).toEqual({ ...DEFAULT_STRIP_CONFIG, recursive: true, output: 'a.rs', check: true });
  });
});

describe('validateStripConfig', () => {
  test('rejects output together with in-place', () => {
    expect(() => validateStripConfig(createStripConfig({ output: 'a.rs', inPlace: true }))).toThrow(ConfigError);
  });

  test('rejects an empty output path', () => {
    expect(() => validateStripConfig(createStripConfig({ output: ' ' }))).toThrow('Configuration error: --output must not be empty');
  });

  test('accepts the defaults', () => {
    expect(() => validateStripConfig(createStripConfig())).not.toThrow();
  });
});

describe('parseConfigText', () => {
  test('returns the values in the file', () => {
    expect(parseConfigText('{ "recursive": true, "specAsComments": true }')).toEqual({ recursive: true, specAsComments: true });
  });

  test('rejects unknown keys', () => {
    expect(() => parseConfigText('{ "recurse": true }', 'strip.json')).toThrow(
      'Configuration error: strip.json: config must NOT have additional properties',
    );
  });

  test('rejects values of the wrong type', () => {
    expect(() => parseConfigText('{ "check": "yes" }', 'strip.json')).toThrow(
      'Configuration error: strip.json: config/check must be boolean',
    );
  });

  test('rejects invalid JSON', () => {
    expect(() => parseConfigText('{ nope', 'strip.json')).toThrow(/^Configuration error: strip\.json is not valid JSON: /);
  });
});

describe('loadConfigFile', () => {
  test('reads and validates a file', async () => {
    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'verus-strip-config-')), 'strip.json');
    fs.writeFileSync(file, JSON.stringify({ keepEmpty: true }), 'utf8');
    expect(await loadConfigFile(file)).toEqual({ keepEmpty: true });
  });

  test('reports a missing file as a configuration error', async () => {
    const file = path.join(os.tmpdir(), 'verus-strip-missing-config.json');
    await expect(loadConfigFile(file)).rejects.toThrow(`Configuration error: cannot read config file ${file}`);
  });
});
