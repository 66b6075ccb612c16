import Ajv from 'ajv/dist/2020';
import fs from 'node:fs/promises';
import { ConfigError, describeCause } from '../errors/stripErrors';
import configSchema from './schema/strip-config.schema.json';
import type { StripConfig } from './stripConfig';

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<Partial<StripConfig>>(configSchema);

/** Parse and validate the contents of a JSON config file. */
export function parseConfigText(text: string, source = '<config>'): Partial<StripConfig> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`${source} is not valid JSON: ${describeCause(e)}`);
  }
  if (!validateConfigFile(data)) {
    const details = ajv.errorsText(validateConfigFile.errors, { dataVar: 'config' });
    throw new ConfigError(`${source}: ${details}`, 'Allowed keys: output, inPlace, recursive, check, keepEmpty, specAsComments');
  }
  return data;
}

/** Read a `--config` file. Values in it are defaults that command-line flags override. */
export async function loadConfigFile(file: string): Promise<Partial<StripConfig>> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (e) {
    throw new ConfigError(`cannot read config file ${file}: ${describeCause(e)}`);
  }
  return parseConfigText(text, file);
}
