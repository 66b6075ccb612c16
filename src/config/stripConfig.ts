import { ConfigError } from '../errors/stripErrors';

/** Options the orchestrator consumes. */
export type StripConfig = {
  /** Write the stripped file here instead of stdout. Not allowed with `inPlace` or a directory input. */
  output?: string;
  inPlace: boolean;
  recursive: boolean;
  /** Run the whole pipeline and discard the output. */
  check: boolean;
  keepEmpty: boolean;
  specAsComments: boolean;
};

export const DEFAULT_STRIP_CONFIG: Readonly<StripConfig> = {
  inPlace: false,
  recursive: false,
  check: false,
  keepEmpty: false,
  specAsComments: false,
};

/** Later layers win; `undefined` never overrides a value set by an earlier layer. */
export function createStripConfig(...layers: Array<Partial<StripConfig>>): StripConfig {
  const config: StripConfig = { ...DEFAULT_STRIP_CONFIG };
  for (const layer of layers) {
    if (layer.output !== undefined) config.output = layer.output;
    if (layer.inPlace !== undefined) config.inPlace = layer.inPlace;
    if (layer.recursive !== undefined) config.recursive = layer.recursive;
    if (layer.check !== undefined) config.check = layer.check;
    if (layer.keepEmpty !== undefined) config.keepEmpty = layer.keepEmpty;
    if (layer.specAsComments !== undefined) config.specAsComments = layer.specAsComments;
  }
  return config;
}

export function validateStripConfig(config: StripConfig): void {
  if (config.output !== undefined && config.inPlace) {
    throw new ConfigError('--output and --in-place cannot be used together', 'Pick one destination for the stripped output');
  }
  if (config.output !== undefined && config.output.trim() === '') {
    throw new ConfigError('--output must not be empty');
  }
}
