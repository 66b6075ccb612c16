import type { StripConfig } from '../config/stripConfig';
import { ConfigError } from '../errors/stripErrors';
import type { ReportFormat } from '../report/writeReport';

export type StripCliOptions = {
  input: string;
  /** Only the flags given on the command line; unset ones defer to the config file. */
  flags: Partial<StripConfig>;
  config?: string;
  report?: string;
  reportFormat: ReportFormat;
  verbose: boolean;
};

function optionalString(v: unknown): string | undefined {
  if (typeof v !== 'string') return undefined;
  return v.trim() === '' ? undefined : v;
}

function optionalFlag(v: unknown): boolean | undefined {
  return v === true ? true : undefined;
}

function parseReportFormat(v: unknown): ReportFormat {
  if (v === undefined) return 'md';
  if (v === 'json' || v === 'md') return v;
  throw new ConfigError(`unknown report format: ${String(v)}`, 'Use --report-format json or --report-format md');
}

/** Map commander's option bag to typed options. */
export function toCliOptions(input: string, raw: Record<string, unknown>): StripCliOptions {
  const flags: Partial<StripConfig> = {
    output: optionalString(raw.output),
    inPlace: optionalFlag(raw.inPlace),
    recursive: optionalFlag(raw.recursive),
    check: optionalFlag(raw.check),
    keepEmpty: optionalFlag(raw.keepEmpty),
    specAsComments: optionalFlag(raw.specAsComments),
  };
  return {
    input,
    flags,
    config: optionalString(raw.config),
    report: optionalString(raw.report),
    reportFormat: parseReportFormat(raw.reportFormat),
    verbose: raw.verbose === true,
  };
}
