/**
 * Diagnostics sink. Everything goes to stderr: stdout is reserved for
 * stripped source text.
 */
export interface Logger {
  /** Shown only with `--verbose`. */
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  return {
    debug(message) {
      if (!options.verbose) return;
      // eslint-disable-next-line no-console
      console.error(message);
    },
    info(message) {
      // eslint-disable-next-line no-console
      console.error(message);
    },
    warn(message) {
      // eslint-disable-next-line no-console
      console.error(message);
    },
    error(message) {
      // eslint-disable-next-line no-console
      console.error(message);
    },
  };
}

/** Collects messages in memory; used by tests and embedders that log elsewhere. */
export class MemoryLogger implements Logger {
  readonly lines: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; message: string }> = [];

  debug(message: string): void {
    this.lines.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }

  messages(level?: 'debug' | 'info' | 'warn' | 'error'): string[] {
    return this.lines.filter((l) => level === undefined || l.level === level).map((l) => l.message);
  }
}
