// ─── Diagnostics ────────────────────────────────────────────────────────────────
// Leveled console logging, kept separate from the VAD event stream.

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  /** Write debug lines. Off by default. */
  verbose?: boolean;
}

/**
 * Console logger tagging each line with its level and scope,
 * e.g. `[INFO] [VadIterator] Speech started (prob: 0.912)`.
 */
export function createConsoleLogger(scope: string, options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const tag = (level: string, msg: string) => `[${level}] [${scope}] ${msg}`;

  return {
    debug: (msg, ...args) => {
      if (verbose) console.debug(tag("DEBUG", msg), ...args);
    },
    info: (msg, ...args) => console.log(tag("INFO", msg), ...args),
    warn: (msg, ...args) => console.warn(tag("WARN", msg), ...args),
    error: (msg, ...args) => console.error(tag("ERROR", msg), ...args),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
