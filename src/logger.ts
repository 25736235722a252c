/**
 * Minimal logging surface. Every component takes one optionally and stays
 * silent without it.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger that writes to stderr, keeping stdout free for command output.
 */
export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  const verbose = options.verbose ?? false;
  return {
    debug: (message) => {
      if (verbose) {
        console.error(`[debug] ${message}`);
      }
    },
    info: (message) => console.error(`[info] ${message}`),
    warn: (message) => console.error(`[warn] ${message}`),
    error: (message) => console.error(`[error] ${message}`),
  };
}
