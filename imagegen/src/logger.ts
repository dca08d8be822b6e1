export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
};

/** Console logger with the `[imagegen]` prefix; debug lines only when verbose. */
export function createConsoleLogger(opts: { verbose?: boolean } = {}): Logger {
  return {
    debug: (message) => {
      if (opts.verbose) console.error(`[imagegen] ${message}`);
    },
    info: (message) => console.error(`[imagegen] ${message}`),
    warn: (message) => console.warn(`[imagegen] ${message}`),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
