export interface Logger {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn?(...args: unknown[]): void;
}

/**
 * Console logger that prefixes every line with `[tag]`, matching the
 * output of the fake device and the test stages.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    log: (...args: unknown[]) => console.log(prefix, ...args),
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
    error: (...args: unknown[]) => console.error(prefix, ...args),
  };
}

export const silentLogger: Logger = {
  log: () => undefined,
  error: () => undefined,
};

export function warn(logger: Logger, ...args: unknown[]) {
  if (logger.warn) {
    logger.warn(...args);
    return;
  }
  logger.log(...args);
}
