export interface ScanLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  prefix?: string;
}

export function createConsoleLogger(opts?: ConsoleLoggerOptions): ScanLogger {
  const verbose = !!opts?.verbose;
  const prefix = opts?.prefix ?? '[scan]';
  return {
    debug: (message, ...args) => {
      if (verbose) console.debug(`${prefix} ${message}`, ...args);
    },
    info: (message, ...args) => console.info(`${prefix} ${message}`, ...args),
    warn: (message, ...args) => console.warn(`${prefix} ${message}`, ...args),
    error: (message, ...args) => console.error(`${prefix} ${message}`, ...args),
  };
}
