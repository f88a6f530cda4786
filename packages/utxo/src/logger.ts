// packages/utxo/src/logger.ts

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

/** Console logger; `debug` prints only when DEBUG is set. */
export function createConsoleLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => {
      if (process.env.DEBUG) console.log(prefix, ...args);
    },
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};
