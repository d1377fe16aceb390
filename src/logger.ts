export type LogMeta = Record<string, string | number | boolean>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
}

export const consoleLogger: Logger = {
  debug(message, meta) {
    if (meta) console.debug(message, meta);
    else console.debug(message);
  },
  warn(message, meta) {
    if (meta) console.warn(message, meta);
    else console.warn(message);
  },
};

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};
