export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createConsoleLogger(scope: string, debug = Boolean(process.env.CHATBRIDGE_DEBUG)): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (debug) console.debug(tag, message, ...details);
    },
    info: (message, ...details) => console.log(tag, message, ...details),
    warn: (message, ...details) => console.warn(tag, message, ...details),
    error: (message, ...details) => console.error(tag, message, ...details),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
