export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

/* eslint-disable no-console */
export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
};
/* eslint-enable no-console */

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
};
