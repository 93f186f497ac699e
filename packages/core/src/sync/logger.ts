export interface SyncLogger {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: SyncLogger = {
  info: (message) => console.info(message),
  warn: (message) => console.warn(message),
};

export const silentLogger: SyncLogger = {
  info: () => {},
  warn: () => {},
};
