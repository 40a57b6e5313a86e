export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  table: (rows: readonly object[]) => void;
};

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
  table: (rows) => console.table(rows),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  table: () => {},
};
