export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const createLogger = (scope: string): Logger => ({
  info: (message, ...args) => console.info(`[INFO] [${scope}] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] [${scope}] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] [${scope}] ${message}`, ...args),
});

export const describeError = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'Unknown error';
};
