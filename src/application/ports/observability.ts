type LogFn = (payload: Record<string, unknown>, message: string) => void;

/**
 * Structured logger the application layer writes through. The pino logger
 * from infrastructure satisfies it as-is.
 */
export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
