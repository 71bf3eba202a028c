export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Core modules stay silent unless the caller hands them a logger; the CLI
 * passes `console`.
 */
export type OptionalLogger = Partial<Logger>;

export const silentLogger: OptionalLogger = {};
