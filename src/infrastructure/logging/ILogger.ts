/**
 * Logger contract used across the container.
 *
 * @remarks
 * Any object with these four methods works: `console`, pino, winston, or a
 * test double. Resolution steps log at `debug`, configuration locking at
 * `info`, rejected writes after lock at `warn`.
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

const noop = (): void => undefined;

/**
 * Discards everything. Default for containers created without a logger.
 */
export const silentLogger: ILogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
