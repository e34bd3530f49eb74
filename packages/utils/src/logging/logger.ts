/**
 * Optional logger accepted by long-running components.
 *
 * Every method is optional so callers can pass a partial object
 * (e.g. only `error`) or an existing logger such as `console`.
 */
export interface Logger {
  debug?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}

export const noopLogger: Logger = {};

export const consoleLogger: Logger = {
  debug: (...args) => console.debug(...args),
  error: (...args) => console.error(...args),
};
