import { dlog } from './debug.js';

/**
 * Minimal logging surface accepted by every component.
 * Any console-shaped object (including `console` itself) satisfies it.
 */
export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Console logger tagging each line with `[scope]`.
 *
 * `debug` output is gated on the `DEBUG` environment variable through
 * {@link dlog} under the namespace `tagstream:<scope>`.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (...args) => dlog(`tagstream:${scope}`, ...args),
    info: (...args) => console.info(tag, ...args),
    warn: (...args) => console.warn(tag, ...args),
    error: (...args) => console.error(tag, ...args),
  };
}

/** Discards everything. Handy for tests and embedding. */
export const silentLogger: Logger = {
  debug: () => { },
  info: () => { },
  warn: () => { },
  error: () => { },
};
