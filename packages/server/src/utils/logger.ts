/**
 * Prefixed console logger used by the engine, storage and server modules.
 *
 * `debug` lines and suppressed errors only print when DEBUG is set.
 */

import { colors } from "./colors.js";
import { getErrorCode, getErrorMessage } from "./errors.js";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  /** Appends the error's message, and its driver code when it carries one */
  error: (msg: string, err?: unknown) => void;
  debug: (msg: string) => void;
}

const debugEnabled = (): boolean => Boolean(process.env.DEBUG);

function describeError(err: unknown): string {
  if (err === undefined || err === null || err === "") return "";
  const code = getErrorCode(err);
  return code ? `: ${getErrorMessage(err)} [${code}]` : `: ${getErrorMessage(err)}`;
}

/**
 * Create a logger whose lines start with `[PREFIX]`, e.g. `createLogger("COPY")`.
 */
export const createLogger = (prefix: string): Logger => ({
  info: (msg) => console.log(`[${prefix}] ${msg}`),
  warn: (msg) => console.warn(`${colors.yellow}[${prefix}]${colors.reset} ${msg}`),
  error: (msg, err) => console.error(`${colors.red}[${prefix}]${colors.reset} ${msg}${describeError(err)}`),
  debug: (msg) => {
    if (debugEnabled()) {
      console.log(`${colors.dim}[${prefix}:DEBUG]${colors.reset} ${msg}`);
    }
  },
});

/**
 * Record an error that is caught on purpose, such as a malformed stored value
 * read as empty.
 */
export const logSilentError = (context: string, error: unknown): void => {
  if (debugEnabled()) {
    console.log(`${colors.dim}[SILENT]${colors.reset} ${context}${describeError(error)}`);
  }
};
