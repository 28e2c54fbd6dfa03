/**
 * Operation runner: turns thrown engine errors into discriminated results.
 */

import { EngineError, StorageError, type EngineErrorCode } from "./errors.js";
import type { RequestContext } from "./types.js";
import { withSpanSync, recordError, contextAttributes } from "../telemetry/spans.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("ENGINE");

export type OperationResult<T> =
  | { success: true; data: T }
  | { success: false; code: EngineErrorCode; error: string };

/**
 * Normalise anything thrown by an operation into an EngineError.
 * Domain errors pass through; everything else is a storage failure.
 */
export function toEngineError(operation: string, error: unknown): EngineError {
  if (error instanceof EngineError) {
    return error;
  }
  return StorageError.from(operation, error);
}

/**
 * Run an engine operation inside a span and report its outcome as a result.
 *
 * Expected outcomes (validation, not-found, copy preconditions) log at debug.
 * Storage failures log at error level with the project and actor.
 */
export function runOperation<T>(name: string, ctx: RequestContext, fn: () => T): OperationResult<T> {
  return withSpanSync(
    `engine.${name}`,
    (span): OperationResult<T> => {
      try {
        return { success: true, data: fn() };
      } catch (error) {
        const engineError = toEngineError(name, error);
        recordError(span, engineError);

        if (engineError instanceof StorageError) {
          logger.error(
            `${name} failed (project=${ctx.projectId}, actor=${ctx.actorId})`,
            engineError.cause ?? engineError
          );
        } else {
          logger.debug(`${name} rejected: ${engineError.code} ${engineError.message}`);
        }

        return { success: false, code: engineError.code, error: engineError.message };
      }
    },
    contextAttributes(ctx)
  );
}
