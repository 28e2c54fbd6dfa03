/**
 * Response helpers shared by the route modules.
 */

import type { Context } from "hono";
import type { z } from "zod";
import { ERROR_HTTP_STATUS } from "../engine/errors.js";
import type { OperationResult } from "../engine/operation.js";
import { getErrorMessage } from "../utils/errors.js";

type Failure = Extract<OperationResult<unknown>, { success: false }>;

/** Standard error response helper */
export function errorResponse(c: Context, failure: Failure) {
  return c.json(
    { success: false, code: failure.code, error: failure.error },
    ERROR_HTTP_STATUS[failure.code]
  );
}

/**
 * Send an operation result: `{ success: true, ...body }` or the error.
 */
export function sendResult<T, B extends Record<string, unknown>>(
  c: Context,
  result: OperationResult<T>,
  toBody: (data: T) => B,
  status: 200 | 201 = 200
) {
  if (!result.success) {
    return errorResponse(c, result);
  }
  return c.json({ success: true, ...toBody(result.data) }, status);
}

function validationFailure(error: string): Failure {
  return { success: false, code: "VALIDATION_ERROR", error };
}

/**
 * Flatten zod issues into one message.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate a value against a schema as an operation result.
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): OperationResult<z.output<S>> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    return validationFailure(formatZodError(parsed.error));
  }
  return { success: true, data: parsed.data };
}

/**
 * Read and validate a JSON request body.
 */
export async function parseJsonBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S
): Promise<OperationResult<z.output<S>>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (error) {
    return validationFailure(`Invalid JSON body: ${getErrorMessage(error)}`);
  }
  return parseWith(schema, body);
}

/**
 * Convert Hono queries (Record<string, string[]>) to simple object for Zod.
 * Takes the first value of each array.
 */
export function queriesToObject(queries: Record<string, string[]>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, values] of Object.entries(queries)) {
    const first = values[0];
    if (first !== undefined) {
      result[key] = first;
    }
  }
  return result;
}
