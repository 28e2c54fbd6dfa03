/**
 * Request context middleware.
 *
 * Authentication happens upstream; the proxy in front of this service
 * forwards the session's project and actor as headers.
 */

import type { MiddlewareHandler } from "hono";
import type { RequestContext } from "../engine/types.js";

export const PROJECT_HEADER = "X-Project-Id";
export const ACTOR_HEADER = "X-Actor-Id";

export type AppEnv = {
  Variables: {
    requestContext: RequestContext;
  };
};

/**
 * Reject requests without a project and actor; otherwise expose them as
 * `c.get("requestContext")`.
 */
export const requireRequestContext: MiddlewareHandler<AppEnv> = async (c, next) => {
  const projectId = c.req.header(PROJECT_HEADER)?.trim();
  const actorId = c.req.header(ACTOR_HEADER)?.trim();

  if (!projectId || !actorId) {
    return c.json(
      {
        success: false,
        code: "UNAUTHENTICATED",
        error: `${PROJECT_HEADER} and ${ACTOR_HEADER} headers are required`,
      },
      401
    );
  }

  c.set("requestContext", { projectId, actorId });
  await next();
};
