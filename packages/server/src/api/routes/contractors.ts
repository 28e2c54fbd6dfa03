/**
 * Contractor API routes.
 *
 * Routes:
 * - GET /contractors - List contractors (status order, then name)
 * - POST /contractors - Register a contractor
 * - GET /contractors/:id - Get a contractor
 * - PUT /contractors/:id - Replace a contractor
 * - DELETE /contractors/:id - Delete a contractor
 */

import { Hono } from "hono";
import type { Engine } from "../../engine/index.js";
import { runOperation } from "../../engine/operation.js";
import { ContractorInputSchema } from "../../engine/fields.js";
import type { AppEnv } from "../context.js";
import { errorResponse, parseJsonBody, parseWith, sendResult } from "../respond.js";
import { IdParamSchema } from "./params.js";

export function createContractorRoutes(engine: Engine): Hono<AppEnv> {
  const contractors = new Hono<AppEnv>();

  contractors.get("/", (c) => {
    const ctx = c.get("requestContext");
    const result = runOperation("listContractors", ctx, () => ({
      contractors: engine.contractors.listContractors(ctx),
      activeCount: engine.contractors.countActiveContractors(ctx),
    }));
    return sendResult(c, result, (data) => ({
      contractors: data.contractors,
      active_count: data.activeCount,
    }));
  });

  contractors.post("/", async (c) => {
    const ctx = c.get("requestContext");
    const body = await parseJsonBody(c, ContractorInputSchema);
    if (!body.success) return errorResponse(c, body);

    const result = runOperation("addContractor", ctx, () => engine.contractors.addContractor(ctx, body.data));
    return sendResult(c, result, (contractor) => ({ id: contractor.id, contractor }), 201);
  });

  contractors.get("/:id", (c) => {
    const ctx = c.get("requestContext");
    const id = parseWith(IdParamSchema, c.req.param("id"));
    if (!id.success) return errorResponse(c, id);

    const result = runOperation("getContractor", ctx, () => engine.contractors.getContractor(ctx, id.data));
    return sendResult(c, result, (contractor) => ({ contractor }));
  });

  contractors.put("/:id", async (c) => {
    const ctx = c.get("requestContext");
    const id = parseWith(IdParamSchema, c.req.param("id"));
    if (!id.success) return errorResponse(c, id);
    const body = await parseJsonBody(c, ContractorInputSchema);
    if (!body.success) return errorResponse(c, body);

    const result = runOperation("updateContractor", ctx, () =>
      engine.contractors.updateContractor(ctx, id.data, body.data)
    );
    return sendResult(c, result, (contractor) => ({ contractor }));
  });

  contractors.delete("/:id", (c) => {
    const ctx = c.get("requestContext");
    const id = parseWith(IdParamSchema, c.req.param("id"));
    if (!id.success) return errorResponse(c, id);

    const result = runOperation("deleteContractor", ctx, () => engine.contractors.deleteContractor(ctx, id.data));
    return sendResult(c, result, (contractor) => ({ contractor }));
  });

  return contractors;
}
