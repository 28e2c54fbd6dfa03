/**
 * Public entry point: the engine, its storage and the HTTP router.
 */

export * from "./engine/index.js";
export { openSiteDatabase, getSiteDb, closeSiteDb, type SiteDb } from "./site-db/index.js";
export { AuditLogRepo, type AuditSink, type AuditAction } from "./site-db/audit-log-repo.js";
export { createApiRouter } from "./api/router.js";
export { createApp, startServer } from "./server.js";
export { PROJECT_HEADER, ACTOR_HEADER, type AppEnv } from "./api/context.js";
