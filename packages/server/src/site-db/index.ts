/**
 * Site database connection singleton using better-sqlite3 and Drizzle ORM.
 * Database location: DB_PATH (default ~/.site-briefing/briefing.db)
 */

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { DB_PATH } from "../config/paths.js";
import { STORAGE_BUSY_TIMEOUT_MS } from "../config/storage.js";
import { SITE_DB_DDL } from "./ddl.js";
import * as schema from "./schema.js";

export type SiteDb = BetterSQLite3Database<typeof schema>;

let db: SiteDb | null = null;
let sqlite: Database.Database | null = null;

/**
 * Open a SQLite file, apply pragmas and create tables.
 * Used by the singleton below and by the test helpers.
 */
export function openSiteDatabase(
  dbPath: string,
  busyTimeoutMs: number = STORAGE_BUSY_TIMEOUT_MS
): { db: SiteDb; sqlite: Database.Database } {
  const connection = new Database(dbPath, { timeout: busyTimeoutMs });
  connection.pragma("journal_mode = WAL"); // Better concurrent access
  connection.pragma("foreign_keys = ON");
  connection.exec(SITE_DB_DDL);

  return { db: drizzle(connection, { schema }), sqlite: connection };
}

/**
 * Initialize and get the site database connection.
 * Creates the database file and tables on first call.
 */
export function getSiteDb(): SiteDb {
  if (!db) {
    const dir = path.dirname(DB_PATH);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const opened = openSiteDatabase(DB_PATH);
    db = opened.db;
    sqlite = opened.sqlite;
  }
  return db;
}

/**
 * Close the site database connection.
 * Call this on shutdown.
 */
export function closeSiteDb(): void {
  if (sqlite) {
    sqlite.close();
    sqlite = null;
    db = null;
  }
}

export { schema };
