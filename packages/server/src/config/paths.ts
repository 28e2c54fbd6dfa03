/**
 * File paths and API configuration.
 */

import path from "node:path";
import os from "node:os";
import { parsePositiveInt, resolvePath } from "./helpers.js";

// =============================================================================
// Database Configuration
// =============================================================================

/** Base directory for local data */
const DATA_BASE_DIR = path.join(os.homedir(), ".site-briefing");

/** Path to the SQLite database */
export const DB_PATH = resolvePath(process.env.DB_PATH, path.join(DATA_BASE_DIR, "briefing.db"));

// =============================================================================
// API Server Configuration
// =============================================================================

/** Host for the API server */
export const API_HOST = process.env.API_HOST ?? "127.0.0.1";

/** Port for the API server */
export const API_PORT = parsePositiveInt(process.env.API_PORT, 4460);

/** API endpoint prefix */
export const API_PREFIX = "/api";
