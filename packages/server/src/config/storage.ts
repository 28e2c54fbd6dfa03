/**
 * Storage tuning.
 */

import { parsePositiveInt } from "./helpers.js";

/**
 * How long a storage call waits on a locked database before failing (ms).
 * This is the only cancellation boundary for engine operations.
 */
export const STORAGE_BUSY_TIMEOUT_MS = parsePositiveInt(process.env.STORAGE_BUSY_TIMEOUT_MS, 5_000);
