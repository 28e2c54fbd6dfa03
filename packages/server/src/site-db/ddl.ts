/**
 * Table definitions applied on every connection.
 * For production upgrades, generate migrations with drizzle-kit.
 */

export const SITE_DB_DDL = `
  -- briefings: one row per project per calendar date
  CREATE TABLE IF NOT EXISTS briefings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    project_id TEXT NOT NULL,
    date TEXT NOT NULL,
    overview TEXT NOT NULL DEFAULT '',
    safety_info TEXT NOT NULL DEFAULT '',
    notes TEXT NOT NULL DEFAULT '',
    status TEXT NOT NULL DEFAULT 'draft',
    created_by TEXT,
    updated_by TEXT,
    last_updated TEXT NOT NULL,
    CONSTRAINT briefings_project_date_idx UNIQUE (project_id, date)
  );

  -- activities: tasks scheduled within a briefing
  CREATE TABLE IF NOT EXISTS activities (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    briefing_id INTEGER NOT NULL REFERENCES briefings(id),
    date TEXT NOT NULL,
    time TEXT NOT NULL,
    title TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    area TEXT,
    priority TEXT,
    labor_count INTEGER NOT NULL DEFAULT 0 CHECK (labor_count >= 0),
    contractors TEXT,
    assigned_to TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  -- contractors: name_key (case-folded name) is unique per project
  CREATE TABLE IF NOT EXISTS contractors (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    project_id TEXT NOT NULL,
    name TEXT NOT NULL COLLATE NOCASE,
    name_key TEXT NOT NULL,
    trade TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'Active',
    contact_name TEXT NOT NULL DEFAULT '',
    phone TEXT NOT NULL DEFAULT '',
    email TEXT NOT NULL DEFAULT '',
    created_by TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    CONSTRAINT contractors_project_name_idx UNIQUE (project_id, name_key)
  );

  -- activity_log: append-only audit trail
  CREATE TABLE IF NOT EXISTS activity_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    project_id TEXT NOT NULL,
    actor_id TEXT NOT NULL,
    action TEXT NOT NULL,
    details TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_activities_briefing ON activities(briefing_id);
  CREATE INDEX IF NOT EXISTS idx_activities_date ON activities(date);
  CREATE INDEX IF NOT EXISTS idx_contractors_project ON contractors(project_id);
  CREATE INDEX IF NOT EXISTS idx_activity_log_project ON activity_log(project_id, created_at);
`;
