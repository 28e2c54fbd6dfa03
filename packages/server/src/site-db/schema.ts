/**
 * Drizzle ORM schema for the site briefing SQLite database.
 * Stores briefings, activities, contractors and the audit trail.
 *
 * The runtime DDL lives in ./ddl.ts; it adds what Drizzle cannot declare
 * here (the NOCASE collation used to order contractor names).
 */

import { sqliteTable, text, integer, unique, index } from "drizzle-orm/sqlite-core";

/**
 * Briefings table - one per project per calendar date
 */
export const briefings = sqliteTable(
  "briefings",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    projectId: text("project_id").notNull(),
    date: text("date").notNull(), // YYYY-MM-DD, project-local
    overview: text("overview").notNull().default(""),
    safetyInfo: text("safety_info").notNull().default(""),
    notes: text("notes").notNull().default(""),
    status: text("status").notNull().default("draft"), // draft when created here; other workflow states pass through
    createdBy: text("created_by"),
    updatedBy: text("updated_by"),
    lastUpdated: text("last_updated").notNull(),
  },
  (table) => [unique("briefings_project_date_idx").on(table.projectId, table.date)]
);

/**
 * Activities table - scheduled tasks within a briefing
 */
export const activities = sqliteTable(
  "activities",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    briefingId: integer("briefing_id")
      .notNull()
      .references(() => briefings.id),
    date: text("date").notNull(), // copy of the briefing date
    time: text("time").notNull(), // HH:MM
    title: text("title").notNull(),
    description: text("description").notNull().default(""),
    area: text("area"),
    priority: text("priority"), // low|medium|high|critical
    laborCount: integer("labor_count").notNull().default(0),
    contractors: text("contractors"), // JSON array of contractor ids
    assignedTo: text("assigned_to").notNull().default(""),
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at").notNull(),
  },
  (table) => [
    index("idx_activities_briefing").on(table.briefingId),
    index("idx_activities_date").on(table.date),
  ]
);

/**
 * Contractors table - subcontractor registry per project
 */
export const contractors = sqliteTable(
  "contractors",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    projectId: text("project_id").notNull(),
    name: text("name").notNull(),
    nameKey: text("name_key").notNull(), // case-folded NFC name, unique per project
    trade: text("trade").notNull(),
    status: text("status").notNull().default("Active"), // Active|Standby|Delayed|Complete|Offsite
    contactName: text("contact_name").notNull().default(""), // plain, or a JSON array per contact
    phone: text("phone").notNull().default(""),
    email: text("email").notNull().default(""),
    createdBy: text("created_by"),
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at").notNull(),
  },
  (table) => [unique("contractors_project_name_idx").on(table.projectId, table.nameKey)]
);

/**
 * Audit trail - append only
 */
export const activityLog = sqliteTable("activity_log", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  projectId: text("project_id").notNull(),
  actorId: text("actor_id").notNull(),
  action: text("action").notNull(),
  details: text("details").notNull(),
  createdAt: text("created_at").notNull(),
});

// Type exports for use in repositories
export type Briefing = typeof briefings.$inferSelect;
export type NewBriefing = typeof briefings.$inferInsert;

export type ActivityRow = typeof activities.$inferSelect;
export type NewActivityRow = typeof activities.$inferInsert;

export type ContractorRow = typeof contractors.$inferSelect;
export type NewContractorRow = typeof contractors.$inferInsert;

export type AuditLogEntry = typeof activityLog.$inferSelect;
export type NewAuditLogEntry = typeof activityLog.$inferInsert;
