/**
 * Domain types shared by the engine, the repositories and the HTTP layer.
 */

import type { PRIORITIES, CONTRACTOR_STATUSES } from "../config/site.js";

/**
 * Caller identity, supplied by the (external) session layer.
 * Every engine operation is scoped to `projectId`.
 */
export interface RequestContext {
  projectId: string;
  actorId: string;
}

export type Priority = (typeof PRIORITIES)[number];

export type ContractorStatus = (typeof CONTRACTOR_STATUSES)[number];

export type { Briefing } from "../site-db/schema.js";

export interface Activity {
  id: number;
  briefingId: number;
  /** YYYY-MM-DD, copied from the owning briefing */
  date: string;
  /** HH:MM */
  time: string;
  title: string;
  description: string;
  area: string | null;
  /** null only for legacy rows written without a priority */
  priority: Priority | null;
  laborCount: number;
  /** Ordered, de-duplicated ids as persisted */
  contractorIds: number[];
  assignedTo: string;
  createdAt: string;
  updatedAt: string;
}

/** Writable activity fields, already normalised */
export interface ActivityFields {
  time: string;
  title: string;
  description: string;
  area: string | null;
  priority: Priority;
  laborCount: number;
  contractorIds: number[];
  assignedTo: string;
}

/** One person to call about a contractor */
export interface ContractorContact {
  name: string;
  phone: string;
  email: string;
}

export interface Contractor {
  id: number;
  projectId: string;
  name: string;
  trade: string;
  /** Free text in storage; rows written by this engine hold a ContractorStatus */
  status: string;
  contacts: ContractorContact[];
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
}

/** Writable contractor fields, already normalised */
export interface ContractorFields {
  name: string;
  trade: string;
  status: ContractorStatus;
  contacts: ContractorContact[];
}

/** What an activity exposes about each assigned contractor */
export interface ContractorDescriptor {
  id: number;
  name: string;
  trade: string;
  status: string;
  contacts: ContractorContact[];
}

export interface ResolvedActivity extends Activity {
  contractors: ContractorDescriptor[];
}
