/**
 * Storage codec for contractor contacts.
 *
 * Contacts live in the contact_name, phone and email columns. A single
 * contact is stored as plain strings; several are stored as parallel JSON
 * arrays, one per column, read back by position.
 */

import { z } from "zod";
import type { ContractorContact } from "./types.js";
import { logSilentError } from "../utils/logger.js";

/** The three contact columns of a contractor row */
export interface StoredContacts {
  contactName: string;
  phone: string;
  email: string;
}

const StringListSchema = z.array(z.unknown()).transform((items) =>
  items.map((item) => (typeof item === "string" ? item : ""))
);

function parseList(raw: string, column: string): string[] {
  if (!raw.startsWith("[")) {
    return raw ? [raw] : [];
  }
  try {
    return StringListSchema.parse(JSON.parse(raw));
  } catch (error) {
    logSilentError(`Unreadable ${column} list`, error);
    return [raw];
  }
}

const isBlank = (contact: ContractorContact): boolean => !contact.name && !contact.phone && !contact.email;

/**
 * Decode the stored columns into contacts. Rows with no contact details
 * decode to an empty list.
 */
export function decodeContacts(stored: StoredContacts): ContractorContact[] {
  if (!stored.contactName.startsWith("[")) {
    const single = { name: stored.contactName, phone: stored.phone, email: stored.email };
    return isBlank(single) ? [] : [single];
  }

  const names = parseList(stored.contactName, "contact_name");
  const phones = parseList(stored.phone, "phone");
  const emails = parseList(stored.email, "email");
  const count = Math.max(names.length, phones.length, emails.length);

  const contacts: ContractorContact[] = [];
  for (let i = 0; i < count; i++) {
    contacts.push({ name: names[i] ?? "", phone: phones[i] ?? "", email: emails[i] ?? "" });
  }
  return contacts;
}

/**
 * Encode contacts for storage. One contact is written as plain strings unless
 * its name would read back as a JSON list.
 */
export function encodeContacts(contacts: readonly ContractorContact[]): StoredContacts {
  const [only] = contacts;
  if (contacts.length === 0 || !only) {
    return { contactName: "", phone: "", email: "" };
  }
  if (contacts.length === 1 && !only.name.startsWith("[")) {
    return { contactName: only.name, phone: only.phone, email: only.email };
  }
  return {
    contactName: JSON.stringify(contacts.map((contact) => contact.name)),
    phone: JSON.stringify(contacts.map((contact) => contact.phone)),
    email: JSON.stringify(contacts.map((contact) => contact.email)),
  };
}
