/**
 * Contacts Module
 *
 * Contacts are immutable snapshots. Each discovery stage enriches a contact
 * by returning an updated copy; nothing here mutates its argument.
 */

import { z } from 'zod';
import type { BounceState, Contact, ContactRecord } from '../types/index.js';

export interface NewContact {
  name: string;
  title?: string | null | undefined;
  profileUrl?: string | null | undefined;
  source: string;
}

/**
 * Create a freshly discovered contact with no email and no send history
 */
export function createContact(input: NewContact, now: Date = new Date()): Contact {
  return {
    name: input.name,
    title: input.title ?? null,
    profileUrl: input.profileUrl ?? null,
    email: null,
    source: input.source,
    discoveredAt: now.toISOString(),
    sentAt: null,
    sentTo: null,
    triedAddresses: [],
    bounced: null,
  };
}

/**
 * Attach an address (or comma-joined candidate list).
 * An existing email is kept.
 */
export function withEmail(contact: Contact, email: string): Contact {
  if (contact.email) {
    return contact;
  }
  return { ...contact, email };
}

/**
 * Record one send: append to the tried list, stamp the send, reset the verdict to pending
 */
export function recordSend(contact: Contact, address: string, sentAt: Date = new Date()): Contact {
  return {
    ...contact,
    sentAt: sentAt.toISOString(),
    sentTo: address,
    triedAddresses: [...contact.triedAddresses, address],
    bounced: null,
  };
}

export function recordBounceVerdict(contact: Contact, bounced: BounceState): Contact {
  if (contact.bounced === bounced) {
    return contact;
  }
  return { ...contact, bounced };
}

/**
 * Split the email field into its candidate addresses, in generated order
 */
export function candidateAddresses(contact: Pick<Contact, 'email'>): string[] {
  if (!contact.email) {
    return [];
  }
  return contact.email
    .split(',')
    .map((address) => address.trim())
    .filter((address) => address.length > 0);
}

// ============================================================================
// Persisted records
// ============================================================================

export const ContactRecordSchema = z.object({
  name: z.string(),
  title: z.string().nullable(),
  linkedin_url: z.string().nullable(),
  email: z.string().nullable(),
  source: z.string(),
  found_at: z.string(),
  email_sent_at: z.string().nullable(),
  email_sent_to: z.string().nullable(),
  email_tried: z.array(z.string()),
  email_bounced: z.boolean().nullable(),
});

export const ContactRecordListSchema = z.array(ContactRecordSchema);

export function toRecord(contact: Contact): ContactRecord {
  return {
    name: contact.name,
    title: contact.title,
    linkedin_url: contact.profileUrl,
    email: contact.email,
    source: contact.source,
    found_at: contact.discoveredAt,
    email_sent_at: contact.sentAt,
    email_sent_to: contact.sentTo,
    email_tried: [...contact.triedAddresses],
    email_bounced: contact.bounced,
  };
}

export function fromRecord(record: ContactRecord): Contact {
  return {
    name: record.name,
    title: record.title,
    profileUrl: record.linkedin_url,
    email: record.email,
    source: record.source,
    discoveredAt: record.found_at,
    sentAt: record.email_sent_at,
    sentTo: record.email_sent_to,
    triedAddresses: [...record.email_tried],
    bounced: record.email_bounced,
  };
}
