/**
 * Delivery Module
 *
 * Per-contact send state and batched sending.
 *
 * States:
 *   NEVER_SENT → SENT_PENDING → DELIVERED (tentative) | BOUNCED
 *   BOUNCED with untried candidates is eligible again; without them EXHAUSTED.
 *
 * sendBatch() persists the whole contact list after every individual send, so
 * a failure part-way leaves only completed sends recorded.
 */

import { candidateAddresses, recordSend } from '../contacts/index.js';
import { parseName } from '../email-generator/index.js';
import { DeliveryError, MailboxAuthError, ValidationError } from '../errors/index.js';
import type { Mailbox } from '../mailbox/index.js';
import { createLogger, noopMetrics, sleep, type Logger, type Metrics, type Observability } from '../observability/index.js';
import type { Contact, OutreachDraft } from '../types/index.js';

export type DeliveryState = 'NEVER_SENT' | 'SENT_PENDING' | 'DELIVERED' | 'BOUNCED' | 'EXHAUSTED';

export function untriedAddresses(contact: Contact): string[] {
  const tried = new Set(contact.triedAddresses);
  return candidateAddresses(contact).filter((address) => !tried.has(address));
}

/**
 * First candidate not yet tried, in generated order
 */
export function nextAddress(contact: Contact): string | null {
  return untriedAddresses(contact)[0] ?? null;
}

/**
 * At least one untried candidate, and either never sent or the last send bounced
 */
export function isEligible(contact: Contact): boolean {
  if (untriedAddresses(contact).length === 0) {
    return false;
  }
  return contact.sentAt === null || contact.bounced === true;
}

export function deliveryState(contact: Contact): DeliveryState {
  const remaining = untriedAddresses(contact).length;

  if (contact.sentAt === null) {
    return remaining > 0 ? 'NEVER_SENT' : 'EXHAUSTED';
  }
  if (contact.bounced === null) {
    return 'SENT_PENDING';
  }
  if (contact.bounced === false) {
    return 'DELIVERED';
  }
  return remaining > 0 ? 'BOUNCED' : 'EXHAUSTED';
}

/**
 * Greet by first name and sign with the sender name.
 *
 * "Hi there," → "Hi Julius,"; "Best," → "Best,\n<sender>". Only the first
 * occurrence of each is touched.
 */
export function personalizeBody(body: string, contactName: string, senderName = ''): string {
  const first = parseName(contactName)?.first;
  const display = first ? first.charAt(0).toUpperCase() + first.slice(1) : 'there';

  let personalized = body.replace('Hi there,', `Hi ${display},`);
  if (senderName) {
    personalized = personalized.replace('Best,', `Best,\n${senderName}`);
  }
  return personalized;
}

// ============================================================================
// State machine
// ============================================================================

export type PersistContacts = (contacts: Contact[]) => Promise<void>;

export interface DeliveryOptions extends Observability {
  /** Pause between sends in milliseconds (default: 2000) */
  pacingMs?: number | undefined;
  /** Appended after "Best," in the body */
  senderName?: string | undefined;
  /** Log each would-be send and change nothing */
  dryRun?: boolean | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  now?: (() => Date) | undefined;
}

export interface SendBatchInput {
  draft: OutreachDraft;
  /** Called with the full list after every completed send */
  persist?: PersistContacts | undefined;
}

export class DeliveryStateMachine {
  private readonly mailbox: Mailbox;
  private readonly pacingMs: number;
  private readonly senderName: string;
  private readonly dryRun: boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(mailbox: Mailbox, options: DeliveryOptions = {}) {
    this.mailbox = mailbox;
    this.pacingMs = options.pacingMs ?? 2000;
    this.senderName = options.senderName ?? '';
    this.dryRun = options.dryRun ?? false;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('delivery');
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * Send to up to maxSend eligible contacts, in list order.
   *
   * @returns the full contact list with send state applied
   * @throws DeliveryError when a send fails; `contacts` holds the list as last persisted
   * @throws MailboxAuthError when the mailbox rejects the credentials
   */
  async sendBatch(contacts: readonly Contact[], maxSend: number, input: SendBatchInput): Promise<Contact[]> {
    if (!Number.isInteger(maxSend) || maxSend < 1) {
      throw new ValidationError('maxSend', 'maxSend must be a positive integer');
    }
    if (!input.draft.subject.trim() || !input.draft.body.trim()) {
      throw new ValidationError('draft', 'an outreach draft with a subject and body is required');
    }

    const current = [...contacts];
    const selected = current
      .map((contact, index) => ({ contact, index }))
      .filter(({ contact }) => isEligible(contact))
      .slice(0, maxSend);

    this.logger.info('Send batch selected', {
      eligible: current.filter(isEligible).length,
      selected: selected.length,
      dryRun: this.dryRun,
    });

    for (const [n, { contact, index }] of selected.entries()) {
      const address = nextAddress(contact);
      if (!address) {
        continue;
      }

      const candidates = candidateAddresses(contact).length;
      const attempt = contact.triedAddresses.length + 1;
      const text = personalizeBody(input.draft.body, contact.name, this.senderName);

      if (this.dryRun) {
        this.logger.info('Dry run: would send', {
          name: contact.name,
          to: address,
          attempt,
          candidates,
          greeting: text.split('\n', 1)[0],
          attachment: input.draft.attachmentPath ?? null,
        });
        continue;
      }

      try {
        await this.mailbox.send({
          to: address,
          subject: input.draft.subject,
          text,
          attachmentPath: input.draft.attachmentPath,
        });
      } catch (error) {
        this.metrics.incrementCounter('delivery.send.failure');
        if (error instanceof MailboxAuthError) {
          throw error;
        }
        throw new DeliveryError(address, [...current], error);
      }

      current[index] = recordSend(contact, address, this.now());
      if (input.persist) {
        await input.persist([...current]);
      }

      this.metrics.incrementCounter('delivery.send.success', { retry: String(attempt > 1) });
      this.logger.info('Sent', { name: contact.name, to: address, attempt, candidates, n: n + 1, of: selected.length });

      if (n < selected.length - 1) {
        await this.sleep(this.pacingMs);
      }
    }

    return current;
  }
}
