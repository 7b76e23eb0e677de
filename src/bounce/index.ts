/**
 * Bounce Module
 *
 * Polls the mailbox for delivery-failure notifications and reconciles pending
 * sends. Absence of a bounce inside the lookback window is only a tentative
 * delivery (bounced = false); sends older than the window are left alone.
 */

import { recordBounceVerdict } from '../contacts/index.js';
import { ValidationError } from '../errors/index.js';
import type { FailureNotification, Mailbox } from '../mailbox/index.js';
import { createLogger, noopMetrics, sleep, type Logger, type Metrics, type Observability } from '../observability/index.js';
import type { Contact } from '../types/index.js';

export interface BounceCheckResult {
  contacts: Contact[];
  /** Contacts whose most recent send is marked bounced */
  bounceCount: number;
  /** Contacts whose verdict changed in this check */
  changed: number;
}

const ANGLE_ADDRESS = /<([^<>]+)>/;

/**
 * Failed addresses named by one notification, lowercased.
 * X-Failed-Recipients wins; otherwise the address in To.
 */
export function extractFailedRecipients(headers: Readonly<Record<string, string>>): string[] {
  const failed = headers['x-failed-recipients'];
  if (failed) {
    return failed
      .split(',')
      .map((address) => address.trim().toLowerCase())
      .filter(Boolean);
  }

  const to = headers['to']?.trim().toLowerCase();
  if (!to) {
    return [];
  }
  const embedded = ANGLE_ADDRESS.exec(to);
  return [(embedded?.[1] ?? to).trim()];
}

export function collectBouncedAddresses(notifications: readonly FailureNotification[]): Set<string> {
  const bounced = new Set<string>();
  for (const notification of notifications) {
    for (const address of extractFailedRecipients(notification.headers)) {
      bounced.add(address);
    }
  }
  return bounced;
}

/**
 * Apply a bounce set to contacts sent at or after the cutoff
 */
export function reconcileBounces(
  contacts: readonly Contact[],
  bounced: ReadonlySet<string>,
  cutoff: Date
): BounceCheckResult {
  let changed = 0;

  const updated = contacts.map((contact) => {
    if (!contact.sentTo || !contact.sentAt) {
      return contact;
    }
    // An unparseable send time is never inside the window
    const sentAt = Date.parse(contact.sentAt);
    if (!(sentAt >= cutoff.getTime())) {
      return contact;
    }

    let next = contact;
    if (bounced.has(contact.sentTo.toLowerCase())) {
      next = recordBounceVerdict(contact, true);
    } else if (contact.bounced === null) {
      next = recordBounceVerdict(contact, false);
    }

    if (next !== contact) {
      changed += 1;
    }
    return next;
  });

  return {
    contacts: updated,
    bounceCount: updated.filter((contact) => contact.bounced === true).length,
    changed,
  };
}

export interface BounceDetectorOptions extends Observability {
  sleep?: ((ms: number) => Promise<void>) | undefined;
  now?: (() => Date) | undefined;
  /** Progress log interval while waiting (default: 15000) */
  progressIntervalMs?: number | undefined;
}

export class BounceDetector {
  private readonly mailbox: Mailbox;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly progressIntervalMs: number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(mailbox: Mailbox, options: BounceDetectorOptions = {}) {
    this.mailbox = mailbox;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());
    this.progressIntervalMs = options.progressIntervalMs ?? 15000;
    this.logger = options.logger ?? createLogger('bounce');
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * One poll over the last `lookbackMinutes`, then reconcile
   */
  async checkBounces(contacts: readonly Contact[], lookbackMinutes: number): Promise<BounceCheckResult> {
    if (!(lookbackMinutes > 0)) {
      throw new ValidationError('lookbackMinutes', 'lookbackMinutes must be positive');
    }

    const cutoff = new Date(this.now().getTime() - lookbackMinutes * 60000);
    const notifications = await this.mailbox.listFailureNotifications(cutoff);
    const bounced = collectBouncedAddresses(notifications);
    const result = reconcileBounces(contacts, bounced, cutoff);

    this.logger.info('Bounce check complete', {
      notifications: notifications.length,
      bouncedAddresses: bounced.size,
      changed: result.changed,
      bounceCount: result.bounceCount,
    });
    this.metrics.recordGauge('bounce.count', result.bounceCount);
    this.metrics.incrementCounter('bounce.checks');

    return result;
  }

  /**
   * Sleep before a poll, logging progress periodically
   */
  async waitForBounces(seconds: number): Promise<void> {
    let remainingMs = Math.max(0, seconds * 1000);
    this.logger.info('Waiting for delivery status reports', { seconds });

    while (remainingMs > 0) {
      const step = Math.min(this.progressIntervalMs, remainingMs);
      await this.sleep(step);
      remainingMs -= step;
      if (remainingMs > 0) {
        this.logger.debug('Still waiting for delivery status reports', { remainingSeconds: Math.ceil(remainingMs / 1000) });
      }
    }
  }
}
