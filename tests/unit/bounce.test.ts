/**
 * Unit tests for the Bounce module
 */

import { describe, test, expect } from '@jest/globals';
import { BounceDetector, extractFailedRecipients, reconcileBounces } from '../../src/bounce/index.js';
import { createContact } from '../../src/contacts/index.js';
import { ValidationError } from '../../src/errors/index.js';
import type { FailureNotification, Mailbox, OutreachMessage, SendReceipt } from '../../src/mailbox/index.js';
import { silentLogger } from '../../src/observability/index.js';
import type { Contact } from '../../src/types/index.js';

// =============================================================================
// Test Fixtures
// =============================================================================

class FakeMailbox implements Mailbox {
  readonly polls: Date[] = [];

  constructor(private readonly notifications: FailureNotification[]) {}

  async send(_message: OutreachMessage): Promise<SendReceipt> {
    return { messageId: null };
  }

  async listFailureNotifications(since: Date): Promise<FailureNotification[]> {
    this.polls.push(since);
    return this.notifications;
  }
}

const T = new Date('2026-05-01T10:00:00.000Z');

function sent(name: string, address: string, sentAt: string, bounced: boolean | null = null): Contact {
  return {
    ...createContact({ name, source: 'brave' }, new Date('2026-05-01T08:00:00.000Z')),
    email: address,
    sentAt,
    sentTo: address,
    triedAddresses: [address],
    bounced,
  };
}

const failure = (headers: Record<string, string>): FailureNotification => ({ headers, receivedAt: null });

// =============================================================================
// Tests
// =============================================================================

describe('Bounce Module', () => {
  describe('extractFailedRecipients()', () => {
    test('should prefer X-Failed-Recipients', () => {
      expect(
        extractFailedRecipients({ 'x-failed-recipients': 'Jane.Doe@Acme.com, b@x.com', to: 'me@example.com' })
      ).toEqual(['jane.doe@acme.com', 'b@x.com']);
    });

    test('should fall back to the To address', () => {
      expect(extractFailedRecipients({ to: 'Jane Doe <Jane.Doe@Acme.com>' })).toEqual(['jane.doe@acme.com']);
      expect(extractFailedRecipients({ to: ' a@x.com ' })).toEqual(['a@x.com']);
      expect(extractFailedRecipients({})).toEqual([]);
    });
  });

  describe('reconcileBounces()', () => {
    test('should leave sends before the cutoff untouched', () => {
      const old = sent('Jane Doe', 'jane@acme.com', '2026-05-01T09:15:00.000Z');

      const result = reconcileBounces([old], new Set(['jane@acme.com']), new Date('2026-05-01T09:30:00.000Z'));

      expect(result.contacts[0]).toBe(old);
      expect(result.changed).toBe(0);
      expect(result.bounceCount).toBe(0);
    });

    test('should leave sends with an unreadable time untouched', () => {
      const garbled = sent('Jane Doe', 'jane@acme.com', 'not-a-date');
      const cutoff = new Date('2026-05-01T09:30:00.000Z');

      expect(reconcileBounces([garbled], new Set(), cutoff)).toEqual({ contacts: [garbled], bounceCount: 0, changed: 0 });
      expect(reconcileBounces([garbled], new Set(['jane@acme.com']), cutoff).contacts[0]).toBe(garbled);
    });
  });

  describe('BounceDetector.checkBounces()', () => {
    test('should mark bounced and tentatively delivered sends inside the window', async () => {
      const mailbox = new FakeMailbox([
        failure({ 'x-failed-recipients': 'a@acme.com' }),
        failure({ to: '<E@acme.com>' }),
      ]);
      const detector = new BounceDetector(mailbox, { now: () => T, logger: silentLogger });
      const contacts = [
        sent('Ann Able', 'a@acme.com', '2026-05-01T09:45:00.000Z'),
        sent('Ben Baker', 'b@acme.com', '2026-05-01T09:40:00.000Z'),
        sent('Cal Cole', 'c@acme.com', '2026-05-01T09:15:00.000Z'),
        createContact({ name: 'Dee Dunn', source: 'brave' }, T),
        sent('Eve Eden', 'e@acme.com', '2026-05-01T09:50:00.000Z', false),
      ];

      const result = await detector.checkBounces(contacts, 30);

      expect(mailbox.polls).toEqual([new Date('2026-05-01T09:30:00.000Z')]);
      expect(result.contacts.map((c) => c.bounced)).toEqual([true, false, null, null, true]);
      expect(result.contacts[2]).toBe(contacts[2]);
      expect(result.contacts[3]).toBe(contacts[3]);
      expect(result.bounceCount).toBe(2);
      expect(result.changed).toBe(3);
    });

    test('should leave a send from 45 minutes ago alone with a 30 minute window', async () => {
      const detector = new BounceDetector(new FakeMailbox([]), { now: () => T, logger: silentLogger });
      const old = sent('Jane Doe', 'jane@acme.com', '2026-05-01T09:15:00.000Z');

      const result = await detector.checkBounces([old], 30);

      expect(result.contacts[0]?.bounced).toBeNull();
      expect(result.changed).toBe(0);
    });

    test('should reject a non-positive lookback', async () => {
      const detector = new BounceDetector(new FakeMailbox([]), { now: () => T, logger: silentLogger });

      await expect(detector.checkBounces([], 0)).rejects.toThrow(ValidationError);
    });
  });

  test('waitForBounces() should sleep in progress intervals', async () => {
    const sleeps: number[] = [];
    const detector = new BounceDetector(new FakeMailbox([]), {
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      progressIntervalMs: 15000,
      logger: silentLogger,
    });

    await detector.waitForBounces(40);

    expect(sleeps).toEqual([15000, 15000, 10000]);
  });
});
