/**
 * Unit tests for the Pipeline module
 * Job ids and the job-bound steps over in-memory storage and fake I/O
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { BounceDetector } from '../../src/bounce/index.js';
import { SearchCascadeEngine } from '../../src/cascade/index.js';
import { loadConfig } from '../../src/config/index.js';
import { DeliveryStateMachine } from '../../src/delivery/index.js';
import { EmailAddressGenerator, type DomainRecordSource } from '../../src/email-generator/index.js';
import { ValidationError } from '../../src/errors/index.js';
import type { FailureNotification, Mailbox, OutreachMessage, SendReceipt } from '../../src/mailbox/index.js';
import { silentLogger } from '../../src/observability/index.js';
import {
  OutreachEngine,
  createOutreachEngine,
  discoverRecruitersForJob,
  generateJobId,
  reconcileBouncesForJob,
  registerJob,
  resolveEmailsForJob,
  sendOutreachForJob,
  slugify,
} from '../../src/pipeline/index.js';
import type { SearchOptions, SearchOutcome, SearchProvider } from '../../src/search/index.js';
import { MemoryStorageAdapter, OutreachRepository } from '../../src/storage/index.js';
import type { DomainRecord } from '../../src/types/index.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const NOW = new Date('2026-05-01T10:00:00.000Z');
const JOB_ID = 'acme__backend_engineer__20260304_050607';

const rawJob = {
  url: 'https://jobs.example.com/123',
  platform: 'LinkedIn',
  job_title: 'Backend Engineer',
  company: 'Acme',
  job_family: 'Software Engineering',
  location: 'Austin, TX',
  description: 'Build things.',
  scraped_at: '2026-03-04T05:06:07Z',
};

const draft = {
  subject: 'Backend Engineer application',
  body: 'Hi there,\n\nI applied for the Backend Engineer role.\n\nBest,',
};

class FakeSearch implements SearchProvider {
  readonly name = 'duckduckgo';

  async execute(_query: string, _options?: SearchOptions): Promise<SearchOutcome> {
    return {
      success: true,
      results: [
        { url: 'https://www.linkedin.com/in/jane-doe', title: 'Jane Doe - Technical Recruiter | LinkedIn', snippet: null },
        { url: 'https://www.linkedin.com/in/john-smith', title: 'John Smith - Talent Acquisition | LinkedIn', snippet: null },
      ],
    };
  }
}

class FakeResolver implements DomainRecordSource {
  async resolve(): Promise<DomainRecord> {
    return { domain: 'acme.com', pattern: '{first}.{last}', domainTier: 'web_search', patternTier: 'web_search' };
  }
}

class FakeMailbox implements Mailbox {
  readonly sent: OutreachMessage[] = [];
  failSends = false;
  notifications: FailureNotification[] = [];

  async send(message: OutreachMessage): Promise<SendReceipt> {
    if (this.failSends) {
      throw new Error('connection reset');
    }
    this.sent.push(message);
    return { messageId: null };
  }

  async listFailureNotifications(): Promise<FailureNotification[]> {
    return this.notifications;
  }
}

function buildEngine(mailbox: Mailbox, storage: MemoryStorageAdapter): OutreachEngine {
  const noSleep = async (): Promise<void> => {};
  return new OutreachEngine(
    {
      cascade: new SearchCascadeEngine([new FakeSearch()], { sleep: noSleep, now: () => NOW, logger: silentLogger }),
      generator: new EmailAddressGenerator(new FakeResolver(), { logger: silentLogger }),
      delivery: new DeliveryStateMachine(mailbox, { sleep: noSleep, now: () => NOW, logger: silentLogger }),
      bounces: new BounceDetector(mailbox, { sleep: noSleep, now: () => NOW, logger: silentLogger }),
      repository: new OutreachRepository(storage),
    },
    { maxSendPerRun: 3, bounceLookbackMinutes: 30, bounceWaitSeconds: 0 },
    silentLogger
  );
}

// =============================================================================
// Tests
// =============================================================================

describe('Pipeline Module', () => {
  describe('generateJobId()', () => {
    test('should combine company, title and scrape time', () => {
      expect(
        generateJobId({
          company: 'Acme, Inc.',
          jobTitle: 'Senior Software Engineer - Platform',
          scrapedAt: '2026-03-04T05:06:07Z',
        })
      ).toBe('acme_inc__senior_software_engineer_platform__20260304_050607');
    });

    test('should cap slugs at 40 characters', () => {
      expect(slugify('x'.repeat(50))).toBe('x'.repeat(40));
      expect(slugify('  --Data   Science__ML--  ')).toBe('data_science_ml');
    });

    test('should reject unusable input', () => {
      expect(() => generateJobId({ company: 'Acme', jobTitle: 'Engineer', scrapedAt: 'yesterday' })).toThrow(
        ValidationError
      );
      expect(() => generateJobId({ company: '!!!', jobTitle: 'Engineer', scrapedAt: '2026-03-04T05:06:07Z' })).toThrow(
        ValidationError
      );
    });
  });

  describe('job-bound steps', () => {
    let storage: MemoryStorageAdapter;
    let mailbox: FakeMailbox;
    let engine: OutreachEngine;

    beforeEach(() => {
      storage = new MemoryStorageAdapter();
      mailbox = new FakeMailbox();
      engine = buildEngine(mailbox, storage);
    });

    test('should register, discover, resolve, send and reconcile a job', async () => {
      const registered = await registerJob(engine, rawJob, draft);
      expect(registered.success).toBe(true);
      expect(registered.data?.jobId).toBe(JOB_ID);
      expect(registered.metadata.jobId).toBe(JOB_ID);

      const discovered = await discoverRecruitersForJob(engine, JOB_ID);
      expect(discovered.data?.added).toBe(2);
      expect(discovered.data?.contacts.map((c) => c.name)).toEqual(['Jane Doe', 'John Smith']);

      const rediscovered = await discoverRecruitersForJob(engine, JOB_ID);
      expect(rediscovered.data?.added).toBe(0);
      expect(rediscovered.data?.contacts).toHaveLength(2);

      const resolved = await resolveEmailsForJob(engine, JOB_ID);
      expect(resolved.data?.withEmail).toBe(2);
      expect(resolved.data?.contacts.map((c) => c.email)).toEqual(['jane.doe@acme.com', 'john.smith@acme.com']);

      const sent = await sendOutreachForJob(engine, JOB_ID, { maxSend: 1 });
      expect(sent.success).toBe(true);
      expect(sent.data?.sent).toBe(1);
      expect(mailbox.sent.map((m) => m.to)).toEqual(['jane.doe@acme.com']);
      expect(mailbox.sent[0]?.text.startsWith('Hi Jane,')).toBe(true);

      const saved = await engine.repository.loadContacts(JOB_ID);
      expect(saved[0]?.sentTo).toBe('jane.doe@acme.com');
      expect(saved[1]?.sentAt).toBeNull();

      mailbox.notifications = [{ headers: { 'x-failed-recipients': 'jane.doe@acme.com' }, receivedAt: NOW }];
      const reconciled = await reconcileBouncesForJob(engine, JOB_ID);
      expect(reconciled.data?.bounceCount).toBe(1);
      expect(reconciled.data?.changed).toBe(1);

      const afterBounce = await engine.repository.loadContacts(JOB_ID);
      expect(afterBounce[0]?.bounced).toBe(true);
    });

    test('should report invalid postings', async () => {
      const result = await registerJob(engine, { ...rawJob, url: 'nope' });

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('VALIDATION_ERROR');
      expect(result.metadata.jobId).toBe('');
    });

    test('should report a missing job as a storage error', async () => {
      const result = await discoverRecruitersForJob(engine, 'missing__job__20260101_000000');

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('STORAGE_ERROR');
      expect(result.error?.message).toBe('Artifact not found: missing__job__20260101_000000/job');
    });

    test('should refuse to send without a draft', async () => {
      await registerJob(engine, rawJob);

      const result = await sendOutreachForJob(engine, JOB_ID);

      expect(result.error?.code).toBe('VALIDATION_ERROR');
      expect(result.error?.message).toBe(`No outreach draft saved for job ${JOB_ID}`);
    });

    test('should report the failed address when a send fails', async () => {
      await registerJob(engine, rawJob, draft);
      await discoverRecruitersForJob(engine, JOB_ID);
      await resolveEmailsForJob(engine, JOB_ID);
      mailbox.failSends = true;

      const result = await sendOutreachForJob(engine, JOB_ID);

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('DELIVERY_ERROR');
      expect(result.error?.details).toEqual({ name: 'DeliveryError', address: 'jane.doe@acme.com' });
      expect((await engine.repository.loadContacts(JOB_ID))[0]?.sentAt).toBeNull();
    });

    test('should not write contacts when no verdict changed', async () => {
      await registerJob(engine, rawJob, draft);
      const before = await storage.load(JOB_ID, 'job');

      const result = await reconcileBouncesForJob(engine, JOB_ID);

      expect(result.data).toEqual({ contacts: [], bounceCount: 0, changed: 0 });
      expect(await storage.exists(JOB_ID, 'contacts')).toBe(false);
      expect((await storage.load(JOB_ID, 'job')).content).toBe(before.content);
    });
  });

  test('createOutreachEngine() should wire components from configuration', async () => {
    const storage = new MemoryStorageAdapter();
    const engine = createOutreachEngine(loadConfig({ STORAGE_TYPE: 'memory', MAX_SEND_PER_RUN: '2' }), {
      storage,
      mailbox: new FakeMailbox(),
      logger: silentLogger,
    });

    expect(engine.defaults).toEqual({ maxSendPerRun: 2, bounceLookbackMinutes: 30, bounceWaitSeconds: 120 });
    expect((await registerJob(engine, rawJob)).success).toBe(true);
    expect(storage.keys()).toEqual([`${JOB_ID}/job`]);
  });
});
