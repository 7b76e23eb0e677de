/**
 * Pipeline Module
 *
 * Binds the four operations to persisted jobs.
 *
 * Responsibilities:
 * - Derive a job id from the posting (company, title, scrape time)
 * - Wire components from an OutreachConfig
 * - Run each step against the job's saved artifacts and report a ModuleResult
 *
 * Steps never throw; failures come back as `error.code` from the error taxonomy.
 */

import { BounceDetector, type BounceCheckResult } from '../bounce/index.js';
import { SearchCascadeEngine } from '../cascade/index.js';
import type { OutreachConfig } from '../config/index.js';
import { DeliveryStateMachine } from '../delivery/index.js';
import { createDirectoryClients } from '../directory/index.js';
import { EmailAddressGenerator } from '../email-generator/index.js';
import { DomainPatternResolver } from '../email-resolver/index.js';
import { DeliveryError, OutreachError, ValidationError, toError } from '../errors/index.js';
import { createMailbox, type Mailbox } from '../mailbox/index.js';
import { normalizeJobPosting, normalizeProfileUrl } from '../normalizer/index.js';
import { createLogger, type Logger, type Observability } from '../observability/index.js';
import { createSearchBackends, createWebSearchProvider } from '../search/index.js';
import { OutreachRepository, createStorageAdapter } from '../storage/index.js';
import type { Contact, JobFamily, JobId, JobPosting, ModuleResult, OutreachDraft, StorageAdapter } from '../types/index.js';

// ============================================================================
// Job identity
// ============================================================================

const SLUG_MAX_LENGTH = 40;

/**
 * Filesystem-safe slug: lowercase, word characters only, runs of
 * spaces / hyphens / underscores collapsed to one underscore
 */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\w\s-]/g, '')
    .trim()
    .replace(/[\s_-]+/g, '_')
    .slice(0, SLUG_MAX_LENGTH)
    .replace(/^_+|_+$/g, '');
}

function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Generate a job id from the posting.
 *
 * Format: <company_slug>__<title_slug>__YYYYMMDD_HHMMSS (scrape time, UTC).
 * The same posting scraped at the same second always maps to the same id.
 *
 * @throws ValidationError when scrapedAt is not a date or a slug is empty
 */
export function generateJobId(job: Pick<JobPosting, 'company' | 'jobTitle' | 'scrapedAt'>): JobId {
  const scrapedAt = new Date(job.scrapedAt);
  if (Number.isNaN(scrapedAt.getTime())) {
    throw new ValidationError('scraped_at', `Cannot generate job id: "${job.scrapedAt}" is not a date`);
  }

  const company = slugify(job.company);
  const title = slugify(job.jobTitle);
  if (!company || !title) {
    throw new ValidationError('company', 'Cannot generate job id: company and job title must contain word characters');
  }

  return `${company}__${title}__${formatTimestamp(scrapedAt)}`;
}

// ============================================================================
// Engine
// ============================================================================

export interface OutreachEngineComponents {
  cascade: SearchCascadeEngine;
  generator: EmailAddressGenerator;
  delivery: DeliveryStateMachine;
  bounces: BounceDetector;
  repository: OutreachRepository;
}

export interface OutreachDefaults {
  maxSendPerRun: number;
  bounceLookbackMinutes: number;
  bounceWaitSeconds: number;
}

/**
 * The four exposed operations over explicit contact lists, plus the
 * repository the job-bound steps read and write.
 */
export class OutreachEngine {
  readonly repository: OutreachRepository;
  readonly defaults: OutreachDefaults;
  readonly logger: Logger;
  private readonly components: OutreachEngineComponents;

  constructor(components: OutreachEngineComponents, defaults: Partial<OutreachDefaults> = {}, logger?: Logger) {
    this.components = components;
    this.repository = components.repository;
    this.logger = logger ?? createLogger('pipeline');
    this.defaults = {
      maxSendPerRun: defaults.maxSendPerRun ?? 3,
      bounceLookbackMinutes: defaults.bounceLookbackMinutes ?? 30,
      bounceWaitSeconds: defaults.bounceWaitSeconds ?? 0,
    };
  }

  findRecruiters(
    company: string,
    jobFamily: JobFamily,
    locationHint: string | null,
    maxResults: number
  ): Promise<Contact[]> {
    return this.components.cascade.executeQueryCascade(company, jobFamily, locationHint, maxResults);
  }

  findEmails(company: string, contacts: readonly Contact[]): Promise<Contact[]> {
    return this.components.generator.findEmails(company, contacts);
  }

  sendBatch(
    contacts: readonly Contact[],
    maxSend: number,
    draft: OutreachDraft,
    persist?: (contacts: Contact[]) => Promise<void>
  ): Promise<Contact[]> {
    return this.components.delivery.sendBatch(contacts, maxSend, { draft, persist });
  }

  checkBounces(contacts: readonly Contact[], lookbackMinutes: number): Promise<BounceCheckResult> {
    return this.components.bounces.checkBounces(contacts, lookbackMinutes);
  }

  waitForBounces(seconds: number): Promise<void> {
    return this.components.bounces.waitForBounces(seconds);
  }
}

export interface CreateEngineOptions extends Observability {
  /** Log sends instead of performing them */
  dryRun?: boolean | undefined;
  /** Overrides the adapter built from config.storage */
  storage?: StorageAdapter | undefined;
  /** Overrides the SMTP/IMAP mailbox built from config.mailbox */
  mailbox?: Mailbox | undefined;
}

/**
 * Wire every component from configuration
 */
export function createOutreachEngine(config: OutreachConfig, options: CreateEngineOptions = {}): OutreachEngine {
  const observability: Observability = { logger: options.logger, metrics: options.metrics };
  const mailbox = options.mailbox ?? createMailbox(config.mailbox, { logger: options.logger });
  const { directory, orgSearch } = createDirectoryClients(config.directory, { logger: options.logger });

  const resolver = new DomainPatternResolver(
    { webSearch: createWebSearchProvider(config.search, observability), directory, orgSearch },
    observability
  );

  return new OutreachEngine(
    {
      cascade: new SearchCascadeEngine(createSearchBackends(config.search, observability), {
        ...observability,
        delayRangeMs: config.search.delayRangeMs,
      }),
      generator: new EmailAddressGenerator(resolver, observability),
      delivery: new DeliveryStateMachine(mailbox, {
        ...observability,
        pacingMs: config.delivery.pacingMs,
        senderName: config.mailbox.senderName,
        dryRun: options.dryRun,
      }),
      bounces: new BounceDetector(mailbox, observability),
      repository: new OutreachRepository(options.storage ?? createStorageAdapter(config.storage)),
    },
    config.delivery,
    options.logger
  );
}

// ============================================================================
// Job-bound steps
// ============================================================================

const MODULE = 'pipeline';

function succeed<T>(jobId: JobId, startTime: number, timestamp: string, data: T): ModuleResult<T> {
  return {
    success: true,
    data,
    metadata: { jobId, module: MODULE, timestamp, duration: Date.now() - startTime },
  };
}

function fail<T>(
  logger: Logger,
  jobId: JobId,
  startTime: number,
  timestamp: string,
  step: string,
  error: unknown
): ModuleResult<T> {
  const err = toError(error);
  const code = err instanceof OutreachError ? err.code : 'INTERNAL_ERROR';
  const details: Record<string, unknown> = { name: err.name };
  if (err instanceof DeliveryError) {
    details['address'] = err.address;
  }

  logger.error(`${step} failed`, { jobId, code, message: err.message });

  return {
    success: false,
    error: { code, message: err.message, details },
    metadata: { jobId, module: MODULE, timestamp, duration: Date.now() - startTime },
  };
}

export interface RegisteredJob {
  jobId: JobId;
  job: JobPosting;
}

/**
 * Normalize a raw posting, derive its id and save it (with the draft, when given)
 */
export async function registerJob(
  engine: OutreachEngine,
  rawJob: unknown,
  draft?: OutreachDraft
): Promise<ModuleResult<RegisteredJob>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const normalized = normalizeJobPosting(rawJob);
  if (!normalized.success || !normalized.data) {
    return {
      success: false,
      error: normalized.error ?? { code: 'VALIDATION_ERROR', message: 'Job posting failed validation' },
      metadata: { jobId: '', module: MODULE, timestamp, duration: Date.now() - startTime },
    };
  }

  const job = normalized.data;
  try {
    const jobId = generateJobId(job);
    await engine.repository.saveJob(jobId, job);
    if (draft) {
      await engine.repository.saveDraft(jobId, draft);
    }
    engine.logger.info('Job registered', { jobId, company: job.company, jobFamily: job.jobFamily });
    return succeed(jobId, startTime, timestamp, { jobId, job });
  } catch (error) {
    return fail(engine.logger, '', startTime, timestamp, 'registerJob', error);
  }
}

export interface DiscoveryResult {
  contacts: Contact[];
  /** Contacts not already saved for the job */
  added: number;
}

/**
 * Search for recruiters at the job's company and append new ones to the saved list.
 * Contacts already saved (same normalized profile URL) keep their state.
 */
export async function discoverRecruitersForJob(
  engine: OutreachEngine,
  jobId: JobId,
  options: { maxResults?: number } = {}
): Promise<ModuleResult<DiscoveryResult>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const job = await engine.repository.loadJob(jobId);
    const existing = await engine.repository.loadContacts(jobId);
    const found = await engine.findRecruiters(job.company, job.jobFamily, job.location, options.maxResults ?? 10);

    const known = new Set(
      existing.flatMap((contact) => (contact.profileUrl ? [normalizeProfileUrl(contact.profileUrl)] : []))
    );
    const fresh = found.filter((contact) => !contact.profileUrl || !known.has(normalizeProfileUrl(contact.profileUrl)));
    const contacts = [...existing, ...fresh];

    await engine.repository.saveContacts(jobId, contacts);
    engine.logger.info('Recruiters discovered', { jobId, found: found.length, added: fresh.length, total: contacts.length });

    return succeed(jobId, startTime, timestamp, { contacts, added: fresh.length });
  } catch (error) {
    return fail(engine.logger, jobId, startTime, timestamp, 'discoverRecruitersForJob', error);
  }
}

export interface EmailResolutionResult {
  contacts: Contact[];
  /** Contacts holding at least one address after resolution */
  withEmail: number;
}

export async function resolveEmailsForJob(
  engine: OutreachEngine,
  jobId: JobId
): Promise<ModuleResult<EmailResolutionResult>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const job = await engine.repository.loadJob(jobId);
    const contacts = await engine.findEmails(job.company, await engine.repository.loadContacts(jobId));
    await engine.repository.saveContacts(jobId, contacts);

    const withEmail = contacts.filter((contact) => contact.email).length;
    engine.logger.info('Emails resolved', { jobId, contacts: contacts.length, withEmail });

    return succeed(jobId, startTime, timestamp, { contacts, withEmail });
  } catch (error) {
    return fail(engine.logger, jobId, startTime, timestamp, 'resolveEmailsForJob', error);
  }
}

export interface SendResult {
  contacts: Contact[];
  /** Sends performed in this run */
  sent: number;
}

/**
 * Send the job's draft to the next eligible contacts.
 * The contact list is saved after every send.
 */
export async function sendOutreachForJob(
  engine: OutreachEngine,
  jobId: JobId,
  options: { maxSend?: number } = {}
): Promise<ModuleResult<SendResult>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const draft = await engine.repository.loadDraft(jobId);
    if (!draft) {
      throw new ValidationError('draft', `No outreach draft saved for job ${jobId}`);
    }

    const before = await engine.repository.loadContacts(jobId);
    const contacts = await engine.sendBatch(
      before,
      options.maxSend ?? engine.defaults.maxSendPerRun,
      draft,
      (current) => engine.repository.saveContacts(jobId, current)
    );

    const sent = contacts.reduce(
      (total, contact, i) => total + contact.triedAddresses.length - (before[i]?.triedAddresses.length ?? 0),
      0
    );
    engine.logger.info('Outreach sent', { jobId, sent });

    return succeed(jobId, startTime, timestamp, { contacts, sent });
  } catch (error) {
    return fail(engine.logger, jobId, startTime, timestamp, 'sendOutreachForJob', error);
  }
}

/**
 * Optionally wait, poll once for failure notifications and save verdicts.
 * Nothing is written when no verdict changed.
 */
export async function reconcileBouncesForJob(
  engine: OutreachEngine,
  jobId: JobId,
  options: { waitSeconds?: number; lookbackMinutes?: number } = {}
): Promise<ModuleResult<BounceCheckResult>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const contacts = await engine.repository.loadContacts(jobId);

    const waitSeconds = options.waitSeconds ?? engine.defaults.bounceWaitSeconds;
    if (waitSeconds > 0) {
      await engine.waitForBounces(waitSeconds);
    }

    const result = await engine.checkBounces(
      contacts,
      options.lookbackMinutes ?? engine.defaults.bounceLookbackMinutes
    );
    if (result.changed > 0) {
      await engine.repository.saveContacts(jobId, result.contacts);
    }

    return succeed(jobId, startTime, timestamp, result);
  } catch (error) {
    return fail(engine.logger, jobId, startTime, timestamp, 'reconcileBouncesForJob', error);
  }
}
