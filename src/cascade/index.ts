/**
 * Search Cascade Module
 *
 * Runs the ordered recruiter query list against the ordered backend list.
 *
 * - One backend cursor per call, starting at 0. A failed outcome advances it
 *   for every remaining query; a failed backend is never retried.
 * - Queries run strictly one after another, with a random pause between them.
 * - Results become contacts only for profile URLs with a parseable heading.
 * - Dedup by normalized profile URL, first occurrence wins.
 */

import { createContact } from '../contacts/index.js';
import { ValidationError } from '../errors/index.js';
import { buildQueries, isProfileUrl, normalizeProfileUrl, parseHeading } from '../normalizer/index.js';
import { createLogger, noopMetrics, sleep, type Logger, type Metrics, type Observability } from '../observability/index.js';
import type { SearchProvider } from '../search/index.js';
import type { Contact, JobFamily, SearchResult } from '../types/index.js';

export interface CascadeOptions extends Observability {
  /** Inter-query pause range in milliseconds (default: [4000, 8000]) */
  delayRangeMs?: readonly [number, number] | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  random?: (() => number) | undefined;
  now?: (() => Date) | undefined;
}

/**
 * Results requested per query from each backend
 */
const RESULTS_PER_QUERY = 10;

export class SearchCascadeEngine {
  private readonly backends: readonly SearchProvider[];
  private readonly delayRangeMs: readonly [number, number];
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(backends: readonly SearchProvider[], options: CascadeOptions = {}) {
    this.backends = backends;
    this.delayRangeMs = options.delayRangeMs ?? [4000, 8000];
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('cascade');
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * Find up to maxResults unique recruiter contacts at a company.
   * Exhausting every backend yields what was found so far, never an error.
   *
   * @throws ValidationError for a blank company or maxResults < 1
   */
  async executeQueryCascade(
    company: string,
    jobFamily: JobFamily,
    locationHint: string | null,
    maxResults: number
  ): Promise<Contact[]> {
    const name = company.trim();
    if (!name) {
      throw new ValidationError('company', 'company is empty; cannot search for recruiters');
    }
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new ValidationError('maxResults', 'maxResults must be a positive integer');
    }

    const queries = buildQueries(name, jobFamily, locationHint);
    const contacts: Contact[] = [];
    const seen = new Set<string>();
    let backendIndex = 0;

    for (const [i, query] of queries.entries()) {
      if (contacts.length >= maxResults) {
        break;
      }
      if (backendIndex >= this.backends.length) {
        this.logger.warn('All search backends exhausted', { company: name, queriesRun: i });
        this.metrics.incrementCounter('cascade.backends_exhausted');
        break;
      }

      if (i > 0) {
        const [min, max] = this.delayRangeMs;
        const delay = min + this.random() * (max - min);
        this.logger.debug('Pausing before next query', { delayMs: Math.round(delay) });
        await this.sleep(delay);
      }

      let batch: SearchResult[] = [];
      while (backendIndex < this.backends.length) {
        const backend = this.backends[backendIndex];
        if (!backend) {
          break;
        }

        this.logger.info('Running recruiter query', { query, backend: backend.name, queryNumber: i + 1 });
        const outcome = await backend.execute(query, {
          maxResults: RESULTS_PER_QUERY,
          includeDomains: ['linkedin.com'],
        });

        if (outcome.success) {
          batch = outcome.results;
          this.logger.info('Query returned results', { backend: backend.name, count: batch.length });
          break;
        }

        backendIndex += 1;
        this.logger.warn('Backend failed; advancing cursor', {
          backend: backend.name,
          kind: outcome.error.kind,
          next: this.backends[backendIndex]?.name ?? null,
        });
        this.metrics.incrementCounter('cascade.failover', { from: backend.name, kind: outcome.error.kind });
      }

      const before = contacts.length;
      for (const result of batch) {
        const contact = this.toContact(result, this.backends[backendIndex]?.name ?? 'unknown');
        if (!contact || !contact.profileUrl) {
          continue;
        }
        const key = normalizeProfileUrl(contact.profileUrl);
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
        contacts.push(contact);
      }

      if (batch.length > 0) {
        this.logger.info('New unique recruiters', { added: contacts.length - before, total: contacts.length });
      }
    }

    this.metrics.recordGauge('cascade.contacts_found', contacts.length, { company: name });
    return contacts.slice(0, maxResults);
  }

  private toContact(result: SearchResult, source: string): Contact | null {
    if (!isProfileUrl(result.url)) {
      return null;
    }
    const heading = parseHeading(result.title);
    if (!heading) {
      return null;
    }
    return createContact(
      { name: heading.name, title: heading.title, profileUrl: result.url, source },
      this.now()
    );
  }
}
