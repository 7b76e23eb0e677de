/**
 * Email Generator Module
 *
 * Turns a display name plus a resolved domain record into an address, or into
 * the ordered comma-joined candidate list when the pattern is unknown.
 */

import { withEmail } from '../contacts/index.js';
import { DomainResolutionFailure } from '../errors/index.js';
import { createLogger, noopMetrics, type Logger, type Metrics, type Observability } from '../observability/index.js';
import { CANONICAL_PATTERNS } from '../types/index.js';
import type { Contact, DomainRecord, EmailPattern } from '../types/index.js';

/**
 * Credentials appended after a comma: "Julius Harris, SHRM", "Jane Doe, CP"
 */
const CREDENTIAL_SUFFIX = /,\s*[A-Z][\w\-.]+(?:\s+[A-Z][\w\-.]+)*$/;

export interface NameParts {
  first: string;
  last: string;
}

/**
 * Lowercase, strip diacritics, keep ASCII letters only.
 *
 *   "Héléne" → "helene", "O'Brien" → "obrien", "Müller" → "muller"
 */
export function normalizeNameToken(token: string): string {
  return token
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[^a-z]/g, '');
}

/**
 * Split a display name into normalized (first, last).
 * Single-letter middle initials are skipped when picking the last name.
 *
 * @returns null when fewer than two usable tokens remain
 */
export function parseName(fullName: string): NameParts | null {
  const cleaned = fullName.replace(CREDENTIAL_SUFFIX, '').trim();
  const words = cleaned.split(/\s+/).filter(Boolean);
  if (words.length < 2) {
    return null;
  }

  const lastWord = words.slice(1).find((word) => word.replace(/\.+$/, '').length > 1);
  if (!lastWord) {
    return null;
  }

  const first = normalizeNameToken(words[0] ?? '');
  const last = normalizeNameToken(lastWord);
  if (!first || !last) {
    return null;
  }

  return { first, last };
}

/**
 * Fill a pattern's placeholders and append the domain
 */
export function applyPattern(pattern: EmailPattern, name: NameParts, domain: string): string {
  const local = pattern
    .replace('{first}', name.first)
    .replace('{last}', name.last)
    .replace('{f}', name.first.charAt(0))
    .replace('{l}', name.last.charAt(0));
  return `${local}@${domain}`;
}

/**
 * One address for a known pattern, otherwise every canonical candidate in
 * priority order, comma-joined. Candidates that coincide (one-letter first
 * names) appear once.
 */
export function generateFromParts(name: NameParts, domain: string, pattern: EmailPattern | null): string {
  if (pattern) {
    return applyPattern(pattern, name, domain);
  }
  const candidates = CANONICAL_PATTERNS.map((p) => applyPattern(p, name, domain));
  return [...new Set(candidates)].join(',');
}

export function generate(fullName: string, domain: string, pattern: EmailPattern | null): string | null {
  const name = parseName(fullName);
  return name ? generateFromParts(name, domain, pattern) : null;
}

// ============================================================================
// findEmails
// ============================================================================

/**
 * Anything that can resolve a company to a domain record
 */
export interface DomainRecordSource {
  resolve(company: string): Promise<DomainRecord>;
}

export class EmailAddressGenerator {
  private readonly resolver: DomainRecordSource;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(resolver: DomainRecordSource, options: Observability = {}) {
    this.resolver = resolver;
    this.logger = options.logger ?? createLogger('email-generator');
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * Resolve the company's domain record once and attach addresses to every
   * contact that has none. Contacts come back unchanged when no domain is found.
   */
  async findEmails(company: string, contacts: readonly Contact[]): Promise<Contact[]> {
    if (contacts.every((contact) => contact.email)) {
      return [...contacts];
    }

    let record: DomainRecord;
    try {
      record = await this.resolver.resolve(company);
    } catch (error) {
      if (error instanceof DomainResolutionFailure) {
        this.logger.warn('Skipping email generation', { company: error.company, reason: error.message });
        this.metrics.incrementCounter('generator.skipped', { reason: 'domain_not_found' });
        return [...contacts];
      }
      throw error;
    }

    this.logger.info('Generating addresses', {
      company,
      domain: record.domain,
      pattern: record.pattern ?? 'combinatorics',
      domainTier: record.domainTier,
      patternTier: record.patternTier,
    });

    return contacts.map((contact) => {
      if (contact.email) {
        return contact;
      }
      const email = generate(contact.name, record.domain, record.pattern);
      if (!email) {
        this.logger.debug('Name not parseable; no address generated', { name: contact.name });
        this.metrics.incrementCounter('generator.unparseable_name');
        return contact;
      }
      this.metrics.incrementCounter('generator.generated');
      return withEmail(contact, email);
    });
  }
}
