/**
 * Email Resolver Module
 *
 * Finds a company's email domain and local-part naming pattern.
 *
 * Domain tiers (first success wins):
 *   1. web search vote over result root domains, ATS hosts excluded
 *   2. directory lookup by company name
 *   3. organization search primary domain
 *
 * Pattern tiers:
 *   1. web search for literal "@domain" addresses, inference vote over local-parts
 *   2. directory lookup by domain (canonical patterns only)
 *   3. none; the generator falls back to combinatorics
 *
 * Every tier failure is soft: logged, then the next tier runs.
 */

import type { DirectoryLookup, OrgSearch } from '../directory/index.js';
import { DomainResolutionFailure, ValidationError } from '../errors/index.js';
import { createLogger, noopMetrics, type Logger, type Metrics, type Observability } from '../observability/index.js';
import type { SearchProvider } from '../search/index.js';
import { CANONICAL_PATTERNS } from '../types/index.js';
import type { DomainRecord, DomainTier, EmailPattern, PatternTier, SearchResult } from '../types/index.js';

/**
 * Job-board and applicant-tracking hosts; never a company's own mail domain
 */
export const ATS_DOMAINS: readonly string[] = [
  'greenhouse.io',
  'lever.co',
  'workday.com',
  'myworkdayjobs.com',
  'linkedin.com',
  'indeed.com',
  'glassdoor.com',
  'ziprecruiter.com',
  'smartrecruiters.com',
  'icims.com',
  'taleo.net',
  'ashbyhq.com',
];

// ============================================================================
// Pure helpers
// ============================================================================

/**
 * Registrable root of a URL's host: `www.` stripped, last two labels kept.
 *
 *   https://www.homedepot.com/about        → homedepot.com
 *   https://careers.example.com/jobs/123   → example.com
 */
export function extractRootDomain(url: string): string | null {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
  const labels = hostname.replace(/^www\./, '').split('.').filter(Boolean);
  if (labels.length === 0) {
    return null;
  }
  return labels.slice(-2).join('.');
}

export function isAtsDomain(domain: string): boolean {
  return ATS_DOMAINS.some((ats) => domain === ats || domain.endsWith(`.${ats}`));
}

export function isCanonicalPattern(value: string): value is EmailPattern {
  return CANONICAL_PATTERNS.some((pattern) => pattern === value);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * All local-parts addressed at `domain` in the given text, in order of appearance
 */
export function mineLocalParts(text: string, domain: string): string[] {
  const pattern = new RegExp(
    `\\b([a-z][a-z0-9]*(?:[.\\-][a-z][a-z0-9]*)*)@${escapeRegExp(domain)}\\b`,
    'gi'
  );
  return Array.from(text.matchAll(pattern), (match) => match[1] ?? '').filter(Boolean);
}

/**
 * Vote for a naming pattern from the structure of observed local-parts.
 *
 * With a separator (`.` or `-`), split at the first one: a single-letter
 * first token votes {f}.{last}, anything longer votes {first}.{last}.
 * Without one: up to five characters votes {f}{last}, longer votes {first}{last}.
 * Ties go to the earlier canonical pattern.
 */
export function inferPattern(localParts: readonly string[]): EmailPattern | null {
  const votes = new Map<EmailPattern, number>();

  for (const raw of localParts) {
    const local = raw.toLowerCase();
    if (!local) {
      continue;
    }

    let vote: EmailPattern;
    const separator = local.search(/[.-]/);
    if (separator >= 0) {
      vote = separator === 1 ? '{f}.{last}' : '{first}.{last}';
    } else {
      vote = local.length <= 5 ? '{f}{last}' : '{first}{last}';
    }
    votes.set(vote, (votes.get(vote) ?? 0) + 1);
  }

  let best: EmailPattern | null = null;
  let bestCount = 0;
  for (const pattern of CANONICAL_PATTERNS) {
    const count = votes.get(pattern) ?? 0;
    if (count > bestCount) {
      best = pattern;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Most frequent root domain across result URLs, ATS hosts excluded.
 * Ties go to the first-seen domain.
 */
export function voteDomain(results: readonly SearchResult[]): string | null {
  const votes = new Map<string, number>();
  for (const result of results) {
    const domain = extractRootDomain(result.url);
    if (domain && !isAtsDomain(domain)) {
      votes.set(domain, (votes.get(domain) ?? 0) + 1);
    }
  }

  let best: string | null = null;
  let bestCount = 0;
  // Map iteration follows insertion (first-seen) order
  for (const [domain, count] of votes) {
    if (count > bestCount) {
      best = domain;
      bestCount = count;
    }
  }
  return best;
}

// ============================================================================
// Resolver
// ============================================================================

export interface ResolverOptions extends Observability {
  /** Results requested from the domain discovery query (default: 8) */
  domainResults?: number | undefined;
  /** Results requested from the pattern discovery query (default: 10) */
  patternResults?: number | undefined;
}

export interface DomainDiscovery {
  domain: string;
  tier: DomainTier;
}

export interface PatternDiscovery {
  pattern: EmailPattern | null;
  tier: PatternTier;
}

export class DomainPatternResolver {
  private readonly webSearch: SearchProvider;
  private readonly directory: DirectoryLookup;
  private readonly orgSearch: OrgSearch;
  private readonly domainResults: number;
  private readonly patternResults: number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(
    deps: { webSearch: SearchProvider; directory: DirectoryLookup; orgSearch: OrgSearch },
    options: ResolverOptions = {}
  ) {
    this.webSearch = deps.webSearch;
    this.directory = deps.directory;
    this.orgSearch = deps.orgSearch;
    this.domainResults = options.domainResults ?? 8;
    this.patternResults = options.patternResults ?? 10;
    this.logger = options.logger ?? createLogger('email-resolver');
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * @throws ValidationError for a blank company
   */
  async discoverDomain(company: string): Promise<DomainDiscovery | null> {
    const name = requireCompany(company);

    const outcome = await this.webSearch.execute(`${name} careers jobs email contact`, {
      maxResults: this.domainResults,
    });
    if (outcome.success) {
      const voted = voteDomain(outcome.results);
      if (voted) {
        return this.domainFound(name, voted, 'web_search');
      }
      this.logger.debug('Web search produced no usable domain', { company: name, results: outcome.results.length });
    } else {
      this.logger.warn('Domain web search failed', { company: name, error: outcome.error.message });
    }

    const directoryInfo = await this.directory.byCompany(name);
    if (directoryInfo.domain) {
      return this.domainFound(name, directoryInfo.domain.toLowerCase(), 'directory');
    }

    const org = await this.orgSearch.byCompany(name);
    if (org.domain) {
      return this.domainFound(name, org.domain.toLowerCase(), 'org_search');
    }

    this.logger.warn('No email domain found', { company: name });
    this.metrics.incrementCounter('resolver.domain.not_found');
    return null;
  }

  /**
   * @throws ValidationError for a blank company
   */
  async discoverPattern(domain: string, company: string): Promise<PatternDiscovery> {
    const name = requireCompany(company);

    const outcome = await this.webSearch.execute(`"@${domain}" email contact`, {
      maxResults: this.patternResults,
    });
    if (outcome.success) {
      const localParts = outcome.results.flatMap((result) =>
        [result.title, result.snippet ?? '', result.url].flatMap((field) => mineLocalParts(field, domain))
      );
      const inferred = inferPattern(localParts);
      if (inferred) {
        this.logger.info('Pattern inferred from public addresses', {
          domain,
          pattern: inferred,
          samples: localParts.length,
        });
        return this.patternFound(inferred, 'web_search');
      }
    } else {
      this.logger.warn('Pattern web search failed', { domain, error: outcome.error.message });
    }

    const info = await this.directory.byDomain(domain);
    if (info.pattern) {
      if (isCanonicalPattern(info.pattern)) {
        return this.patternFound(info.pattern, 'directory');
      }
      this.logger.debug('Ignoring non-canonical directory pattern', { domain, pattern: info.pattern });
    }

    this.logger.info('Pattern unknown; falling back to combinatorics', { domain, company: name });
    return this.patternFound(null, 'combinatorics');
  }

  /**
   * Domain then pattern for one company
   *
   * @throws DomainResolutionFailure when no domain tier succeeds
   */
  async resolve(company: string): Promise<DomainRecord> {
    const domain = await this.discoverDomain(company);
    if (!domain) {
      throw new DomainResolutionFailure(company.trim());
    }
    const pattern = await this.discoverPattern(domain.domain, company);
    return {
      domain: domain.domain,
      pattern: pattern.pattern,
      domainTier: domain.tier,
      patternTier: pattern.tier,
    };
  }

  private domainFound(company: string, domain: string, tier: DomainTier): DomainDiscovery {
    this.logger.info('Email domain found', { company, domain, tier });
    this.metrics.incrementCounter('resolver.domain.found', { tier });
    return { domain, tier };
  }

  private patternFound(pattern: EmailPattern | null, tier: PatternTier): PatternDiscovery {
    this.metrics.incrementCounter('resolver.pattern.resolved', { tier });
    return { pattern, tier };
  }
}

function requireCompany(company: string): string {
  const name = company.trim();
  if (!name) {
    throw new ValidationError('company', 'company is empty; cannot resolve an email domain');
  }
  return name;
}
