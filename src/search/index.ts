/**
 * Search Providers Module
 *
 * Web search backends used by the recruiter cascade and the email resolver.
 * A provider never throws for a failed query: execute() returns a typed
 * failure outcome that the caller uses to fail over to the next backend.
 *
 * Backends:
 * - DuckDuckGo HTML (free, keyless)
 * - Brave Search API (BRAVE_API_KEY)
 * - Tavily API (TAVILY_API_KEY)
 * - Google Custom Search (GOOGLE_CSE_API_KEY + GOOGLE_CSE_CX)
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { SearchConfig } from '../config/index.js';
import { SearchBackendError, toError, type SearchFailureKind } from '../errors/index.js';
import { createLogger, noopMetrics, type Logger, type Metrics, type Observability } from '../observability/index.js';
import type { SearchResult } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export type BackendName = 'duckduckgo' | 'brave' | 'tavily' | 'google_cse';

export interface SearchOptions {
  /** Upper bound on results returned (default: 10) */
  maxResults?: number | undefined;
  /** Restrict results to these domains, where the backend supports it */
  includeDomains?: readonly string[] | undefined;
}

export type SearchOutcome =
  | { success: true; results: SearchResult[] }
  | { success: false; error: SearchBackendError };

export interface SearchProvider {
  readonly name: BackendName;
  execute(query: string, options?: SearchOptions): Promise<SearchOutcome>;
}

export interface ProviderOptions extends Observability {
  /** Pre-built axios instance (tests inject one with an in-process adapter) */
  client?: AxiosInstance | undefined;
  timeoutMs?: number | undefined;
}

const DEFAULT_MAX_RESULTS = 10;
const API_TIMEOUT_MS = 15000;
const DDG_TIMEOUT_MS = 20000;

// ============================================================================
// Failure classification
// ============================================================================

/**
 * Map a thrown request error to a failure kind
 */
export function classifyRequestError(backend: BackendName, error: unknown): SearchBackendError {
  if (axios.isAxiosError(error)) {
    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    return new SearchBackendError(
      backend,
      timedOut ? 'timeout' : 'network',
      timedOut ? `request timed out: ${error.message}` : `network error: ${error.message}`,
      { cause: error }
    );
  }
  return new SearchBackendError(backend, 'network', toError(error).message, { cause: error });
}

/**
 * Map a non-200 status to a failure. Returns null for 200.
 */
export function classifyStatus(
  backend: BackendName,
  status: number,
  known: Readonly<Partial<Record<number, SearchFailureKind>>>
): SearchBackendError | null {
  if (status === 200) {
    return null;
  }
  const kind = known[status];
  if (kind) {
    return new SearchBackendError(backend, kind, `HTTP ${status} (${kind})`, { status });
  }
  return new SearchBackendError(backend, 'network', `unexpected HTTP ${status}`, { status });
}

// ============================================================================
// Base provider
// ============================================================================

/**
 * Shared request / classify / parse flow. Subclasses supply the request,
 * their status table and a response parser.
 */
abstract class HttpSearchProvider implements SearchProvider {
  abstract readonly name: BackendName;
  protected abstract readonly statusFailures: Readonly<Partial<Record<number, SearchFailureKind>>>;

  protected readonly client: AxiosInstance;
  protected readonly logger: Logger;
  protected readonly metrics: Metrics;

  constructor(options: ProviderOptions, defaultTimeoutMs: number) {
    this.client =
      options.client ??
      axios.create({
        timeout: options.timeoutMs ?? defaultTimeoutMs,
        validateStatus: () => true,
      });
    this.logger = options.logger ?? createLogger('search');
    this.metrics = options.metrics ?? noopMetrics;
  }

  protected abstract request(query: string, options: SearchOptions): Promise<AxiosResponse<unknown>>;

  /**
   * Turn a 200 response body into results, or null when the shape is wrong
   */
  protected abstract parse(data: unknown): SearchResult[] | null;

  /**
   * Hook for bodies that are 200 but still a failure (bot challenges)
   */
  protected inspect(_data: unknown): SearchBackendError | null {
    return null;
  }

  async execute(query: string, options: SearchOptions = {}): Promise<SearchOutcome> {
    const startTime = Date.now();
    const tags = { backend: this.name };

    let response: AxiosResponse<unknown>;
    try {
      response = await this.request(query, options);
    } catch (error) {
      return this.fail(classifyRequestError(this.name, error));
    }

    const failure =
      classifyStatus(this.name, response.status, this.statusFailures) ?? this.inspect(response.data);
    if (failure) {
      return this.fail(failure);
    }

    const results = this.parse(response.data);
    if (results === null) {
      return this.fail(
        new SearchBackendError(this.name, 'malformed', 'unexpected response shape', {
          status: response.status,
        })
      );
    }

    this.metrics.recordDuration('search.request.duration', Date.now() - startTime, tags);
    this.metrics.incrementCounter('search.request.success', tags);

    return { success: true, results: results.slice(0, options.maxResults ?? DEFAULT_MAX_RESULTS) };
  }

  private fail(error: SearchBackendError): SearchOutcome {
    this.logger.warn('Search backend failed', {
      backend: this.name,
      kind: error.kind,
      status: error.status,
      error: error.message,
    });
    this.metrics.incrementCounter('search.request.failure', { backend: this.name, kind: error.kind });
    return { success: false, error };
  }
}

// ============================================================================
// DuckDuckGo HTML
// ============================================================================

const DDG_URL = 'https://html.duckduckgo.com/html/';

const USER_AGENTS = [
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:109.0) Gecko/20100101 Firefox/109.0',
] as const;

/**
 * Resolve a DuckDuckGo redirect link (`//duckduckgo.com/l/?uddg=<target>`)
 */
export function decodeDuckDuckGoHref(href: string): string | null {
  try {
    const target = new URL(href, 'https://duckduckgo.com').searchParams.get('uddg');
    if (target) {
      return target;
    }
  } catch {
    return null;
  }
  return /^https?:\/\//i.test(href) ? href : null;
}

/**
 * Extract results from a DuckDuckGo HTML results page
 */
export function parseDuckDuckGoHtml(html: string): SearchResult[] {
  const $ = cheerio.load(html);
  const results: SearchResult[] = [];

  $('a.result__a').each((_, el) => {
    const url = decodeDuckDuckGoHref(($(el).attr('href') ?? '').trim());
    if (!url) {
      return;
    }
    const title = $(el).text().replace(/\s+/g, ' ').trim();
    const snippet = $(el).closest('.result').find('.result__snippet').first().text().replace(/\s+/g, ' ').trim();
    results.push({ url, title, snippet: snippet || null });
  });

  return results;
}

export class DuckDuckGoProvider extends HttpSearchProvider {
  readonly name = 'duckduckgo';
  protected readonly statusFailures = { 202: 'blocked', 429: 'rate_limit' } as const;

  private readonly pickIndex: () => number;

  constructor(options: ProviderOptions & { random?: (() => number) | undefined } = {}) {
    super(options, DDG_TIMEOUT_MS);
    const random = options.random ?? Math.random;
    this.pickIndex = () => Math.floor(random() * USER_AGENTS.length) % USER_AGENTS.length;
  }

  protected request(query: string): Promise<AxiosResponse<unknown>> {
    const form = new URLSearchParams({ q: query, b: '' });
    return this.client.post<unknown>(DDG_URL, form.toString(), {
      responseType: 'text',
      validateStatus: () => true,
      headers: {
        'User-Agent': USER_AGENTS[this.pickIndex()] ?? USER_AGENTS[0],
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
        'Content-Type': 'application/x-www-form-urlencoded',
        Referer: 'https://html.duckduckgo.com/',
      },
    });
  }

  protected override inspect(data: unknown): SearchBackendError | null {
    if (typeof data === 'string' && (data.toLowerCase().includes('anomaly') || data.includes('challenge-form'))) {
      return new SearchBackendError(this.name, 'blocked', 'bot challenge page returned', { status: 200 });
    }
    return null;
  }

  protected parse(data: unknown): SearchResult[] | null {
    return typeof data === 'string' ? parseDuckDuckGoHtml(data) : null;
  }
}

// ============================================================================
// Brave Search API
// ============================================================================

const BRAVE_URL = 'https://api.search.brave.com/res/v1/web/search';

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            url: z.string(),
            title: z.string().default(''),
            description: z.string().optional(),
          })
        )
        .default([]),
    })
    .optional(),
});

export class BraveProvider extends HttpSearchProvider {
  readonly name = 'brave';
  protected readonly statusFailures = { 401: 'auth', 402: 'rate_limit', 429: 'rate_limit' } as const;

  private readonly apiKey: string;

  constructor(config: { apiKey: string }, options: ProviderOptions = {}) {
    super(options, API_TIMEOUT_MS);
    this.apiKey = config.apiKey;
  }

  protected request(query: string, options: SearchOptions): Promise<AxiosResponse<unknown>> {
    return this.client.get<unknown>(BRAVE_URL, {
      params: { q: query, count: String(options.maxResults ?? DEFAULT_MAX_RESULTS) },
      validateStatus: () => true,
      headers: {
        Accept: 'application/json',
        'Accept-Encoding': 'gzip',
        'X-Subscription-Token': this.apiKey,
      },
    });
  }

  protected parse(data: unknown): SearchResult[] | null {
    const parsed = BraveResponseSchema.safeParse(data);
    if (!parsed.success) {
      return null;
    }
    return (parsed.data.web?.results ?? []).map((r) => ({
      url: r.url,
      title: r.title,
      snippet: r.description ?? null,
    }));
  }
}

// ============================================================================
// Tavily API
// ============================================================================

const TAVILY_URL = 'https://api.tavily.com/search';

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        url: z.string(),
        title: z.string().default(''),
        content: z.string().optional(),
      })
    )
    .default([]),
});

export class TavilyProvider extends HttpSearchProvider {
  readonly name = 'tavily';
  protected readonly statusFailures = { 401: 'auth', 429: 'rate_limit', 432: 'rate_limit' } as const;

  private readonly apiKey: string;

  constructor(config: { apiKey: string }, options: ProviderOptions = {}) {
    super(options, API_TIMEOUT_MS);
    this.apiKey = config.apiKey;
  }

  protected request(query: string, options: SearchOptions): Promise<AxiosResponse<unknown>> {
    const payload: Record<string, unknown> = {
      api_key: this.apiKey,
      query,
      search_depth: 'basic',
      max_results: options.maxResults ?? DEFAULT_MAX_RESULTS,
    };
    if (options.includeDomains && options.includeDomains.length > 0) {
      payload.include_domains = [...options.includeDomains];
    }
    return this.client.post<unknown>(TAVILY_URL, payload, {
      validateStatus: () => true,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  protected parse(data: unknown): SearchResult[] | null {
    const parsed = TavilyResponseSchema.safeParse(data);
    if (!parsed.success) {
      return null;
    }
    return parsed.data.results.map((r) => ({
      url: r.url,
      title: r.title,
      snippet: r.content ?? null,
    }));
  }
}

// ============================================================================
// Google Custom Search API
// ============================================================================

const GOOGLE_CSE_URL = 'https://www.googleapis.com/customsearch/v1';

const GoogleCseResponseSchema = z.object({
  items: z
    .array(
      z.object({
        link: z.string(),
        title: z.string().default(''),
        snippet: z.string().optional(),
      })
    )
    .default([]),
});

export class GoogleCseProvider extends HttpSearchProvider {
  readonly name = 'google_cse';
  protected readonly statusFailures = { 400: 'malformed', 403: 'auth', 429: 'rate_limit' } as const;

  private readonly apiKey: string;
  private readonly cx: string;

  constructor(config: { apiKey: string; cx: string }, options: ProviderOptions = {}) {
    super(options, API_TIMEOUT_MS);
    this.apiKey = config.apiKey;
    this.cx = config.cx;
  }

  protected request(query: string, options: SearchOptions): Promise<AxiosResponse<unknown>> {
    // the API caps num at 10
    const num = Math.min(options.maxResults ?? DEFAULT_MAX_RESULTS, 10);
    return this.client.get<unknown>(GOOGLE_CSE_URL, {
      params: { key: this.apiKey, cx: this.cx, q: query, num: String(num) },
      validateStatus: () => true,
    });
  }

  protected parse(data: unknown): SearchResult[] | null {
    const parsed = GoogleCseResponseSchema.safeParse(data);
    if (!parsed.success) {
      return null;
    }
    return parsed.data.items.map((item) => ({
      url: item.link,
      title: item.title,
      snippet: item.snippet ?? null,
    }));
  }
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Recruiter search backends in failover order.
 * DuckDuckGo is always first; keyed backends only when configured.
 */
export function createSearchBackends(config: SearchConfig, options: Observability = {}): SearchProvider[] {
  const backends: SearchProvider[] = [new DuckDuckGoProvider(options)];

  if (config.braveApiKey) {
    backends.push(new BraveProvider({ apiKey: config.braveApiKey }, options));
  }
  if (config.tavilyApiKey) {
    backends.push(new TavilyProvider({ apiKey: config.tavilyApiKey }, options));
  }
  if (config.googleCseApiKey && config.googleCseCx) {
    backends.push(new GoogleCseProvider({ apiKey: config.googleCseApiKey, cx: config.googleCseCx }, options));
  }

  return backends;
}

/**
 * Single general-purpose web search backend for domain and pattern discovery:
 * Tavily, else Brave, else DuckDuckGo
 */
export function createWebSearchProvider(config: SearchConfig, options: Observability = {}): SearchProvider {
  if (config.tavilyApiKey) {
    return new TavilyProvider({ apiKey: config.tavilyApiKey }, options);
  }
  if (config.braveApiKey) {
    return new BraveProvider({ apiKey: config.braveApiKey }, options);
  }
  return new DuckDuckGoProvider(options);
}
