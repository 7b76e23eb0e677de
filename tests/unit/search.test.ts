/**
 * Unit tests for the Search Providers module
 *
 * HTTP goes through axios instances whose adapter answers in-process.
 */

import { describe, test, expect } from '@jest/globals';
import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import {
  BraveProvider,
  DuckDuckGoProvider,
  GoogleCseProvider,
  TavilyProvider,
  classifyStatus,
  createSearchBackends,
  createWebSearchProvider,
  decodeDuckDuckGoHref,
  parseDuckDuckGoHtml,
} from '../../src/search/index.js';
import type { SearchConfig } from '../../src/config/index.js';
import type { SearchFailureKind } from '../../src/errors/index.js';
import { silentLogger } from '../../src/observability/index.js';

// =============================================================================
// Test Fixtures
// =============================================================================

interface StubReply {
  status: number;
  data: unknown;
}

function stubClient(reply: StubReply | ((config: InternalAxiosRequestConfig) => StubReply)): {
  client: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const client = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const { status, data } = typeof reply === 'function' ? reply(config) : reply;
      return { data, status, statusText: String(status), headers: {}, config };
    },
  });
  return { client, requests };
}

const DDG_PAGE = `
<html><body>
  <div class="result results_links">
    <h2 class="result__title">
      <a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fwww.linkedin.com%2Fin%2Fjane-doe&rut=abc">Jane Doe - Technical Recruiter at Acme | LinkedIn</a>
    </h2>
    <a class="result__snippet" href="#">Hiring engineers   in Austin.</a>
  </div>
  <div class="result">
    <a class="result__a" href="https://example.com/page">Example
      Page</a>
  </div>
  <div class="result">
    <a class="result__a" href="/relative">Internal link</a>
  </div>
</body></html>`;

const noConfig: SearchConfig = {
  braveApiKey: null,
  tavilyApiKey: null,
  googleCseApiKey: null,
  googleCseCx: null,
  delayRangeMs: [0, 0],
};

// =============================================================================
// Tests
// =============================================================================

describe('Search Providers Module', () => {
  describe('classifyStatus()', () => {
    test('should return null for 200 and map known statuses', () => {
      expect(classifyStatus('brave', 200, { 401: 'auth' })).toBeNull();
      expect(classifyStatus('brave', 401, { 401: 'auth' })?.kind).toBe('auth');
    });

    test('should treat unknown statuses as network failures', () => {
      const error = classifyStatus('brave', 503, { 401: 'auth' });

      expect(error?.kind).toBe('network');
      expect(error?.status).toBe(503);
      expect(error?.message).toBe('brave: unexpected HTTP 503');
    });
  });

  describe('DuckDuckGo HTML', () => {
    test('decodeDuckDuckGoHref() should unwrap redirect links', () => {
      expect(decodeDuckDuckGoHref('//duckduckgo.com/l/?uddg=https%3A%2F%2Facme.com%2Fjobs')).toBe('https://acme.com/jobs');
      expect(decodeDuckDuckGoHref('https://acme.com/about')).toBe('https://acme.com/about');
      expect(decodeDuckDuckGoHref('/settings')).toBeNull();
    });

    test('parseDuckDuckGoHtml() should extract url, title and snippet', () => {
      expect(parseDuckDuckGoHtml(DDG_PAGE)).toEqual([
        {
          url: 'https://www.linkedin.com/in/jane-doe',
          title: 'Jane Doe - Technical Recruiter at Acme | LinkedIn',
          snippet: 'Hiring engineers in Austin.',
        },
        { url: 'https://example.com/page', title: 'Example Page', snippet: null },
      ]);
    });

    test('should POST the query as a form and parse the page', async () => {
      const { client, requests } = stubClient({ status: 200, data: DDG_PAGE });
      const provider = new DuckDuckGoProvider({ client, logger: silentLogger, random: () => 0 });

      const outcome = await provider.execute('site:linkedin.com/in "Acme" "recruiter"');

      expect(outcome.success).toBe(true);
      expect(outcome.success && outcome.results).toHaveLength(2);
      expect(requests[0]?.method).toBe('post');
      expect(requests[0]?.url).toBe('https://html.duckduckgo.com/html/');
      expect(new URLSearchParams(String(requests[0]?.data)).get('q')).toBe('site:linkedin.com/in "Acme" "recruiter"');
    });

    test('should cap results at maxResults', async () => {
      const { client } = stubClient({ status: 200, data: DDG_PAGE });
      const provider = new DuckDuckGoProvider({ client, logger: silentLogger });

      const outcome = await provider.execute('acme', { maxResults: 1 });

      expect(outcome.success && outcome.results.map((r) => r.url)).toEqual(['https://www.linkedin.com/in/jane-doe']);
    });

    test('should report 202 as blocked', async () => {
      const { client } = stubClient({ status: 202, data: '' });
      const provider = new DuckDuckGoProvider({ client, logger: silentLogger });

      const outcome = await provider.execute('acme');

      expect(outcome.success).toBe(false);
      expect(!outcome.success && outcome.error.kind).toBe('blocked');
    });

    test('should report a challenge page as blocked', async () => {
      const { client } = stubClient({ status: 200, data: '<html>Unfortunately, bots use DuckDuckGo too. Anomaly detected.</html>' });
      const provider = new DuckDuckGoProvider({ client, logger: silentLogger });

      const outcome = await provider.execute('acme');

      expect(!outcome.success && outcome.error.kind).toBe('blocked');
    });
  });

  describe('BraveProvider', () => {
    test('should send the subscription token and map results', async () => {
      const { client, requests } = stubClient({
        status: 200,
        data: {
          web: {
            results: [
              { url: 'https://www.linkedin.com/in/jane-doe', title: 'Jane Doe - Recruiter', description: 'Acme' },
              { url: 'https://acme.com', title: 'Acme' },
            ],
          },
        },
      });
      const provider = new BraveProvider({ apiKey: 'test-brave-key' }, { client, logger: silentLogger });

      const outcome = await provider.execute('acme recruiter', { maxResults: 5 });

      expect(outcome.success && outcome.results).toEqual([
        { url: 'https://www.linkedin.com/in/jane-doe', title: 'Jane Doe - Recruiter', snippet: 'Acme' },
        { url: 'https://acme.com', title: 'Acme', snippet: null },
      ]);
      expect(requests[0]?.headers['X-Subscription-Token']).toBe('test-brave-key');
      expect(requests[0]?.params).toEqual({ q: 'acme recruiter', count: '5' });
    });

    const statusCases: Array<[number, SearchFailureKind]> = [
      [401, 'auth'],
      [402, 'rate_limit'],
      [429, 'rate_limit'],
      [500, 'network'],
    ];

    test.each(statusCases)('should classify HTTP %i as %s', async (status, kind) => {
      const { client } = stubClient({ status, data: {} });
      const provider = new BraveProvider({ apiKey: 'test-brave-key' }, { client, logger: silentLogger });

      const outcome = await provider.execute('acme');

      expect(!outcome.success && outcome.error.kind).toBe(kind);
    });

    test('should report an unexpected body as malformed', async () => {
      const { client } = stubClient({ status: 200, data: { web: { results: 'nope' } } });
      const provider = new BraveProvider({ apiKey: 'test-brave-key' }, { client, logger: silentLogger });

      const outcome = await provider.execute('acme');

      expect(!outcome.success && outcome.error.kind).toBe('malformed');
    });

    test('should report timeouts and network errors', async () => {
      const timeout = stubClient(() => {
        throw new AxiosError('timeout of 15000ms exceeded', 'ECONNABORTED');
      });
      const refused = stubClient(() => {
        throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
      });

      const timedOut = await new BraveProvider({ apiKey: 'k' }, { client: timeout.client, logger: silentLogger }).execute('a');
      const failed = await new BraveProvider({ apiKey: 'k' }, { client: refused.client, logger: silentLogger }).execute('a');

      expect(!timedOut.success && timedOut.error.kind).toBe('timeout');
      expect(!failed.success && failed.error.kind).toBe('network');
    });
  });

  describe('TavilyProvider', () => {
    test('should post the key, query and domain filter', async () => {
      const { client, requests } = stubClient({
        status: 200,
        data: { results: [{ url: 'https://www.linkedin.com/in/jane-doe', title: 'Jane Doe', content: 'Recruiter' }] },
      });
      const provider = new TavilyProvider({ apiKey: 'test-tavily-key' }, { client, logger: silentLogger });

      const outcome = await provider.execute('acme recruiter', { maxResults: 3, includeDomains: ['linkedin.com'] });

      expect(outcome.success && outcome.results).toEqual([
        { url: 'https://www.linkedin.com/in/jane-doe', title: 'Jane Doe', snippet: 'Recruiter' },
      ]);
      expect(JSON.parse(String(requests[0]?.data))).toEqual({
        api_key: 'test-tavily-key',
        query: 'acme recruiter',
        search_depth: 'basic',
        max_results: 3,
        include_domains: ['linkedin.com'],
      });
    });

    test('should treat 432 as an exhausted quota', async () => {
      const { client } = stubClient({ status: 432, data: {} });
      const provider = new TavilyProvider({ apiKey: 'test-tavily-key' }, { client, logger: silentLogger });

      const outcome = await provider.execute('acme');

      expect(!outcome.success && outcome.error.kind).toBe('rate_limit');
    });
  });

  describe('GoogleCseProvider', () => {
    test('should cap num at 10 and map items', async () => {
      const { client, requests } = stubClient({
        status: 200,
        data: { items: [{ link: 'https://www.linkedin.com/in/jane-doe', title: 'Jane Doe', snippet: 'Recruiter' }] },
      });
      const provider = new GoogleCseProvider({ apiKey: 'test-google-key', cx: 'test-cx' }, { client, logger: silentLogger });

      const outcome = await provider.execute('acme', { maxResults: 25 });

      expect(outcome.success && outcome.results[0]?.url).toBe('https://www.linkedin.com/in/jane-doe');
      expect(requests[0]?.params).toEqual({ key: 'test-google-key', cx: 'test-cx', q: 'acme', num: '10' });
    });

    test('should treat a response without items as no results', async () => {
      const { client } = stubClient({ status: 200, data: { kind: 'customsearch#search' } });
      const provider = new GoogleCseProvider({ apiKey: 'k', cx: 'c' }, { client, logger: silentLogger });

      const outcome = await provider.execute('acme');

      expect(outcome).toEqual({ success: true, results: [] });
    });

    test('should classify 403 as auth', async () => {
      const { client } = stubClient({ status: 403, data: {} });
      const provider = new GoogleCseProvider({ apiKey: 'k', cx: 'c' }, { client, logger: silentLogger });

      const outcome = await provider.execute('acme');

      expect(!outcome.success && outcome.error.kind).toBe('auth');
    });
  });

  describe('factories', () => {
    test('createSearchBackends() should start with DuckDuckGo and add configured backends', () => {
      expect(createSearchBackends(noConfig, { logger: silentLogger }).map((b) => b.name)).toEqual(['duckduckgo']);

      const all = createSearchBackends(
        {
          ...noConfig,
          braveApiKey: 'test-brave-key',
          tavilyApiKey: 'test-tavily-key',
          googleCseApiKey: 'test-google-key',
          googleCseCx: 'test-cx',
        },
        { logger: silentLogger }
      );
      expect(all.map((b) => b.name)).toEqual(['duckduckgo', 'brave', 'tavily', 'google_cse']);
    });

    test('createSearchBackends() should skip Google without a cx', () => {
      const backends = createSearchBackends({ ...noConfig, googleCseApiKey: 'test-google-key' }, { logger: silentLogger });

      expect(backends.map((b) => b.name)).toEqual(['duckduckgo']);
    });

    test('createWebSearchProvider() should prefer Tavily, then Brave, then DuckDuckGo', () => {
      const both = { ...noConfig, braveApiKey: 'b', tavilyApiKey: 't' };

      expect(createWebSearchProvider(both, { logger: silentLogger }).name).toBe('tavily');
      expect(createWebSearchProvider({ ...noConfig, braveApiKey: 'b' }, { logger: silentLogger }).name).toBe('brave');
      expect(createWebSearchProvider(noConfig, { logger: silentLogger }).name).toBe('duckduckgo');
    });
  });
});
