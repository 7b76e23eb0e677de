/**
 * Directory Module
 *
 * Company directory clients used as fallback tiers by the email resolver.
 * - HunterDirectoryLookup: domain-search by company name or by domain
 * - ApolloOrgSearch: organization search by name → primary domain
 *
 * Both are soft: any failure (HTTP, timeout, bad payload) is logged and
 * reported as an empty answer.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { DirectoryConfig } from '../config/index.js';
import { toError } from '../errors/index.js';
import { createLogger, type Logger } from '../observability/index.js';

export interface DirectoryCompanyInfo {
  domain?: string | undefined;
  pattern?: string | undefined;
}

export interface DirectoryLookup {
  readonly name: string;
  byCompany(company: string): Promise<DirectoryCompanyInfo>;
  byDomain(domain: string): Promise<{ pattern?: string | undefined }>;
}

export interface OrgSearch {
  readonly name: string;
  byCompany(company: string): Promise<{ domain?: string | undefined }>;
}

export interface DirectoryClientOptions {
  client?: AxiosInstance | undefined;
  logger?: Logger | undefined;
}

// ============================================================================
// Hunter.io
// ============================================================================

const HUNTER_DOMAIN_SEARCH = 'https://api.hunter.io/v2/domain-search';

const HunterResponseSchema = z.object({
  data: z
    .object({
      domain: z.string().nullable().optional(),
      pattern: z.string().nullable().optional(),
    })
    .optional(),
});

export class HunterDirectoryLookup implements DirectoryLookup {
  readonly name = 'hunter';
  private readonly apiKey: string;
  private readonly client: AxiosInstance;
  private readonly logger: Logger;

  constructor(config: { apiKey: string; timeout?: number }, options: DirectoryClientOptions = {}) {
    this.apiKey = config.apiKey;
    this.client = options.client ?? axios.create({ timeout: config.timeout ?? 10000 });
    this.logger = options.logger ?? createLogger('directory');
  }

  async byCompany(company: string): Promise<DirectoryCompanyInfo> {
    const data = await this.domainSearch({ company });
    const info: DirectoryCompanyInfo = {};
    if (data?.domain) info.domain = data.domain;
    if (data?.pattern) info.pattern = data.pattern;
    return info;
  }

  async byDomain(domain: string): Promise<{ pattern?: string | undefined }> {
    const data = await this.domainSearch({ domain });
    return data?.pattern ? { pattern: data.pattern } : {};
  }

  private async domainSearch(
    query: { company: string } | { domain: string }
  ): Promise<{ domain?: string | null | undefined; pattern?: string | null | undefined } | null> {
    try {
      const response = await this.client.get<unknown>(HUNTER_DOMAIN_SEARCH, {
        params: { ...query, api_key: this.apiKey },
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        this.logger.warn('Hunter domain-search returned non-200', { status: response.status, ...query });
        return null;
      }

      const parsed = HunterResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        this.logger.warn('Hunter domain-search returned an unexpected payload', { ...query });
        return null;
      }
      return parsed.data.data ?? null;
    } catch (error) {
      this.logger.warn('Hunter domain-search failed', { ...query, error: toError(error).message });
      return null;
    }
  }
}

// ============================================================================
// Apollo.io
// ============================================================================

const APOLLO_ORG_SEARCH = 'https://api.apollo.io/v1/organizations/search';

const ApolloResponseSchema = z.object({
  organizations: z
    .array(z.object({ primary_domain: z.string().nullable().optional() }))
    .default([]),
});

export class ApolloOrgSearch implements OrgSearch {
  readonly name = 'apollo';
  private readonly apiKey: string;
  private readonly client: AxiosInstance;
  private readonly logger: Logger;

  constructor(config: { apiKey: string; timeout?: number }, options: DirectoryClientOptions = {}) {
    this.apiKey = config.apiKey;
    this.client = options.client ?? axios.create({ timeout: config.timeout ?? 12000 });
    this.logger = options.logger ?? createLogger('directory');
  }

  async byCompany(company: string): Promise<{ domain?: string | undefined }> {
    try {
      const response = await this.client.post<unknown>(
        APOLLO_ORG_SEARCH,
        { q_organization_name: company, page: 1, per_page: 1 },
        {
          validateStatus: () => true,
          headers: {
            'Content-Type': 'application/json',
            'Cache-Control': 'no-cache',
            'X-Api-Key': this.apiKey,
          },
        }
      );

      if (response.status !== 200) {
        this.logger.warn('Apollo organization search returned non-200', { status: response.status, company });
        return {};
      }

      const parsed = ApolloResponseSchema.safeParse(response.data);
      const domain = parsed.success ? parsed.data.organizations[0]?.primary_domain : null;
      return domain ? { domain } : {};
    } catch (error) {
      this.logger.warn('Apollo organization search failed', { company, error: toError(error).message });
      return {};
    }
  }
}

// ============================================================================
// Null implementations
// ============================================================================

/**
 * Used when no directory key is configured
 */
export class NullDirectoryLookup implements DirectoryLookup {
  readonly name = 'null';

  async byCompany(_company: string): Promise<DirectoryCompanyInfo> {
    return {};
  }

  async byDomain(_domain: string): Promise<{ pattern?: string | undefined }> {
    return {};
  }
}

export class NullOrgSearch implements OrgSearch {
  readonly name = 'null';

  async byCompany(_company: string): Promise<{ domain?: string | undefined }> {
    return {};
  }
}

/**
 * Build directory clients from configuration
 */
export function createDirectoryClients(
  config: DirectoryConfig,
  options: DirectoryClientOptions = {}
): { directory: DirectoryLookup; orgSearch: OrgSearch } {
  return {
    directory: config.hunterApiKey
      ? new HunterDirectoryLookup({ apiKey: config.hunterApiKey }, options)
      : new NullDirectoryLookup(),
    orgSearch: config.apolloApiKey
      ? new ApolloOrgSearch({ apiKey: config.apolloApiKey }, options)
      : new NullOrgSearch(),
  };
}
