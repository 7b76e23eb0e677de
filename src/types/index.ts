/**
 * Core type definitions for the recruiter outreach engine
 *
 * This module exports all shared types used across the system.
 */

/**
 * Unique identifier for a saved job posting
 * Format: <company_slug>__<title_slug>__YYYYMMDD_HHMMSS
 */
export type JobId = string;

// ============================================================================
// Job Posting
// ============================================================================

/**
 * Job families recognised by the recruiter search.
 * Values are the display labels stored in job records.
 */
export const JOB_FAMILIES = [
  'Software Engineering',
  'Data Science / ML',
  'Data Analytics',
  'Business Analytics',
  'Business Development / Sales',
  'Product Management',
  'Design / UX',
  'DevOps / Infrastructure',
  'Cybersecurity',
  'Marketing',
  'Finance / Accounting',
  'Legal / Compliance',
  'Research',
  'Operations',
  'Policy / Government Affairs',
  'Other',
] as const;

export type JobFamily = (typeof JOB_FAMILIES)[number];

/**
 * Job posting as produced by the (external) extraction step
 */
export interface JobPosting {
  url: string;
  platform: string;
  jobTitle: string;
  company: string;
  jobFamily: JobFamily;
  location: string | null;
  description: string;
  scrapedAt: string;
}

/**
 * Outreach email draft shared by every contact of a job.
 * The body uses "Hi there," as the greeting placeholder.
 */
export interface OutreachDraft {
  subject: string;
  body: string;
  attachmentPath?: string | undefined;
}

// ============================================================================
// Contacts
// ============================================================================

/**
 * Bounce tri-state: null = pending (or never sent), true = bounced,
 * false = no bounce seen inside the lookback window (tentative-delivered)
 */
export type BounceState = boolean | null;

/**
 * Recruiter contact snapshot.
 * Contacts are never mutated in place; see src/contacts for the enrich operations.
 */
export interface Contact {
  readonly name: string;
  readonly title: string | null;
  readonly profileUrl: string | null;
  /** Single address, or comma-joined candidate list when the pattern is unknown */
  readonly email: string | null;
  readonly source: string;
  readonly discoveredAt: string;
  readonly sentAt: string | null;
  readonly sentTo: string | null;
  readonly triedAddresses: readonly string[];
  readonly bounced: BounceState;
}

/**
 * Persisted contact record (snake_case, JSON)
 */
export interface ContactRecord {
  name: string;
  title: string | null;
  linkedin_url: string | null;
  email: string | null;
  source: string;
  found_at: string;
  email_sent_at: string | null;
  email_sent_to: string | null;
  email_tried: string[];
  email_bounced: boolean | null;
}

// ============================================================================
// Search
// ============================================================================

/**
 * A single web search hit, normalised across backends
 */
export interface SearchResult {
  url: string;
  title: string;
  snippet: string | null;
}

// ============================================================================
// Email patterns
// ============================================================================

/**
 * The six canonical local-part templates, in priority order.
 * {f} and {l} are the first letters of the first and last name.
 */
export const CANONICAL_PATTERNS = [
  '{first}.{last}',
  '{f}{last}',
  '{first}{l}',
  '{first}',
  '{f}.{last}',
  '{first}{last}',
] as const;

export type EmailPattern = (typeof CANONICAL_PATTERNS)[number];

export type DomainTier = 'web_search' | 'directory' | 'org_search';
export type PatternTier = 'web_search' | 'directory' | 'combinatorics';

/**
 * Domain and naming pattern resolved for one company (not persisted)
 */
export interface DomainRecord {
  domain: string;
  pattern: EmailPattern | null;
  domainTier: DomainTier;
  patternTier: PatternTier;
}

// ============================================================================
// Storage
// ============================================================================

export type ArtifactType = 'job' | 'draft' | 'contacts';

/**
 * Artifact metadata for storage tracking
 */
export interface ArtifactMetadata {
  jobId: JobId;
  artifactType: ArtifactType;
  fileName: string;
  createdAt: string;
  contentType: string;
  size?: number;
  checksum?: string;
}

/**
 * Storage adapter interface for artifact persistence
 */
export interface StorageAdapter {
  save(jobId: JobId, artifactType: ArtifactType, content: string): Promise<ArtifactMetadata>;
  load(jobId: JobId, artifactType: ArtifactType): Promise<{ content: string; metadata: ArtifactMetadata }>;
  exists(jobId: JobId, artifactType: ArtifactType): Promise<boolean>;
  list(jobId: JobId): Promise<ArtifactMetadata[]>;
  delete(jobId: JobId, artifactType?: ArtifactType): Promise<void>;
}

// ============================================================================
// Module Results
// ============================================================================

/**
 * Module result wrapper for pipeline steps
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    jobId: JobId;
    module: string;
    timestamp: string;
    duration?: number;
  };
}
