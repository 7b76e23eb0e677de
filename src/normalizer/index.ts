/**
 * Normalizer Module
 *
 * Responsibilities:
 * - Parse search result headings into (name, title)
 * - Normalize profile URLs for deduplication
 * - Extract a city from a free-form job location
 * - Build the ordered recruiter query list for a job family
 * - Canonicalize raw job payloads into a JobPosting
 *
 * Everything here is pure; no I/O.
 */

import { z } from 'zod';
import locations from '../data/locations.json';
import { JOB_FAMILIES } from '../types/index.js';
import type { JobFamily, JobPosting, ModuleResult } from '../types/index.js';

/**
 * Location parts that are never a city
 */
const NON_CITY_PARTS: ReadonlySet<string> = new Set([
  ...locations.countries,
  ...locations.states,
  ...locations.abbreviations,
]);

/**
 * Two recruiter search terms per job family, most specific first
 */
export const JOB_FAMILY_TERMS: Record<JobFamily, readonly [string, string]> = {
  'Software Engineering': ['technical recruiter', 'engineering recruiter'],
  'Data Science / ML': ['technical recruiter', 'machine learning recruiter'],
  'Data Analytics': ['technical recruiter', 'data recruiter'],
  'Business Analytics': ['talent acquisition', 'recruiter'],
  'Business Development / Sales': ['sales recruiter', 'talent acquisition'],
  'Product Management': ['technical recruiter', 'product recruiter'],
  'Design / UX': ['design recruiter', 'creative recruiter'],
  'DevOps / Infrastructure': ['technical recruiter', 'infrastructure recruiter'],
  Cybersecurity: ['security recruiter', 'technical recruiter'],
  Marketing: ['marketing recruiter', 'talent acquisition'],
  'Finance / Accounting': ['finance recruiter', 'talent acquisition'],
  'Legal / Compliance': ['legal recruiter', 'talent acquisition'],
  Research: ['research recruiter', 'technical recruiter'],
  Operations: ['operations recruiter', 'talent acquisition'],
  'Policy / Government Affairs': ['recruiter', 'talent acquisition'],
  Other: ['recruiter', 'talent acquisition'],
};

/**
 * Trim whitespace; empty becomes null
 */
export function trimString(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

// ============================================================================
// Headings
// ============================================================================

const PLATFORM_SUFFIX = /\s*[|–-]\s*LinkedIn\s*$/i;
const HEADING_SPLIT = /^(.+?)\s*[-–|•]\s*(.+)$/;

export interface ParsedHeading {
  name: string;
  title: string | null;
}

/**
 * Parse a profile search heading.
 *
 * Typical inputs:
 *   "Jane Doe - Technical Recruiter at Acme | LinkedIn"
 *   "John Smith – Talent Acquisition | LinkedIn"
 *   "Alice Brown • Senior Recruiter at Company"
 *
 * @returns null when no plausible name precedes a separator
 */
export function parseHeading(text: string): ParsedHeading | null {
  const stripped = text.replace(PLATFORM_SUFFIX, '').trim();
  const match = HEADING_SPLIT.exec(stripped);
  if (!match) {
    return null;
  }

  const name = (match[1] ?? '').trim();
  const title = trimString(match[2]);

  if (name.length < 2 || name.length > 60 || /\d/.test(name)) {
    return null;
  }

  return { name, title };
}

// ============================================================================
// Profile URLs
// ============================================================================

/**
 * Dedup key for a profile URL: lowercased, trailing slashes stripped
 */
export function normalizeProfileUrl(url: string): string {
  return url.trim().toLowerCase().replace(/\/+$/, '');
}

export function isProfileUrl(url: string): boolean {
  return url.toLowerCase().includes('linkedin.com/in/');
}

// ============================================================================
// Locations and queries
// ============================================================================

/**
 * Pick the city out of a location string.
 *
 *   "Orlando, FL, USA"  → "Orlando"
 *   "China, Shanghai"   → "Shanghai"
 *   "Washington, D.C."  → "Washington"
 */
export function extractCity(location: string | null | undefined): string | null {
  const trimmed = trimString(location);
  if (!trimmed) {
    return null;
  }

  const parts = trimmed.split(',').map((part) => part.trim());
  const city = parts.find((part) => part.length > 1 && !NON_CITY_PARTS.has(part.toLowerCase()));

  return city ?? trimString(parts[0]);
}

/**
 * Ordered query list: per term, the city-qualified query first (when a city
 * is known), then the unqualified one.
 */
export function buildQueries(
  company: string,
  jobFamily: JobFamily,
  locationHint: string | null | undefined
): string[] {
  const city = extractCity(locationHint);
  const queries: string[] = [];

  for (const term of JOB_FAMILY_TERMS[jobFamily]) {
    const base = `site:linkedin.com/in "${company}" "${term}"`;
    if (city) {
      queries.push(`${base} "${city}"`);
    }
    queries.push(base);
  }

  return queries;
}

// ============================================================================
// Job postings
// ============================================================================

const RawJobSchema = z.object({
  url: z.string().url(),
  platform: z.string().optional(),
  job_title: z.string().min(1),
  company: z.string().min(1),
  job_family: z.string().optional(),
  location: z.string().nullable().optional(),
  description: z.string().optional(),
  scraped_at: z
    .string()
    .refine((val) => !isNaN(Date.parse(val)), { message: 'scraped_at must be a valid ISO-8601 timestamp' })
    .optional(),
});

function toJobFamily(value: string | null): JobFamily {
  const match = JOB_FAMILIES.find((family) => family.toLowerCase() === value?.toLowerCase());
  return match ?? 'Other';
}

/**
 * Canonicalize a raw job payload (snake_case, as produced by the extraction step)
 *
 * Unknown job families fall back to "Other".
 */
export function normalizeJobPosting(rawInput: unknown): ModuleResult<JobPosting> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const parseResult = RawJobSchema.safeParse(rawInput);

  if (!parseResult.success) {
    const errors = parseResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Job posting validation failed',
        details: errors,
      },
      metadata: {
        jobId: '',
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  const raw = parseResult.data;
  const company = trimString(raw.company);
  const jobTitle = trimString(raw.job_title);

  if (!company || !jobTitle) {
    return {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'company and job_title must not be blank',
      },
      metadata: {
        jobId: '',
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  const job: JobPosting = {
    url: raw.url.trim(),
    platform: trimString(raw.platform)?.toLowerCase() ?? 'unknown',
    jobTitle,
    company,
    jobFamily: toJobFamily(trimString(raw.job_family)),
    location: trimString(raw.location),
    description: trimString(raw.description) ?? '',
    scrapedAt: raw.scraped_at ? new Date(raw.scraped_at).toISOString() : timestamp,
  };

  return {
    success: true,
    data: job,
    metadata: {
      jobId: '',
      module: 'normalizer',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}
