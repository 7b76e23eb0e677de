/**
 * Configuration Module
 *
 * Builds an explicit OutreachConfig value from environment variables.
 * Components receive the parts they need through their constructors;
 * nothing reads process.env after loadConfig().
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

/**
 * Empty strings count as "not set"
 */
const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const EnvSchema = z.object({
  BRAVE_API_KEY: optionalString,
  TAVILY_API_KEY: optionalString,
  GOOGLE_CSE_API_KEY: optionalString,
  GOOGLE_CSE_CX: optionalString,
  HUNTER_API_KEY: optionalString,
  APOLLO_API_KEY: optionalString,

  SEARCH_DELAY_MIN_SECONDS: z.coerce.number().nonnegative().default(4),
  SEARCH_DELAY_MAX_SECONDS: z.coerce.number().nonnegative().default(8),

  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(465),
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
  IMAP_HOST: z.string().default('imap.gmail.com'),
  IMAP_PORT: z.coerce.number().int().positive().default(993),
  SENDER_NAME: z.string().default(''),
  SENDER_EMAIL: optionalString,

  MAX_SEND_PER_RUN: z.coerce.number().int().positive().default(3),
  SEND_PACING_MS: z.coerce.number().int().nonnegative().default(2000),
  BOUNCE_LOOKBACK_MINUTES: z.coerce.number().int().positive().default(30),
  BOUNCE_WAIT_SECONDS: z.coerce.number().int().nonnegative().default(120),

  STORAGE_TYPE: z.enum(['file', 's3', 'memory']).default('file'),
  DATA_DIR: z.string().default('data/jobs'),
  S3_BUCKET: optionalString,
  AWS_REGION: z.string().default('us-east-1'),
});

export interface SearchConfig {
  braveApiKey: string | null;
  tavilyApiKey: string | null;
  googleCseApiKey: string | null;
  googleCseCx: string | null;
  /** Inter-query delay range in milliseconds, [min, max] */
  delayRangeMs: [number, number];
}

export interface DirectoryConfig {
  hunterApiKey: string | null;
  apolloApiKey: string | null;
}

export interface MailboxConfig {
  smtpHost: string;
  smtpPort: number;
  imapHost: string;
  imapPort: number;
  user: string | null;
  password: string | null;
  senderName: string;
  senderEmail: string | null;
}

export interface DeliveryConfig {
  maxSendPerRun: number;
  pacingMs: number;
  bounceLookbackMinutes: number;
  bounceWaitSeconds: number;
}

export type StorageConfig =
  | { type: 'file'; dataDir: string }
  | { type: 's3'; bucket: string; region: string }
  | { type: 'memory' };

export interface OutreachConfig {
  search: SearchConfig;
  directory: DirectoryConfig;
  mailbox: MailboxConfig;
  delivery: DeliveryConfig;
  storage: StorageConfig;
}

/**
 * Parse configuration from an environment map
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws ValidationError when a variable is malformed
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): OutreachConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ValidationError('env', `Invalid configuration: ${issues.join('; ')}`);
  }

  const e = parsed.data;

  if (e.SEARCH_DELAY_MIN_SECONDS > e.SEARCH_DELAY_MAX_SECONDS) {
    throw new ValidationError(
      'SEARCH_DELAY_MIN_SECONDS',
      'SEARCH_DELAY_MIN_SECONDS must not exceed SEARCH_DELAY_MAX_SECONDS'
    );
  }

  let storage: StorageConfig;
  if (e.STORAGE_TYPE === 's3') {
    if (!e.S3_BUCKET) {
      throw new ValidationError('S3_BUCKET', 'S3_BUCKET is required when STORAGE_TYPE=s3');
    }
    storage = { type: 's3', bucket: e.S3_BUCKET, region: e.AWS_REGION };
  } else if (e.STORAGE_TYPE === 'memory') {
    storage = { type: 'memory' };
  } else {
    storage = { type: 'file', dataDir: e.DATA_DIR };
  }

  return {
    search: {
      braveApiKey: e.BRAVE_API_KEY,
      tavilyApiKey: e.TAVILY_API_KEY,
      googleCseApiKey: e.GOOGLE_CSE_API_KEY,
      googleCseCx: e.GOOGLE_CSE_CX,
      delayRangeMs: [e.SEARCH_DELAY_MIN_SECONDS * 1000, e.SEARCH_DELAY_MAX_SECONDS * 1000],
    },
    directory: {
      hunterApiKey: e.HUNTER_API_KEY,
      apolloApiKey: e.APOLLO_API_KEY,
    },
    mailbox: {
      smtpHost: e.SMTP_HOST,
      smtpPort: e.SMTP_PORT,
      imapHost: e.IMAP_HOST,
      imapPort: e.IMAP_PORT,
      user: e.SMTP_USER,
      password: e.SMTP_PASS,
      senderName: e.SENDER_NAME,
      senderEmail: e.SENDER_EMAIL ?? e.SMTP_USER,
    },
    delivery: {
      maxSendPerRun: e.MAX_SEND_PER_RUN,
      pacingMs: e.SEND_PACING_MS,
      bounceLookbackMinutes: e.BOUNCE_LOOKBACK_MINUTES,
      bounceWaitSeconds: e.BOUNCE_WAIT_SECONDS,
    },
    storage,
  };
}
