/**
 * Recruiter Outreach Engine - Main Entry Point
 *
 * Finds recruiters for a job posting, resolves their email addresses, sends
 * outreach in small paced batches and reconciles delivery-failure notices.
 *
 * Architecture:
 * - Components take their collaborators and options through constructors
 * - OutreachEngine exposes findRecruiters / findEmails / sendBatch / checkBounces
 * - Job-bound pipeline steps read and write artifacts through OutreachRepository
 */

// Core Types
export type * from './types/index.js';
export { JOB_FAMILIES, CANONICAL_PATTERNS } from './types/index.js';

// Errors
export {
  OutreachError,
  SearchBackendError,
  ValidationError,
  DomainResolutionFailure,
  DeliveryError,
  MailboxAuthError,
  StorageError,
  type ErrorCode,
  type SearchFailureKind,
} from './errors/index.js';

// Observability
export {
  createLogger,
  silentLogger,
  noopMetrics,
  type Logger,
  type Metrics,
  type Observability,
} from './observability/index.js';

// Configuration
export {
  loadConfig,
  type OutreachConfig,
  type SearchConfig,
  type DirectoryConfig,
  type MailboxConfig,
  type DeliveryConfig,
  type StorageConfig,
} from './config/index.js';

// Normalizer - headings, profile URLs, queries, job postings
export {
  parseHeading,
  normalizeProfileUrl,
  isProfileUrl,
  extractCity,
  buildQueries,
  normalizeJobPosting,
  JOB_FAMILY_TERMS,
  type ParsedHeading,
} from './normalizer/index.js';

// Contacts
export {
  createContact,
  withEmail,
  recordSend,
  recordBounceVerdict,
  candidateAddresses,
  toRecord,
  fromRecord,
  type NewContact,
} from './contacts/index.js';

// Search providers
export {
  DuckDuckGoProvider,
  BraveProvider,
  TavilyProvider,
  GoogleCseProvider,
  createSearchBackends,
  createWebSearchProvider,
  type BackendName,
  type SearchOptions,
  type SearchOutcome,
  type SearchProvider,
} from './search/index.js';

// Search cascade
export { SearchCascadeEngine, type CascadeOptions } from './cascade/index.js';

// Directory clients
export {
  HunterDirectoryLookup,
  ApolloOrgSearch,
  NullDirectoryLookup,
  NullOrgSearch,
  createDirectoryClients,
  type DirectoryLookup,
  type OrgSearch,
} from './directory/index.js';

// Domain and pattern resolution
export {
  DomainPatternResolver,
  inferPattern,
  voteDomain,
  extractRootDomain,
  isAtsDomain,
  type ResolverOptions,
} from './email-resolver/index.js';

// Address generation
export {
  EmailAddressGenerator,
  parseName,
  normalizeNameToken,
  generate,
  type NameParts,
  type DomainRecordSource,
} from './email-generator/index.js';

// Mailbox
export {
  SmtpImapMailbox,
  createMailbox,
  type Mailbox,
  type OutreachMessage,
  type FailureNotification,
} from './mailbox/index.js';

// Delivery
export {
  DeliveryStateMachine,
  deliveryState,
  isEligible,
  nextAddress,
  personalizeBody,
  type DeliveryState,
  type DeliveryOptions,
} from './delivery/index.js';

// Bounce detection
export {
  BounceDetector,
  extractFailedRecipients,
  reconcileBounces,
  type BounceCheckResult,
} from './bounce/index.js';

// Storage
export {
  S3StorageAdapter,
  FileStorageAdapter,
  MemoryStorageAdapter,
  OutreachRepository,
  createStorageAdapter,
} from './storage/index.js';

// Pipeline
export {
  OutreachEngine,
  createOutreachEngine,
  generateJobId,
  registerJob,
  discoverRecruitersForJob,
  resolveEmailsForJob,
  sendOutreachForJob,
  reconcileBouncesForJob,
  type CreateEngineOptions,
} from './pipeline/index.js';
