/**
 * Error taxonomy
 *
 * Every error carries a stable `code` that pipeline steps copy into
 * ModuleResult.error.code.
 */

export type ErrorCode =
  | 'SEARCH_BACKEND_ERROR'
  | 'VALIDATION_ERROR'
  | 'DOMAIN_NOT_FOUND'
  | 'DELIVERY_ERROR'
  | 'MAILBOX_AUTH_ERROR'
  | 'STORAGE_ERROR';

export class OutreachError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Why a search backend gave up on a query
 */
export type SearchFailureKind =
  | 'timeout'
  | 'network'
  | 'rate_limit'
  | 'auth'
  | 'blocked'
  | 'malformed';

/**
 * A search backend failed. The cascade treats every kind the same way:
 * the backend is dead for the rest of the call.
 */
export class SearchBackendError extends OutreachError {
  readonly backend: string;
  readonly kind: SearchFailureKind;
  readonly status: number | null;

  constructor(
    backend: string,
    kind: SearchFailureKind,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super('SEARCH_BACKEND_ERROR', `${backend}: ${message}`, { cause: options.cause });
    this.backend = backend;
    this.kind = kind;
    this.status = options.status ?? null;
  }
}

export class ValidationError extends OutreachError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('VALIDATION_ERROR', message);
    this.field = field;
  }
}

/**
 * No email domain could be found for a company.
 * Soft: logged and reported, never thrown out of findEmails.
 */
export class DomainResolutionFailure extends OutreachError {
  readonly company: string;

  constructor(company: string) {
    super('DOMAIN_NOT_FOUND', `Could not determine an email domain for "${company}"`);
    this.company = company;
  }
}

/**
 * A send failed mid-batch. `contacts` is the list as persisted before the failure.
 */
export class DeliveryError<TContact = unknown> extends OutreachError {
  readonly address: string;
  readonly contacts: readonly TContact[];

  constructor(address: string, contacts: readonly TContact[], cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('DELIVERY_ERROR', `Failed to send to ${address}: ${reason}`, { cause });
    this.address = address;
    this.contacts = contacts;
  }
}

export class MailboxAuthError extends OutreachError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MAILBOX_AUTH_ERROR', message, options);
  }
}

export class StorageError extends OutreachError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_ERROR', message, options);
  }
}

/**
 * Normalise anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
