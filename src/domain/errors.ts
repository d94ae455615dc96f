/**
 * Typed error model.
 *
 * Every failure carries a namespaced code so callers (CLI exit codes, HTTP
 * status mapping, run reports) can branch on the code rather than on the
 * message. Thrown errors wrap a TypedError; per-domain and per-record
 * failures are stored as plain TypedErrors inside the run.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'CONFIG'
  | 'SCHEMA'
  | 'FETCH'
  | 'APPLY'
  | 'SERVICE'
  | 'RECONCILE'
  | 'VALIDATION'
  | 'SYSTEM';

/** Typed suggested fix. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and run reports. */
export interface TypedError {
  /** Namespaced error code (e.g., "FETCH.SERVICE_UNAVAILABLE"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated reconciliation run if applicable. */
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Extract a message from anything thrown. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : 'Unknown error';
}

/** Base class for thrown errors. */
export class ReconcilerError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ReconcilerError';
  }
}

/** The desired-state document could not be read or parsed. */
export class ConfigParseError extends ReconcilerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(createTypedError({ code: 'CONFIG.PARSE', message, details }));
    this.name = 'ConfigParseError';
  }
}

/** A single schema violation, addressed by its path in the document. */
export interface SchemaIssue {
  path: string;
  message: string;
}

/** The desired-state document (or a record) violates the schema. */
export class SchemaError extends ReconcilerError {
  constructor(public issues: SchemaIssue[]) {
    super(
      createTypedError({
        code: 'SCHEMA.INVALID',
        message:
          issues.length === 1
            ? `${issues[0].path}: ${issues[0].message}`
            : `${issues.length} schema violations in desired state`,
        details: { issues },
        suggestedFixes: issues.map((issue) => ({
          type: 'FIX_FIELD',
          params: { path: issue.path },
          description: issue.message,
        })),
      }),
    );
    this.name = 'SchemaError';
  }
}

/** Configuration values are missing or invalid. */
export class ConfigError extends ReconcilerError {
  constructor(public problems: string[]) {
    super(
      createTypedError({
        code: 'CONFIG.INVALID',
        message: `Invalid configuration: ${problems.join('; ')}`,
        details: { problems },
      }),
    );
    this.name = 'ConfigError';
  }
}

/** Current state of a domain could not be retrieved. */
export class FetchError extends ReconcilerError {
  constructor(domain: string, cause: unknown) {
    super(
      createTypedError({
        code: 'FETCH.FAILED',
        message: `Failed to fetch ${domain} permissions: ${errorMessage(cause)}`,
        retryable: true,
        details: { domain, ...causeDetails(cause) },
      }),
    );
    this.name = 'FetchError';
  }
}

/** A single grant or revoke call failed. */
export class ApplyError extends ReconcilerError {
  constructor(action: 'grant' | 'revoke', domain: string, cause: unknown) {
    super(
      createTypedError({
        code: `APPLY.${action.toUpperCase()}_FAILED`,
        message: `Failed to ${action} ${domain} permission: ${errorMessage(cause)}`,
        retryable: true,
        details: { domain, action, ...causeDetails(cause) },
      }),
    );
    this.name = 'ApplyError';
  }
}

/** The permission service could not be reached while opening a connection. */
export class ServiceConnectionError extends ReconcilerError {
  constructor(baseUrl: string, cause: unknown) {
    super(
      createTypedError({
        code: 'SERVICE.UNREACHABLE',
        message: `Cannot connect to permission service at ${baseUrl}: ${errorMessage(cause)}`,
        retryable: true,
        details: { baseUrl },
        suggestedFixes: [
          { type: 'CHECK_URL', params: { baseUrl }, description: 'Verify the server URL and credentials' },
        ],
      }),
    );
    this.name = 'ServiceConnectionError';
  }
}

/** The permission service answered a request with an error status. */
export class PermissionServiceError extends ReconcilerError {
  constructor(
    message: string,
    public status?: number,
    details?: Record<string, unknown>,
  ) {
    super(
      createTypedError({
        code: status ? `SERVICE.HTTP_${status}` : 'SERVICE.REQUEST_FAILED',
        message,
        retryable: status === undefined || status >= 500 || status === 429,
        details: { ...details, ...(status ? { status } : {}) },
      }),
    );
    this.name = 'PermissionServiceError';
  }
}

function causeDetails(cause: unknown): Record<string, unknown> {
  if (cause instanceof ReconcilerError) {
    return { causeCode: cause.typedError.code };
  }
  return {};
}

/** Convert anything thrown into a TypedError. */
export function toTypedError(err: unknown, fallbackCode = 'SYSTEM.INTERNAL'): TypedError {
  if (err instanceof ReconcilerError) return err.typedError;
  return createTypedError({ code: fallbackCode, message: errorMessage(err) });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

// --- API error factory functions ---

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.REQUEST',
    message,
    retryable: false,
    details,
  });
}

export function alreadyRunningError(activeRunId: string): TypedError {
  return createTypedError({
    code: 'RECONCILE.ALREADY_RUNNING',
    message: `A reconciliation is already in progress: ${activeRunId}`,
    retryable: true,
    details: { activeRunId },
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { activeRunId } }],
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
