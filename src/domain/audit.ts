/**
 * Audit trail domain model.
 *
 * Immutable, queryable audit records for reconciliation runs and the
 * permission changes they make.
 */

/** Audit event categories. */
export type AuditAction =
  | 'reconciliation.started'
  | 'reconciliation.completed'
  | 'reconciliation.failed'
  | 'domain.fetch_failed'
  | 'permission.granted'
  | 'permission.revoked';

/** Resource types for audit records. */
export type AuditResourceType = 'reconciliation' | 'domain' | 'permission';

/** Audit outcome. */
export type AuditOutcome = 'success' | 'failure';

/** An immutable audit record. */
export interface AuditRecord {
  id: string;
  timestamp: string;
  runId: string;
  actorId: string;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  outcome: AuditOutcome;
  /** Additional context about the action. */
  details?: Record<string, unknown>;
}
