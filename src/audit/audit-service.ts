/**
 * Audit Trail Service.
 *
 * Records one immutable audit record per run start and completion and per
 * grant or revoke call, queryable by run.
 */

import { v4 as uuid } from 'uuid';
import { AuditRecord, AuditAction, AuditResourceType, AuditOutcome } from '../domain/audit';
import { Store } from '../storage/store';

/** Input for creating an audit record. */
export interface AuditInput {
  runId: string;
  actorId: string;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  outcome: AuditOutcome;
  details?: Record<string, unknown>;
}

/** Audit query options. */
export interface AuditQueryOptions {
  runId?: string;
  limit?: number;
  offset?: number;
}

/** The audit service. */
export class AuditService {
  constructor(private store: Store) {}

  /** Record an audit event. */
  async record(input: AuditInput): Promise<AuditRecord> {
    const record: AuditRecord = {
      id: `aud_${uuid()}`,
      timestamp: new Date().toISOString(),
      runId: input.runId,
      actorId: input.actorId,
      action: input.action,
      resourceType: input.resourceType,
      resourceId: input.resourceId,
      outcome: input.outcome,
      details: input.details,
    };

    return this.store.audit.create(record);
  }

  /** Query audit records, optionally for one run. */
  async query(options: AuditQueryOptions = {}): Promise<AuditRecord[]> {
    const listOptions = { limit: options.limit, offset: options.offset };
    if (options.runId) {
      return this.store.audit.listByRun(options.runId, listOptions);
    }
    return this.store.audit.list(listOptions);
  }
}
