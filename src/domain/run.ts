/**
 * Reconciliation run domain model.
 *
 * A single reconciliation pass over the selected permission domains,
 * producing one diff report per domain and a run-level summary.
 */

import { TypedError } from './errors';
import { PermissionDomain, PermissionRecord } from './permission';

/** Reconciliation run lifecycle states. */
export enum RunStatus {
  Created = 'created',
  Running = 'running',
  Succeeded = 'succeeded',
  /** Finished, but at least one domain failed or had failed applies. */
  Partial = 'partial',
  Failed = 'failed',
}

/** Per-domain states within a run. */
export enum DomainRunStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Partial = 'partial',
  Failed = 'failed',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Created]: [RunStatus.Running, RunStatus.Failed],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Partial, RunStatus.Failed],
  [RunStatus.Succeeded]: [],
  [RunStatus.Partial]: [],
  [RunStatus.Failed]: [],
};

/** Valid state transitions for domains. */
export const VALID_DOMAIN_TRANSITIONS: Record<DomainRunStatus, DomainRunStatus[]> = {
  [DomainRunStatus.Pending]: [DomainRunStatus.Running],
  [DomainRunStatus.Running]: [DomainRunStatus.Succeeded, DomainRunStatus.Partial, DomainRunStatus.Failed],
  [DomainRunStatus.Succeeded]: [],
  [DomainRunStatus.Partial]: [],
  [DomainRunStatus.Failed]: [],
};

/** `plan` computes and reports the diff; `apply` also executes it. */
export type ReconcileMode = 'plan' | 'apply';

export type ApplyAction = 'grant' | 'revoke';

/** A grant or revoke call that failed. */
export interface ApplyFailure<R extends PermissionRecord = PermissionRecord> {
  action: ApplyAction;
  record: R;
  error: TypedError;
}

/** Change counts for one domain. */
export interface DomainCounts {
  added: number;
  removed: number;
  unchanged: number;
  granted: number;
  revoked: number;
  failedApplies: number;
}

export interface DomainRunResult {
  domain: PermissionDomain;
  status: DomainRunStatus;
  startedAt?: string;
  completedAt?: string;
  counts: DomainCounts;
  /** Set when the domain could not be fetched. */
  error?: TypedError;
  durationMs?: number;
}

export interface RunSummary extends DomainCounts {
  failedDomains: number;
}

/** A single reconciliation pass. */
export interface ReconciliationRun {
  id: string;
  mode: ReconcileMode;
  status: RunStatus;
  /** Domains selected for this run, in processing order. */
  domains: PermissionDomain[];
  actorId: string;
  /** Where the desired state came from (file path, "api", ...). */
  source?: string;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  domainResults: Partial<Record<PermissionDomain, DomainRunResult>>;
  summary: RunSummary;
  /** Run-level error if the run failed outright. */
  error?: TypedError;
}

/** The persisted diff of one domain within one run. */
export interface DiffReport {
  id: string;
  runId: string;
  domain: PermissionDomain;
  mode: ReconcileMode;
  added: PermissionRecord[];
  removed: PermissionRecord[];
  unchanged: PermissionRecord[];
  failures: ApplyFailure[];
  fetchError?: TypedError;
  createdAt: string;
  updatedAt: string;
}

export function emptyCounts(): DomainCounts {
  return { added: 0, removed: 0, unchanged: 0, granted: 0, revoked: 0, failedApplies: 0 };
}

export function emptySummary(): RunSummary {
  return { ...emptyCounts(), failedDomains: 0 };
}
