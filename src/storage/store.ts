/**
 * Storage layer interfaces.
 *
 * Defines the contract for persisting runs, diff reports and audit records
 * with pluggable backends.
 */

import { AuditRecord } from '../domain/audit';
import { PermissionDomain } from '../domain/permission';
import { DiffReport, ReconciliationRun } from '../domain/run';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for reconciliation runs. */
export interface RunStore {
  create(run: ReconciliationRun): Promise<ReconciliationRun>;
  getById(id: string): Promise<ReconciliationRun | null>;
  update(id: string, run: Partial<ReconciliationRun>): Promise<ReconciliationRun | null>;
  /** Most recent first. */
  list(options?: ListOptions): Promise<ReconciliationRun[]>;
}

/** Store interface for per-domain diff reports. */
export interface DiffReportStore {
  create(report: DiffReport): Promise<DiffReport>;
  update(id: string, updates: Partial<DiffReport>): Promise<DiffReport | null>;
  getByRunAndDomain(runId: string, domain: PermissionDomain): Promise<DiffReport | null>;
  /** Reports of a run, in domain processing order. */
  listByRun(runId: string): Promise<DiffReport[]>;
}

/** Store interface for audit records (append-only). */
export interface AuditStore {
  create(record: AuditRecord): Promise<AuditRecord>;
  listByRun(runId: string, options?: ListOptions): Promise<AuditRecord[]>;
  list(options?: ListOptions): Promise<AuditRecord[]>;
}

/** Combined store interface. */
export interface Store {
  runs: RunStore;
  diffReports: DiffReportStore;
  audit: AuditStore;
}
