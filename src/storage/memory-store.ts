/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing.
 */

import { AuditRecord } from '../domain/audit';
import { DOMAIN_ORDER, PermissionDomain } from '../domain/permission';
import { DiffReport, ReconciliationRun } from '../domain/run';
import { AuditStore, DiffReportStore, ListOptions, RunStore, Store } from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/**
 * Callers get copies, never the stored object: nested arrays such as
 * `DiffReport.added` would otherwise alias store state.
 */
export function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, ReconciliationRun>();

  async create(run: ReconciliationRun): Promise<ReconciliationRun> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<ReconciliationRun | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<ReconciliationRun>): Promise<ReconciliationRun | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...existing, ...deepCopy(updates) };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(options?: ListOptions): Promise<ReconciliationRun[]> {
    const runs = [...this.data.values()].reverse();
    return applyListOptions(runs, options).map(deepCopy);
  }
}

export class MemoryDiffReportStore implements DiffReportStore {
  private data = new Map<string, DiffReport>();

  async create(report: DiffReport): Promise<DiffReport> {
    this.data.set(report.id, deepCopy(report));
    return deepCopy(report);
  }

  async update(id: string, updates: Partial<DiffReport>): Promise<DiffReport | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...existing, ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async getByRunAndDomain(runId: string, domain: PermissionDomain): Promise<DiffReport | null> {
    for (const report of this.data.values()) {
      if (report.runId === runId && report.domain === domain) return deepCopy(report);
    }
    return null;
  }

  async listByRun(runId: string): Promise<DiffReport[]> {
    return [...this.data.values()]
      .filter((report) => report.runId === runId)
      .sort((a, b) => DOMAIN_ORDER.indexOf(a.domain) - DOMAIN_ORDER.indexOf(b.domain))
      .map(deepCopy);
  }
}

class MemoryAuditStore implements AuditStore {
  private data: AuditRecord[] = [];

  async create(record: AuditRecord): Promise<AuditRecord> {
    this.data.push(deepCopy(record));
    return deepCopy(record);
  }

  async listByRun(runId: string, options?: ListOptions): Promise<AuditRecord[]> {
    const filtered = this.data.filter((record) => record.runId === runId);
    return applyListOptions(filtered, options).map(deepCopy);
  }

  async list(options?: ListOptions): Promise<AuditRecord[]> {
    return applyListOptions(this.data, options).map(deepCopy);
  }
}

/** Create a complete in-memory store. */
export function createMemoryStore(): Store {
  return {
    runs: new MemoryRunStore(),
    diffReports: new MemoryDiffReportStore(),
    audit: new MemoryAuditStore(),
  };
}
