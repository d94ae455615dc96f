/**
 * File-backed storage.
 *
 * Runs and audit records stay in memory; each diff report is additionally
 * written to `<dir>/<runId>/<domain>.yaml` whenever it is created or
 * updated, so a plan's output is on disk before anything is applied.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { PermissionDomain } from '../domain/permission';
import { DiffReport } from '../domain/run';
import { renderDomainReport } from '../report/diff-report';
import { createMemoryStore, MemoryDiffReportStore } from './memory-store';
import { DiffReportStore, Store } from './store';

class FileDiffReportStore implements DiffReportStore {
  private memory = new MemoryDiffReportStore();

  constructor(private dir: string) {}

  async create(report: DiffReport): Promise<DiffReport> {
    const created = await this.memory.create(report);
    await this.persist(created);
    return created;
  }

  async update(id: string, updates: Partial<DiffReport>): Promise<DiffReport | null> {
    const updated = await this.memory.update(id, updates);
    if (updated) await this.persist(updated);
    return updated;
  }

  getByRunAndDomain(runId: string, domain: PermissionDomain): Promise<DiffReport | null> {
    return this.memory.getByRunAndDomain(runId, domain);
  }

  listByRun(runId: string): Promise<DiffReport[]> {
    return this.memory.listByRun(runId);
  }

  private async persist(report: DiffReport): Promise<void> {
    const runDir = join(this.dir, report.runId);
    await mkdir(runDir, { recursive: true });
    await writeFile(join(runDir, `${report.domain}.yaml`), renderDomainReport(report), 'utf8');
  }
}

export function createFileStore(dir: string): Store {
  return { ...createMemoryStore(), diffReports: new FileDiffReportStore(dir) };
}
