/**
 * Diff report documents.
 *
 * A run's reports render to YAML keyed by `<domain>_permissions_diff`, each
 * a list of records tagged with their change, followed by the failures the
 * run hit. The full document and its added-only and removed-only views are
 * written side by side.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import YAML from 'yaml';
import { PermissionRecord, scopeOf } from '../domain/permission';
import { DiffReport, ReconciliationRun, RunSummary } from '../domain/run';
import { domainSpec, orderedDomainSpecs } from '../engine/domains';

export type ChangeKind = 'added' | 'removed' | 'unchanged';

export interface ReportRecord {
  change: ChangeKind;
  subjectName: string | null;
  subjectGroup: string | null;
  projectKey?: string;
  planKey?: string;
  environmentId?: string;
  permission: string;
  value: true;
}

export interface ReportFailure {
  domain: string;
  stage: 'fetch' | 'grant' | 'revoke';
  code: string;
  message: string;
  record?: ReportRecord;
}

export interface ReportDocument {
  run: {
    id: string;
    mode: string;
    status: string;
    startedAt?: string;
    completedAt?: string;
    summary: RunSummary;
  };
  /** Diff sections by report key, in domain order. */
  diffs: Record<string, ReportRecord[]>;
  failures: ReportFailure[];
}

export const REPORT_FILES = {
  all: 'permissions_diff.yaml',
  added: 'permissions_diff_added.yaml',
  removed: 'permissions_diff_removed.yaml',
} as const;

export function toReportRecord(record: PermissionRecord, change: ChangeKind): ReportRecord {
  return {
    change,
    subjectName: record.subjectName,
    subjectGroup: record.subjectGroup,
    ...scopeOf(record),
    permission: record.permission,
    value: record.value,
  };
}

/** Records of one domain report, added first, then removed, then unchanged. */
export function reportSection(report: DiffReport): ReportRecord[] {
  return [
    ...report.added.map((record) => toReportRecord(record, 'added')),
    ...report.removed.map((record) => toReportRecord(record, 'removed')),
    ...report.unchanged.map((record) => toReportRecord(record, 'unchanged')),
  ];
}

export function reportFailures(report: DiffReport): ReportFailure[] {
  const failures: ReportFailure[] = [];
  if (report.fetchError) {
    failures.push({
      domain: report.domain,
      stage: 'fetch',
      code: report.fetchError.code,
      message: report.fetchError.message,
    });
  }
  for (const failure of report.failures) {
    failures.push({
      domain: report.domain,
      stage: failure.action,
      code: failure.error.code,
      message: failure.error.message,
      record: toReportRecord(failure.record, failure.action === 'grant' ? 'added' : 'removed'),
    });
  }
  return failures;
}

export function buildReportDocument(run: ReconciliationRun, reports: DiffReport[]): ReportDocument {
  const byDomain = new Map(reports.map((report) => [report.domain, report]));
  const diffs: Record<string, ReportRecord[]> = {};
  const failures: ReportFailure[] = [];

  for (const spec of orderedDomainSpecs()) {
    const report = byDomain.get(spec.domain);
    if (!report) continue;
    diffs[spec.reportKey] = reportSection(report);
    failures.push(...reportFailures(report));
  }

  return {
    run: {
      id: run.id,
      mode: run.mode,
      status: run.status,
      startedAt: run.startedAt,
      completedAt: run.completedAt,
      summary: run.summary,
    },
    diffs,
    failures,
  };
}

/** A copy of the document keeping only records of one change kind. */
export function filterReportDocument(document: ReportDocument, change: ChangeKind): ReportDocument {
  const diffs: Record<string, ReportRecord[]> = {};
  for (const [key, records] of Object.entries(document.diffs)) {
    diffs[key] = records.filter((record) => record.change === change);
  }
  return { ...document, diffs };
}

/** Flatten to the on-disk shape: run header, one key per domain, failures. */
export function reportToPlainObject(document: ReportDocument): Record<string, unknown> {
  return { run: document.run, ...document.diffs, failures: document.failures };
}

export function renderReport(document: ReportDocument): string {
  return YAML.stringify(reportToPlainObject(document));
}

/** Render a single domain report on its own. */
export function renderDomainReport(report: DiffReport): string {
  return YAML.stringify({
    runId: report.runId,
    mode: report.mode,
    [domainSpec(report.domain).reportKey]: reportSection(report),
    failures: reportFailures(report),
  });
}

/** Write the full, added-only and removed-only reports; returns their paths. */
export async function writeReportFiles(dir: string, document: ReportDocument): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const outputs: Array<[string, ReportDocument]> = [
    [REPORT_FILES.all, document],
    [REPORT_FILES.added, filterReportDocument(document, 'added')],
    [REPORT_FILES.removed, filterReportDocument(document, 'removed')],
  ];
  const paths: string[] = [];
  for (const [name, content] of outputs) {
    const path = join(dir, name);
    await writeFile(path, renderReport(content), 'utf8');
    paths.push(path);
  }
  return paths;
}
