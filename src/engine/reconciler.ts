/**
 * Access reconciler: the core orchestration engine.
 *
 * Runs each selected domain through fetch -> normalize -> diff -> persist
 * report -> apply, in the fixed domain order. Domains are independent: a
 * domain that cannot be fetched is marked failed and the run moves on.
 * One reconciler admits one run at a time.
 */

import { v4 as uuid } from 'uuid';
import { DOMAIN_ORDER, PermissionDomain, RecordOf, identityKey, subjectOf } from '../domain/permission';
import {
  DiffReport,
  DomainRunResult,
  DomainRunStatus,
  ReconcileMode,
  ReconciliationRun,
  RunStatus,
  emptyCounts,
  emptySummary,
} from '../domain/run';
import {
  FetchError,
  ReconcilerError,
  TypedError,
  alreadyRunningError,
  toTypedError,
} from '../domain/errors';
import { PermissionService } from '../client/permission-service';
import { DesiredState } from '../desired-state/schema';
import { AuditService } from '../audit/audit-service';
import { Store } from '../storage/store';
import { Logger, logger } from '../logger';
import { domainSpec, normalizeEntry } from './domains';
import { diffRecords, isConverged } from './diff';
import { AppliedEvent, applyDiff } from './applier';
import { resolveRunStatus, transitionDomainStatus, transitionRunStatus } from './state-machine';

export interface ReconcileOptions {
  mode?: ReconcileMode;
  /** Restrict the run to these domains; defaults to all. */
  domains?: PermissionDomain[];
  actorId?: string;
  /** Where the desired state came from, for the run record. */
  source?: string;
}

export class AccessReconciler {
  private activeRunId: string | null = null;

  constructor(
    private store: Store,
    private audit: AuditService,
  ) {}

  /** ID of the run in progress, if any. */
  get activeRun(): string | null {
    return this.activeRunId;
  }

  /**
   * Reconcile the service against the desired state and return the
   * finished run. Per-domain failures end up in the run; only a run that
   * is already active, or a storage failure, throws.
   */
  async run(
    service: PermissionService,
    desired: DesiredState,
    options: ReconcileOptions = {},
  ): Promise<ReconciliationRun> {
    if (this.activeRunId) {
      throw new ReconcilerError(alreadyRunningError(this.activeRunId));
    }
    const runId = `rec_${uuid()}`;
    this.activeRunId = runId;

    try {
      return await this.runInternal(runId, service, desired, options);
    } finally {
      this.activeRunId = null;
    }
  }

  private async runInternal(
    runId: string,
    service: PermissionService,
    desired: DesiredState,
    options: ReconcileOptions,
  ): Promise<ReconciliationRun> {
    const selected = options.domains ? new Set(options.domains) : undefined;
    const now = new Date().toISOString();
    let run: ReconciliationRun = {
      id: runId,
      mode: options.mode ?? 'plan',
      status: RunStatus.Created,
      domains: DOMAIN_ORDER.filter((domain) => !selected || selected.has(domain)),
      actorId: options.actorId ?? 'system',
      source: options.source,
      createdAt: now,
      updatedAt: now,
      domainResults: {},
      summary: emptySummary(),
    };
    for (const domain of run.domains) {
      run.domainResults[domain] = { domain, status: DomainRunStatus.Pending, counts: emptyCounts() };
    }
    await this.store.runs.create(run);

    const log = logger.child({ runId, mode: run.mode });

    run = await this.transitionRun(run, RunStatus.Running);
    run.startedAt = new Date().toISOString();
    await this.store.runs.update(run.id, run);
    await this.audit.record({
      runId,
      actorId: run.actorId,
      action: 'reconciliation.started',
      resourceType: 'reconciliation',
      resourceId: runId,
      outcome: 'success',
      details: { mode: run.mode, domains: run.domains, source: run.source },
    });
    log.info('Reconciliation started', { domains: run.domains });

    try {
      for (const domain of run.domains) {
        const result = await this.reconcileDomain(run, domain, service, desired, log.child({ domain }));
        run.domainResults[domain] = result;
        addCounts(run, result);
        run.updatedAt = new Date().toISOString();
        await this.store.runs.update(run.id, { domainResults: run.domainResults, summary: run.summary });
      }
    } catch (err) {
      const error = toTypedError(err);
      log.error('Reconciliation aborted', { code: error.code, error: error.message });
      return this.failRun(run, error);
    }

    const statuses = run.domains.map((domain) => run.domainResults[domain]?.status ?? DomainRunStatus.Failed);
    const finalStatus = resolveRunStatus(statuses);
    run = await this.transitionRun(run, finalStatus);
    run.completedAt = new Date().toISOString();
    await this.store.runs.update(run.id, run);
    await this.audit.record({
      runId,
      actorId: run.actorId,
      action: 'reconciliation.completed',
      resourceType: 'reconciliation',
      resourceId: runId,
      outcome: finalStatus === RunStatus.Succeeded ? 'success' : 'failure',
      details: { status: finalStatus, summary: run.summary },
    });
    log.info('Reconciliation finished', { status: finalStatus, ...run.summary });
    return run;
  }

  private async reconcileDomain<D extends PermissionDomain>(
    run: ReconciliationRun,
    domain: D,
    service: PermissionService,
    desired: DesiredState,
    log: Logger,
  ): Promise<DomainRunResult> {
    const spec = domainSpec(domain);
    const started = Date.now();
    const result: DomainRunResult = {
      domain,
      status: this.nextDomainStatus(DomainRunStatus.Pending, DomainRunStatus.Running),
      startedAt: new Date(started).toISOString(),
      counts: emptyCounts(),
    };
    const finish = (status: DomainRunStatus): DomainRunResult => {
      result.status = this.nextDomainStatus(result.status, status);
      result.completedAt = new Date().toISOString();
      result.durationMs = Date.now() - started;
      return result;
    };

    let current: RecordOf<D>[];
    try {
      const entries = await spec.fetch(service);
      current = entries.map((entry) => normalizeEntry(domain, entry));
    } catch (err) {
      const error = new FetchError(domain, err).typedError;
      log.error(error.message, { code: error.code });
      result.error = { ...error, runId: run.id };
      await this.store.diffReports.create(this.newReport(run, domain, { fetchError: result.error }));
      await this.audit.record({
        runId: run.id,
        actorId: run.actorId,
        action: 'domain.fetch_failed',
        resourceType: 'domain',
        resourceId: domain,
        outcome: 'failure',
        details: { code: error.code, message: error.message },
      });
      return finish(DomainRunStatus.Failed);
    }

    const diff = diffRecords(current, desired[domain]);
    result.counts.added = diff.added.length;
    result.counts.removed = diff.removed.length;
    result.counts.unchanged = diff.unchanged.length;
    const report = await this.store.diffReports.create(this.newReport(run, domain, diff));
    log.info('Domain diff computed', { ...result.counts });

    if (run.mode === 'plan' || isConverged(diff)) {
      return finish(DomainRunStatus.Succeeded);
    }

    const outcome = await applyDiff(spec, service, diff, {
      onApplied: (event) => this.auditApplied(run, domain, event),
    });
    result.counts.granted = outcome.granted.length;
    result.counts.revoked = outcome.revoked.length;
    result.counts.failedApplies = outcome.failures.length;
    await this.store.diffReports.update(report.id, { failures: outcome.failures });

    return finish(outcome.failures.length > 0 ? DomainRunStatus.Partial : DomainRunStatus.Succeeded);
  }

  private newReport(
    run: ReconciliationRun,
    domain: PermissionDomain,
    content: Partial<Pick<DiffReport, 'added' | 'removed' | 'unchanged' | 'fetchError'>>,
  ): DiffReport {
    const now = new Date().toISOString();
    return {
      id: `dif_${uuid()}`,
      runId: run.id,
      domain,
      mode: run.mode,
      added: content.added ?? [],
      removed: content.removed ?? [],
      unchanged: content.unchanged ?? [],
      failures: [],
      fetchError: content.fetchError,
      createdAt: now,
      updatedAt: now,
    };
  }

  private async auditApplied<D extends PermissionDomain>(
    run: ReconciliationRun,
    domain: D,
    event: AppliedEvent<RecordOf<D>>,
  ): Promise<void> {
    const subject = subjectOf(event.record);
    await this.audit.record({
      runId: run.id,
      actorId: run.actorId,
      action: event.action === 'grant' ? 'permission.granted' : 'permission.revoked',
      resourceType: 'permission',
      resourceId: identityKey(event.record),
      outcome: event.error ? 'failure' : 'success',
      details: {
        domain,
        subjectType: subject.type,
        subject: subject.name,
        permission: event.record.permission,
        ...(event.error ? { code: event.error.code, error: event.error.message } : {}),
      },
    });
  }

  private nextDomainStatus(current: DomainRunStatus, target: DomainRunStatus): DomainRunStatus {
    const result = transitionDomainStatus(current, target);
    if (!result.success) {
      throw new ReconcilerError(result.error);
    }
    return result.newStatus;
  }

  private async transitionRun(run: ReconciliationRun, target: RunStatus): Promise<ReconciliationRun> {
    const result = transitionRunStatus(run.status, target);
    if (!result.success) {
      throw new ReconcilerError(result.error);
    }
    run.status = result.newStatus;
    run.updatedAt = new Date().toISOString();
    await this.store.runs.update(run.id, run);
    return run;
  }

  private async failRun(run: ReconciliationRun, error: TypedError): Promise<ReconciliationRun> {
    run.status = RunStatus.Failed;
    run.error = { ...error, runId: run.id };
    run.completedAt = new Date().toISOString();
    run.updatedAt = run.completedAt;
    await this.store.runs.update(run.id, run);
    await this.audit.record({
      runId: run.id,
      actorId: run.actorId,
      action: 'reconciliation.failed',
      resourceType: 'reconciliation',
      resourceId: run.id,
      outcome: 'failure',
      details: { code: error.code, message: error.message },
    });
    return run;
  }
}

function addCounts(run: ReconciliationRun, result: DomainRunResult): void {
  const summary = run.summary;
  summary.added += result.counts.added;
  summary.removed += result.counts.removed;
  summary.unchanged += result.counts.unchanged;
  summary.granted += result.counts.granted;
  summary.revoked += result.counts.revoked;
  summary.failedApplies += result.counts.failedApplies;
  if (result.status === DomainRunStatus.Failed) summary.failedDomains += 1;
}
