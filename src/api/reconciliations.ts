/**
 * Reconciliation API routes.
 *
 * POST /reconciliations  Run a reconciliation against a posted document
 * GET /reconciliations  List runs, most recent first
 * GET /reconciliations/:runId  Get a run
 * GET /reconciliations/:runId/report  Get the run's diff report (JSON or ?format=yaml)
 */

import { Router } from 'express';
import { ReconcilerError, alreadyRunningError, notFoundError, validationError } from '../domain/errors';
import { PermissionDomain, parsePermissionDomain } from '../domain/permission';
import { ReconcileMode } from '../domain/run';
import { ConnectFn, withConnection } from '../client/permission-service';
import { parseDesiredStateText } from '../desired-state/parser';
import { loadDesiredState } from '../desired-state/loader';
import { AccessReconciler } from '../engine/reconciler';
import { buildReportDocument, renderReport, reportToPlainObject } from '../report/diff-report';
import { Store } from '../storage/store';
import { isRecord } from '../util/guards';

export interface ReconcileRequest {
  document: string;
  mode: ReconcileMode;
  domains?: PermissionDomain[];
}

function isReconcileMode(value: unknown): value is ReconcileMode {
  return value === 'plan' || value === 'apply';
}

/** Validate a request body; throws a VALIDATION error naming the first problem. */
export function parseReconcileRequest(body: unknown): ReconcileRequest {
  if (!isRecord(body)) {
    throw new ReconcilerError(validationError('Request body must be a JSON object'));
  }
  const { document, mode = 'plan', domains } = body;
  if (typeof document !== 'string' || document.trim().length === 0) {
    throw new ReconcilerError(validationError('"document" must be a non-empty YAML string'));
  }
  if (!isReconcileMode(mode)) {
    throw new ReconcilerError(validationError('"mode" must be "plan" or "apply"', { mode }));
  }
  if (domains === undefined) {
    return { document, mode };
  }

  if (!Array.isArray(domains) || domains.length === 0) {
    throw new ReconcilerError(validationError('"domains" must be a non-empty list of domain names'));
  }
  const requested: unknown[] = domains;
  return {
    document,
    mode,
    domains: requested.map((value) => {
      const domain = typeof value === 'string' ? parsePermissionDomain(value) : undefined;
      if (!domain) {
        throw new ReconcilerError(validationError(`Unknown permission domain: ${String(value)}`, { domain: value }));
      }
      return domain;
    }),
  };
}

function queryInteger(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 0 ? undefined : parsed;
}

export function createReconciliationRoutes(
  store: Store,
  reconciler: AccessReconciler,
  connect: ConnectFn,
  actorId: string,
): Router {
  const router = Router();

  router.post('/', async (req, res, next) => {
    try {
      const request = parseReconcileRequest(req.body);
      const desired = loadDesiredState(parseDesiredStateText(request.document, 'request body'));

      // Checked before connecting so a busy reconciler does not open a session
      const active = reconciler.activeRun;
      if (active) {
        throw new ReconcilerError(alreadyRunningError(active));
      }

      const run = await withConnection(connect, (service) =>
        reconciler.run(service, desired, {
          mode: request.mode,
          domains: request.domains,
          actorId: req.header('x-actor-id') ?? actorId,
          source: 'api',
        }),
      );
      res.status(201).json({ run });
    } catch (err) {
      next(err);
    }
  });

  router.get('/', async (req, res, next) => {
    try {
      const runs = await store.runs.list({
        limit: queryInteger(req.query.limit),
        offset: queryInteger(req.query.offset),
      });
      res.json({ runs });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:runId', async (req, res, next) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        throw new ReconcilerError(notFoundError('Reconciliation', req.params.runId));
      }
      res.json({ run });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:runId/report', async (req, res, next) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        throw new ReconcilerError(notFoundError('Reconciliation', req.params.runId));
      }
      const document = buildReportDocument(run, await store.diffReports.listByRun(run.id));
      if (req.query.format === 'yaml') {
        res.type('text/yaml').send(renderReport(document));
        return;
      }
      res.json({ report: reportToPlainObject(document) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
