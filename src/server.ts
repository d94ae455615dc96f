/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { AuditService } from './audit/audit-service';
import { AccessReconciler } from './engine/reconciler';
import { ConnectFn } from './client/permission-service';
import { errorHandler, requestLogger } from './api/middleware';
import { createReconciliationRoutes } from './api/reconciliations';
import { createAuditRoutes } from './api/audit';
import { DEFAULTS } from './config';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  auditService: AuditService;
  reconciler: AccessReconciler;
  /** Opens a permission service connection per reconciliation. */
  connect: ConnectFn;
  actorId: string;
}

export interface AppContextOptions {
  connect: ConnectFn;
  store?: Store;
  actorId?: string;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions): AppContext {
  const store = options.store ?? createMemoryStore();
  const auditService = new AuditService(store);
  const reconciler = new AccessReconciler(store, auditService);

  return {
    store,
    auditService,
    reconciler,
    connect: options.connect,
    actorId: options.actorId ?? DEFAULTS.actorId,
  };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.use(requestLogger());
  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: '0.1.0',
      uptimeMs: Date.now() - startTime,
      activeRun: ctx.reconciler.activeRun,
    });
  });

  const v1 = express.Router();
  v1.use('/reconciliations', createReconciliationRoutes(ctx.store, ctx.reconciler, ctx.connect, ctx.actorId));
  v1.use('/audit', createAuditRoutes(ctx.auditService));
  app.use('/api/v1', v1);

  app.use(errorHandler);

  return app;
}
