/**
 * Bamboo access reconciler.
 *
 * Library entry point. The `access-reconciler` binary (src/cli.ts) wraps
 * the same pieces for command-line and HTTP use.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOptions } from './server';
export * from './domain';
export * from './client/permission-service';
export { BambooPermissionClient, connectBambooClient } from './client/bamboo-client';
export type { BambooClientConfig, FetchFn } from './client/bamboo-client';
export { MemoryPermissionService, createSnapshotService, snapshotConnector } from './client/memory-permission-service';
export * from './desired-state/schema';
export { parseDesiredStateText, readDesiredStateFile } from './desired-state/parser';
export { loadDesiredState, loadDesiredStateFile } from './desired-state/loader';
export * from './desired-state/exporter';
export * from './engine/domains';
export * from './engine/diff';
export * from './engine/applier';
export * from './engine/state-machine';
export { AccessReconciler } from './engine/reconciler';
export type { ReconcileOptions } from './engine/reconciler';
export * from './report/diff-report';
export * from './storage/store';
export { createMemoryStore } from './storage/memory-store';
export { createFileStore } from './storage/file-store';
export { AuditService } from './audit/audit-service';
export type { AuditInput, AuditQueryOptions } from './audit/audit-service';
export { loadConfig, requireServiceConfig, requireDesiredStatePath } from './config';
export type { ReconcilerConfig, ServiceConfig, ConfigOverrides } from './config';
export { logger, createLogger, setLogHandler, resetLogHandler, setLogLevel, LogLevel } from './logger';
