/**
 * In-memory permission service.
 *
 * Reference implementation for development and testing: holds raw entries
 * per domain, records every call, and can be told to fail selected calls.
 */

import {
  DOMAIN_ORDER,
  DOMAIN_SCOPE_FIELDS,
  PermissionDomain,
  PermissionRecord,
  SubjectType,
  parsePermissionDomain,
} from '../domain/permission';
import { PermissionServiceError } from '../domain/errors';
import { DesiredState } from '../desired-state/schema';
import { toRawEntry } from '../engine/domains';
import { ConnectFn, PermissionService, PermissionServiceConnection, RawPermissionEntry } from './permission-service';

/** One recorded call against the service. */
export interface ServiceCall {
  method: keyof PermissionService;
  args: string[];
}

interface FailureRule {
  method: keyof PermissionService;
  matches: (args: string[]) => boolean;
  error: Error;
}

function entryKey(domain: PermissionDomain, entry: RawPermissionEntry): string {
  return JSON.stringify([
    entry.type,
    entry.name,
    entry.permission,
    ...DOMAIN_SCOPE_FIELDS[domain].map((field) => String(entry[field] ?? '')),
  ]);
}

export class MemoryPermissionService implements PermissionServiceConnection {
  readonly calls: ServiceCall[] = [];
  closed = false;

  private entries = new Map<PermissionDomain, Map<string, RawPermissionEntry>>();
  private failures: FailureRule[] = [];

  constructor(seed?: Partial<Record<PermissionDomain, RawPermissionEntry[]>>) {
    for (const [domain, entries] of Object.entries(seed ?? {})) {
      const parsed = parsePermissionDomain(domain);
      if (parsed && entries) this.seed(parsed, entries);
    }
  }

  /** Add entries directly, bypassing the call log. */
  seed(domain: PermissionDomain, entries: RawPermissionEntry[]): void {
    const bucket = this.bucket(domain);
    for (const entry of entries) bucket.set(entryKey(domain, entry), { ...entry });
  }

  /** Current entries of a domain, in insertion order. */
  entriesOf(domain: PermissionDomain): RawPermissionEntry[] {
    return [...this.bucket(domain).values()].map((entry) => ({ ...entry }));
  }

  /**
   * Make calls to `method` throw. With `matches`, only calls whose
   * arguments satisfy it fail.
   */
  failOn(
    method: keyof PermissionService,
    matches: (args: string[]) => boolean = () => true,
    error: Error = new PermissionServiceError(`${method} failed`, 500),
  ): void {
    this.failures.push({ method, matches, error });
  }

  /** Recorded grant and revoke calls only. */
  mutations(): ServiceCall[] {
    return this.calls.filter((call) => call.method.startsWith('add') || call.method.startsWith('remove'));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  async getGlobalPermissions(): Promise<RawPermissionEntry[]> {
    return this.list('getGlobalPermissions', PermissionDomain.Global);
  }

  async addGlobalPermission(permission: string, type: SubjectType, name: string): Promise<void> {
    this.add('addGlobalPermission', PermissionDomain.Global, { permission, type, name });
  }

  async removeGlobalPermission(permission: string, type: SubjectType, name: string): Promise<void> {
    this.remove('removeGlobalPermission', PermissionDomain.Global, { permission, type, name });
  }

  async getBuildPlanPermissions(): Promise<RawPermissionEntry[]> {
    return this.list('getBuildPlanPermissions', PermissionDomain.BuildPlan);
  }

  async addBuildPlanPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
    planKey: string,
  ): Promise<void> {
    this.add('addBuildPlanPermission', PermissionDomain.BuildPlan, { permission, type, name, projectKey, planKey });
  }

  async removeBuildPlanPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
    planKey: string,
  ): Promise<void> {
    this.remove('removeBuildPlanPermission', PermissionDomain.BuildPlan, {
      permission,
      type,
      name,
      projectKey,
      planKey,
    });
  }

  async getProjectPermissions(): Promise<RawPermissionEntry[]> {
    return this.list('getProjectPermissions', PermissionDomain.Project);
  }

  async addProjectPermission(permission: string, type: SubjectType, name: string, projectKey: string): Promise<void> {
    this.add('addProjectPermission', PermissionDomain.Project, { permission, type, name, projectKey });
  }

  async removeProjectPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
  ): Promise<void> {
    this.remove('removeProjectPermission', PermissionDomain.Project, { permission, type, name, projectKey });
  }

  async getDeploymentPermissions(): Promise<RawPermissionEntry[]> {
    return this.list('getDeploymentPermissions', PermissionDomain.Deployment);
  }

  async addDeploymentPermission(permission: string, type: SubjectType, name: string): Promise<void> {
    this.add('addDeploymentPermission', PermissionDomain.Deployment, { permission, type, name });
  }

  async removeDeploymentPermission(permission: string, type: SubjectType, name: string): Promise<void> {
    this.remove('removeDeploymentPermission', PermissionDomain.Deployment, { permission, type, name });
  }

  async getDeploymentProjectPermissions(): Promise<RawPermissionEntry[]> {
    return this.list('getDeploymentProjectPermissions', PermissionDomain.DeploymentProject);
  }

  async addDeploymentProjectPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
  ): Promise<void> {
    this.add('addDeploymentProjectPermission', PermissionDomain.DeploymentProject, {
      permission,
      type,
      name,
      projectKey,
    });
  }

  async removeDeploymentProjectPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
  ): Promise<void> {
    this.remove('removeDeploymentProjectPermission', PermissionDomain.DeploymentProject, {
      permission,
      type,
      name,
      projectKey,
    });
  }

  async getDeploymentEnvironmentPermissions(): Promise<RawPermissionEntry[]> {
    return this.list('getDeploymentEnvironmentPermissions', PermissionDomain.DeploymentEnvironment);
  }

  async addDeploymentEnvironmentPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
    environmentId: string,
  ): Promise<void> {
    this.add('addDeploymentEnvironmentPermission', PermissionDomain.DeploymentEnvironment, {
      permission,
      type,
      name,
      projectKey,
      environmentId,
    });
  }

  async removeDeploymentEnvironmentPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
    environmentId: string,
  ): Promise<void> {
    this.remove('removeDeploymentEnvironmentPermission', PermissionDomain.DeploymentEnvironment, {
      permission,
      type,
      name,
      projectKey,
      environmentId,
    });
  }

  private bucket(domain: PermissionDomain): Map<string, RawPermissionEntry> {
    let bucket = this.entries.get(domain);
    if (!bucket) {
      bucket = new Map();
      this.entries.set(domain, bucket);
    }
    return bucket;
  }

  private record(method: keyof PermissionService, args: string[]): void {
    if (this.closed) {
      throw new PermissionServiceError('Connection is closed');
    }
    this.calls.push({ method, args });
    const rule = this.failures.find((candidate) => candidate.method === method && candidate.matches(args));
    if (rule) throw rule.error;
  }

  private list(method: keyof PermissionService, domain: PermissionDomain): RawPermissionEntry[] {
    this.record(method, []);
    return this.entriesOf(domain);
  }

  private add(method: keyof PermissionService, domain: PermissionDomain, entry: RawPermissionEntry): void {
    this.record(method, callArgs(domain, entry));
    this.bucket(domain).set(entryKey(domain, entry), entry);
  }

  private remove(method: keyof PermissionService, domain: PermissionDomain, entry: RawPermissionEntry): void {
    this.record(method, callArgs(domain, entry));
    this.bucket(domain).delete(entryKey(domain, entry));
  }
}

function callArgs(domain: PermissionDomain, entry: RawPermissionEntry): string[] {
  return [
    entry.permission,
    entry.type,
    entry.name,
    ...DOMAIN_SCOPE_FIELDS[domain].map((field) => String(entry[field] ?? '')),
  ];
}

/** A service seeded with the records of a state document. */
export function createSnapshotService(state: DesiredState): MemoryPermissionService {
  const service = new MemoryPermissionService();
  for (const domain of DOMAIN_ORDER) {
    const records: readonly PermissionRecord[] = state[domain];
    service.seed(domain, records.map(toRawEntry));
  }
  return service;
}

/**
 * Connect function over a snapshot. Each connection starts from the
 * snapshot again; changes applied through one are not seen by the next.
 */
export function snapshotConnector(state: DesiredState): ConnectFn {
  return async () => createSnapshotService(state);
}
