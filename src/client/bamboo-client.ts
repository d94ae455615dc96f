/**
 * Bamboo permission client, the REST implementation of PermissionService.
 *
 * Endpoints (relative to `<baseUrl>/rest/api/latest/`):
 *
 *   GET    permissions/<scope>/users|groups?start=&limit=   list grants
 *   PUT    permissions/<scope>/users|groups/<name>          body: [permission]
 *   DELETE permissions/<scope>/users|groups/<name>          body: [permission]
 *
 * where <scope> is `global`, `plan/<PROJECT>-<PLAN>`, `project/<PROJECT>`,
 * `deployment`, `deployment/<deploymentProjectId>` or
 * `environment/<environmentId>`. Scoped listings first discover their
 * scopes through `plan`, `project` and `deploy/project/all`.
 *
 * Timeouts are enforced per request here; the reconciler has none of its own.
 */

import { SubjectType } from '../domain/permission';
import { PermissionServiceError, ServiceConnectionError, errorMessage } from '../domain/errors';
import { isRecord, isStringArray, readKey } from '../util/guards';
import { logger } from '../logger';
import { PermissionServiceConnection, RawPermissionEntry } from './permission-service';

/** The subset of fetch the client uses (injectable for testing). */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface BambooClientConfig {
  /** Server root, e.g. https://bamboo.example.com */
  baseUrl: string;
  username?: string;
  password?: string;
  /** Personal access token; takes precedence over username/password. */
  token?: string;
  /** Per-request timeout in milliseconds. */
  timeoutMs: number;
  /** Page size for paginated listings. */
  pageSize: number;
  fetchFn?: FetchFn;
}

type ScopeEntry = Pick<RawPermissionEntry, 'projectKey' | 'planKey' | 'environmentId'>;

interface DeploymentProjectScope {
  id: string;
  environmentIds: string[];
}

const SUBJECT_SEGMENT: Record<SubjectType, string> = {
  USER: 'users',
  GROUP: 'groups',
};

const log = logger.child({ component: 'bamboo-client' });

export class BambooPermissionClient implements PermissionServiceConnection {
  private readonly apiRoot: string;
  private readonly fetchFn: FetchFn;
  private closed = false;

  constructor(private readonly config: BambooClientConfig) {
    this.apiRoot = `${config.baseUrl.replace(/\/+$/, '')}/rest/api/latest`;
    this.fetchFn = config.fetchFn ?? ((url, init) => fetch(url, init));
  }

  /** Verify the server is reachable and the credentials are accepted. */
  async ping(): Promise<void> {
    await this.request('GET', 'currentUser');
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  // --- global ---

  getGlobalPermissions(): Promise<RawPermissionEntry[]> {
    return this.listScope('permissions/global', {});
  }

  addGlobalPermission(permission: string, type: SubjectType, name: string): Promise<void> {
    return this.change('PUT', 'permissions/global', type, name, permission);
  }

  removeGlobalPermission(permission: string, type: SubjectType, name: string): Promise<void> {
    return this.change('DELETE', 'permissions/global', type, name, permission);
  }

  // --- build plans ---

  async getBuildPlanPermissions(): Promise<RawPermissionEntry[]> {
    const plans = await this.listPlans();
    const entries: RawPermissionEntry[] = [];
    for (const plan of plans) {
      entries.push(
        ...(await this.listScope(planPath(plan.projectKey, plan.planKey), plan)),
      );
    }
    return entries;
  }

  addBuildPlanPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
    planKey: string,
  ): Promise<void> {
    return this.change('PUT', planPath(projectKey, planKey), type, name, permission);
  }

  removeBuildPlanPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
    planKey: string,
  ): Promise<void> {
    return this.change('DELETE', planPath(projectKey, planKey), type, name, permission);
  }

  // --- projects ---

  async getProjectPermissions(): Promise<RawPermissionEntry[]> {
    const projectKeys = await this.listProjectKeys();
    const entries: RawPermissionEntry[] = [];
    for (const projectKey of projectKeys) {
      entries.push(...(await this.listScope(`permissions/project/${segment(projectKey)}`, { projectKey })));
    }
    return entries;
  }

  addProjectPermission(permission: string, type: SubjectType, name: string, projectKey: string): Promise<void> {
    return this.change('PUT', `permissions/project/${segment(projectKey)}`, type, name, permission);
  }

  removeProjectPermission(permission: string, type: SubjectType, name: string, projectKey: string): Promise<void> {
    return this.change('DELETE', `permissions/project/${segment(projectKey)}`, type, name, permission);
  }

  // --- deployment (unscoped) ---

  getDeploymentPermissions(): Promise<RawPermissionEntry[]> {
    return this.listScope('permissions/deployment', {});
  }

  addDeploymentPermission(permission: string, type: SubjectType, name: string): Promise<void> {
    return this.change('PUT', 'permissions/deployment', type, name, permission);
  }

  removeDeploymentPermission(permission: string, type: SubjectType, name: string): Promise<void> {
    return this.change('DELETE', 'permissions/deployment', type, name, permission);
  }

  // --- deployment projects ---

  async getDeploymentProjectPermissions(): Promise<RawPermissionEntry[]> {
    const projects = await this.listDeploymentProjects();
    const entries: RawPermissionEntry[] = [];
    for (const project of projects) {
      entries.push(
        ...(await this.listScope(`permissions/deployment/${segment(project.id)}`, { projectKey: project.id })),
      );
    }
    return entries;
  }

  addDeploymentProjectPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
  ): Promise<void> {
    return this.change('PUT', `permissions/deployment/${segment(projectKey)}`, type, name, permission);
  }

  removeDeploymentProjectPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
  ): Promise<void> {
    return this.change('DELETE', `permissions/deployment/${segment(projectKey)}`, type, name, permission);
  }

  // --- deployment environments ---

  async getDeploymentEnvironmentPermissions(): Promise<RawPermissionEntry[]> {
    const projects = await this.listDeploymentProjects();
    const entries: RawPermissionEntry[] = [];
    for (const project of projects) {
      for (const environmentId of project.environmentIds) {
        entries.push(
          ...(await this.listScope(`permissions/environment/${segment(environmentId)}`, {
            projectKey: project.id,
            environmentId,
          })),
        );
      }
    }
    return entries;
  }

  addDeploymentEnvironmentPermission(
    permission: string,
    type: SubjectType,
    name: string,
    _projectKey: string,
    environmentId: string,
  ): Promise<void> {
    return this.change('PUT', `permissions/environment/${segment(environmentId)}`, type, name, permission);
  }

  removeDeploymentEnvironmentPermission(
    permission: string,
    type: SubjectType,
    name: string,
    _projectKey: string,
    environmentId: string,
  ): Promise<void> {
    return this.change('DELETE', `permissions/environment/${segment(environmentId)}`, type, name, permission);
  }

  // --- scope discovery ---

  private async listPlans(): Promise<Array<{ projectKey: string; planKey: string }>> {
    const plans: Array<{ projectKey: string; planKey: string }> = [];
    for (let start = 0; ; start += this.config.pageSize) {
      const body = await this.request('GET', `plan?start-index=${start}&max-result=${this.config.pageSize}`);
      const container: Record<string, unknown> = isRecord(body) && isRecord(body.plans) ? body.plans : {};
      const page: unknown[] = Array.isArray(container.plan) ? container.plan : [];
      for (const item of page) {
        if (!isRecord(item)) continue;
        const projectKey = readKey(item, 'projectKey');
        const planKey = readKey(item, 'shortKey');
        if (projectKey && planKey) plans.push({ projectKey, planKey });
      }
      const total = typeof container.size === 'number' ? container.size : undefined;
      if (page.length < this.config.pageSize || (total !== undefined && start + page.length >= total)) break;
    }
    return plans;
  }

  private async listProjectKeys(): Promise<string[]> {
    const keys: string[] = [];
    for (let start = 0; ; start += this.config.pageSize) {
      const body = await this.request('GET', `project?start-index=${start}&max-result=${this.config.pageSize}`);
      const container: Record<string, unknown> = isRecord(body) && isRecord(body.projects) ? body.projects : {};
      const page: unknown[] = Array.isArray(container.project) ? container.project : [];
      for (const item of page) {
        const key = isRecord(item) ? readKey(item, 'key') : undefined;
        if (key) keys.push(key);
      }
      const total = typeof container.size === 'number' ? container.size : undefined;
      if (page.length < this.config.pageSize || (total !== undefined && start + page.length >= total)) break;
    }
    return keys;
  }

  private async listDeploymentProjects(): Promise<DeploymentProjectScope[]> {
    const body = await this.request('GET', 'deploy/project/all');
    if (!Array.isArray(body)) {
      throw new PermissionServiceError('Unexpected deployment project listing: expected an array');
    }
    const items: unknown[] = body;
    const projects: DeploymentProjectScope[] = [];
    for (const item of items) {
      if (!isRecord(item)) continue;
      const id = readKey(item, 'id');
      if (!id) continue;
      const environments: unknown[] = Array.isArray(item.environments) ? item.environments : [];
      const environmentIds = environments
        .map((env) => (isRecord(env) ? readKey(env, 'id') : undefined))
        .filter((envId): envId is string => envId !== undefined);
      projects.push({ id, environmentIds });
    }
    return projects;
  }

  // --- transport ---

  /** List every user and group grant under one scope path, flattened. */
  private async listScope(scopePath: string, scope: ScopeEntry): Promise<RawPermissionEntry[]> {
    const entries: RawPermissionEntry[] = [];
    for (const type of ['USER', 'GROUP'] as const) {
      for (let start = 0; ; start += this.config.pageSize) {
        const body = await this.request(
          'GET',
          `${scopePath}/${SUBJECT_SEGMENT[type]}?start=${start}&limit=${this.config.pageSize}`,
        );
        const results: unknown[] = isRecord(body) && Array.isArray(body.results) ? body.results : [];
        for (const item of results) {
          if (!isRecord(item) || typeof item.name !== 'string' || !isStringArray(item.permissions)) continue;
          for (const permission of item.permissions) {
            entries.push({ type, name: item.name, permission, ...scope });
          }
        }
        const lastPage = isRecord(body) && body.isLastPage === true;
        if (lastPage || results.length < this.config.pageSize) break;
      }
    }
    return entries;
  }

  private async change(
    method: 'PUT' | 'DELETE',
    scopePath: string,
    type: SubjectType,
    name: string,
    permission: string,
  ): Promise<void> {
    await this.request(method, `${scopePath}/${SUBJECT_SEGMENT[type]}/${segment(name)}`, [permission]);
  }

  private authorizationHeader(): string | undefined {
    if (this.config.token) return `Bearer ${this.config.token}`;
    if (this.config.username) {
      const credentials = Buffer.from(`${this.config.username}:${this.config.password ?? ''}`).toString('base64');
      return `Basic ${credentials}`;
    }
    return undefined;
  }

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    if (this.closed) {
      throw new PermissionServiceError('Connection is closed');
    }

    const url = `${this.apiRoot}/${path}`;
    const headers: Record<string, string> = { Accept: 'application/json' };
    const authorization = this.authorizationHeader();
    if (authorization) headers.Authorization = authorization;
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    log.debug('Permission service request', { method, path });

    let res: Response;
    try {
      res = await this.fetchFn(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === 'TimeoutError';
      throw new PermissionServiceError(
        timedOut
          ? `${method} ${path} timed out after ${this.config.timeoutMs}ms`
          : `${method} ${path} failed: ${errorMessage(err)}`,
        undefined,
        { method, path },
      );
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new PermissionServiceError(
        `${method} ${path} returned HTTP ${res.status}: ${text.slice(0, 200)}`,
        res.status,
        { method, path },
      );
    }

    const text = await res.text();
    if (text.trim().length === 0) return undefined;
    try {
      return JSON.parse(text);
    } catch {
      throw new PermissionServiceError(`${method} ${path} returned non-JSON body: ${text.slice(0, 200)}`, res.status);
    }
  }
}

function segment(value: string): string {
  return encodeURIComponent(value);
}

function planPath(projectKey: string, planKey: string): string {
  return `permissions/plan/${segment(`${projectKey}-${planKey}`)}`;
}

/**
 * Open a client and check reachability. A failure here is a setup error:
 * the run cannot start without the service.
 */
export async function connectBambooClient(config: BambooClientConfig): Promise<BambooPermissionClient> {
  const client = new BambooPermissionClient(config);
  try {
    await client.ping();
  } catch (err) {
    throw new ServiceConnectionError(config.baseUrl, err);
  }
  log.info('Connected to permission service', { baseUrl: config.baseUrl });
  return client;
}
