/**
 * Permission service contract.
 *
 * The reconciler only ever talks to the server through this interface: one
 * get/add/remove triple per domain, mirroring the server's own endpoints.
 * Entries are in the service's native shape, one entry per permission.
 */

import { SubjectType } from '../domain/permission';

/** A permission entry as the service reports it. */
export interface RawPermissionEntry {
  type: SubjectType;
  name: string;
  permission: string;
  projectKey?: string;
  planKey?: string;
  environmentId?: string | number;
}

export interface PermissionService {
  getGlobalPermissions(): Promise<RawPermissionEntry[]>;
  addGlobalPermission(permission: string, type: SubjectType, name: string): Promise<void>;
  removeGlobalPermission(permission: string, type: SubjectType, name: string): Promise<void>;

  getBuildPlanPermissions(): Promise<RawPermissionEntry[]>;
  addBuildPlanPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
    planKey: string,
  ): Promise<void>;
  removeBuildPlanPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
    planKey: string,
  ): Promise<void>;

  getProjectPermissions(): Promise<RawPermissionEntry[]>;
  addProjectPermission(permission: string, type: SubjectType, name: string, projectKey: string): Promise<void>;
  removeProjectPermission(permission: string, type: SubjectType, name: string, projectKey: string): Promise<void>;

  getDeploymentPermissions(): Promise<RawPermissionEntry[]>;
  addDeploymentPermission(permission: string, type: SubjectType, name: string): Promise<void>;
  removeDeploymentPermission(permission: string, type: SubjectType, name: string): Promise<void>;

  getDeploymentProjectPermissions(): Promise<RawPermissionEntry[]>;
  addDeploymentProjectPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
  ): Promise<void>;
  removeDeploymentProjectPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
  ): Promise<void>;

  getDeploymentEnvironmentPermissions(): Promise<RawPermissionEntry[]>;
  addDeploymentEnvironmentPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
    environmentId: string,
  ): Promise<void>;
  removeDeploymentEnvironmentPermission(
    permission: string,
    type: SubjectType,
    name: string,
    projectKey: string,
    environmentId: string,
  ): Promise<void>;
}

/** A service handle that holds resources until closed. */
export interface PermissionServiceConnection extends PermissionService {
  close(): Promise<void>;
}

/** Opens a connection; setup failures propagate to the caller. */
export type ConnectFn = () => Promise<PermissionServiceConnection>;

/**
 * Acquire a connection for the duration of `fn` and release it afterwards,
 * whether `fn` resolves or throws.
 */
export async function withConnection<T>(
  connect: ConnectFn,
  fn: (service: PermissionService) => Promise<T>,
): Promise<T> {
  const connection = await connect();
  try {
    return await fn(connection);
  } finally {
    await connection.close();
  }
}
