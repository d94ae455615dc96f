/**
 * Desired-state document vocabulary.
 *
 * ```yaml
 * global_permissions:
 *   - group: bamboo-admins
 *     permissions: [ADMINISTER]
 * build_plan_permissions:
 *   - project: CORE
 *     plan: API
 *     permissions:
 *       - user: jdoe
 *         permissions: [VIEW, BUILD]
 * deployment_environment_permissions:
 *   - project: 65537
 *     environment: 98305
 *     permissions:
 *       - group: release-managers
 *         permissions: [DEPLOY]
 * ```
 */

import { PermissionDomain, RecordOf, ScopeField } from '../domain/permission';

/** Document key for each record scope field. */
export const SCOPE_DOCUMENT_KEYS: Readonly<Record<ScopeField, string>> = {
  projectKey: 'project',
  planKey: 'plan',
  environmentId: 'environment',
};

/** Keys naming the subject of an entry; `name` is read as a user. */
export const USER_KEY = 'user';
export const GROUP_KEY = 'group';
export const LEGACY_USER_KEY = 'name';

export const PERMISSIONS_KEY = 'permissions';

/** Optional label on an unscoped domain's entry; carries no meaning. */
export const LABEL_KEY = 'name';

/** Validated desired state: one deduplicated record list per domain. */
export type DesiredState = { readonly [D in PermissionDomain]: readonly RecordOf<D>[] };

export function emptyDesiredState(): DesiredState {
  return {
    [PermissionDomain.Global]: [],
    [PermissionDomain.BuildPlan]: [],
    [PermissionDomain.Project]: [],
    [PermissionDomain.Deployment]: [],
    [PermissionDomain.DeploymentProject]: [],
    [PermissionDomain.DeploymentEnvironment]: [],
  };
}

/** Total record count across all domains. */
export function countDesiredRecords(state: DesiredState): number {
  return Object.values(state).reduce((total, records) => total + records.length, 0);
}
