import {
  BuildPlanPermissionRecord,
  GlobalPermissionRecord,
  PermissionDomain,
  createPermissionRecord,
} from '../src/domain/permission';
import { DesiredState, emptyDesiredState } from '../src/desired-state/schema';

export function globalUser(name: string, permission: string): GlobalPermissionRecord {
  return createPermissionRecord(PermissionDomain.Global, { subjectName: name, permission });
}

export function globalGroup(name: string, permission: string): GlobalPermissionRecord {
  return createPermissionRecord(PermissionDomain.Global, { subjectGroup: name, permission });
}

export function planUser(
  name: string,
  permission: string,
  projectKey: string,
  planKey: string,
): BuildPlanPermissionRecord {
  return createPermissionRecord(PermissionDomain.BuildPlan, {
    subjectName: name,
    permission,
    scope: { projectKey, planKey },
  });
}

export function desiredWith(partial: Partial<DesiredState>): DesiredState {
  return { ...emptyDesiredState(), ...partial };
}

/** A document touching every domain. */
export const FULL_DOCUMENT = `
global_permissions:
  - group: bamboo-admins
    permissions: [ADMINISTER]
  - user: jdoe
    permissions: [VIEW, BUILD]
build_plan_permissions:
  - project: CORE
    plan: API
    permissions:
      - user: jdoe
        permissions: [VIEW]
      - group: developers
        permissions: [VIEW, BUILD]
project_permissions:
  - project: CORE
    permissions:
      - group: developers
        permissions: [CREATEPLAN]
deployment_permissions:
  - name: release tooling
    permissions:
      - group: release-managers
        permissions: [VIEW]
deployment_project_permissions:
  - project: 65537
    permissions:
      - user: deployer
        permissions: [EDIT]
deployment_environment_permissions:
  - project: 65537
    environment: 98305
    permissions:
      - group: release-managers
        permissions: [DEPLOY]
`;
