/**
 * Domain table.
 *
 * One entry per permission domain binding together its document and report
 * keys, scope fields, known permission vocabulary, and the service calls
 * that fetch, grant and revoke it. Everything that iterates over domains
 * (reconciler, applier, loader, exporter, reports) reads from here.
 */

import {
  DOMAIN_ORDER,
  DOMAIN_SCOPE_FIELDS,
  PermissionDomain,
  PermissionRecord,
  RecordOf,
  ScopeField,
  ScopeValues,
  createPermissionRecord,
  scopeOf,
  subjectOf,
} from '../domain/permission';
import { PermissionService, RawPermissionEntry } from '../client/permission-service';

export interface DomainSpec<D extends PermissionDomain> {
  domain: D;
  /** Top-level key in the desired-state document. */
  documentKey: string;
  /** Key of this domain's section in the diff report. */
  reportKey: string;
  scopeFields: readonly ScopeField[];
  /** Permissions the server is known to accept for this domain. */
  vocabulary: readonly string[];
  fetch(service: PermissionService): Promise<RawPermissionEntry[]>;
  grant(service: PermissionService, record: RecordOf<D>): Promise<void>;
  revoke(service: PermissionService, record: RecordOf<D>): Promise<void>;
}

export type DomainSpecs = { readonly [D in PermissionDomain]: DomainSpec<D> };

/** The spec of some domain, narrowed by its `domain` field. */
export type AnyDomainSpec = DomainSpecs[PermissionDomain];

function keys(domain: PermissionDomain): Pick<DomainSpec<PermissionDomain>, 'documentKey' | 'reportKey' | 'scopeFields'> {
  const stem = domain.replace(/-/g, '_');
  return {
    documentKey: `${stem}_permissions`,
    reportKey: `${stem}_permissions_diff`,
    scopeFields: DOMAIN_SCOPE_FIELDS[domain],
  };
}

export const DOMAIN_SPECS: DomainSpecs = {
  [PermissionDomain.Global]: {
    domain: PermissionDomain.Global,
    ...keys(PermissionDomain.Global),
    vocabulary: ['ADMINISTER', 'BUILD', 'CLONE', 'EDIT', 'VIEW', 'CREATE', 'CREATEREPOSITORY', 'RESTRICTEDADMINISTER'],
    fetch: (service) => service.getGlobalPermissions(),
    grant(service, record) {
      const subject = subjectOf(record);
      return service.addGlobalPermission(record.permission, subject.type, subject.name);
    },
    revoke(service, record) {
      const subject = subjectOf(record);
      return service.removeGlobalPermission(record.permission, subject.type, subject.name);
    },
  },
  [PermissionDomain.BuildPlan]: {
    domain: PermissionDomain.BuildPlan,
    ...keys(PermissionDomain.BuildPlan),
    vocabulary: ['VIEW', 'EDIT', 'VIEWCONFIGURATION', 'BUILD', 'CLONE', 'ADMINISTER'],
    fetch: (service) => service.getBuildPlanPermissions(),
    grant(service, record) {
      const subject = subjectOf(record);
      return service.addBuildPlanPermission(
        record.permission,
        subject.type,
        subject.name,
        record.projectKey,
        record.planKey,
      );
    },
    revoke(service, record) {
      const subject = subjectOf(record);
      return service.removeBuildPlanPermission(
        record.permission,
        subject.type,
        subject.name,
        record.projectKey,
        record.planKey,
      );
    },
  },
  [PermissionDomain.Project]: {
    domain: PermissionDomain.Project,
    ...keys(PermissionDomain.Project),
    vocabulary: ['CREATEPLAN', 'ADMINISTER', 'VIEW', 'EDIT', 'BUILD', 'CLONE'],
    fetch: (service) => service.getProjectPermissions(),
    grant(service, record) {
      const subject = subjectOf(record);
      return service.addProjectPermission(record.permission, subject.type, subject.name, record.projectKey);
    },
    revoke(service, record) {
      const subject = subjectOf(record);
      return service.removeProjectPermission(record.permission, subject.type, subject.name, record.projectKey);
    },
  },
  [PermissionDomain.Deployment]: {
    domain: PermissionDomain.Deployment,
    ...keys(PermissionDomain.Deployment),
    vocabulary: ['VIEW', 'EDIT', 'ADMINISTER'],
    fetch: (service) => service.getDeploymentPermissions(),
    grant(service, record) {
      const subject = subjectOf(record);
      return service.addDeploymentPermission(record.permission, subject.type, subject.name);
    },
    revoke(service, record) {
      const subject = subjectOf(record);
      return service.removeDeploymentPermission(record.permission, subject.type, subject.name);
    },
  },
  [PermissionDomain.DeploymentProject]: {
    domain: PermissionDomain.DeploymentProject,
    ...keys(PermissionDomain.DeploymentProject),
    vocabulary: ['CREATEPLAN', 'VIEW', 'EDIT', 'ADMINISTER'],
    fetch: (service) => service.getDeploymentProjectPermissions(),
    grant(service, record) {
      const subject = subjectOf(record);
      return service.addDeploymentProjectPermission(record.permission, subject.type, subject.name, record.projectKey);
    },
    revoke(service, record) {
      const subject = subjectOf(record);
      return service.removeDeploymentProjectPermission(
        record.permission,
        subject.type,
        subject.name,
        record.projectKey,
      );
    },
  },
  [PermissionDomain.DeploymentEnvironment]: {
    domain: PermissionDomain.DeploymentEnvironment,
    ...keys(PermissionDomain.DeploymentEnvironment),
    vocabulary: ['VIEW', 'EDIT', 'DEPLOY'],
    fetch: (service) => service.getDeploymentEnvironmentPermissions(),
    grant(service, record) {
      const subject = subjectOf(record);
      return service.addDeploymentEnvironmentPermission(
        record.permission,
        subject.type,
        subject.name,
        record.projectKey,
        record.environmentId,
      );
    },
    revoke(service, record) {
      const subject = subjectOf(record);
      return service.removeDeploymentEnvironmentPermission(
        record.permission,
        subject.type,
        subject.name,
        record.projectKey,
        record.environmentId,
      );
    },
  },
};

export function domainSpec<D extends PermissionDomain>(domain: D): DomainSpec<D> {
  return DOMAIN_SPECS[domain];
}

/** Domain specs in processing order. */
export function orderedDomainSpecs(): AnyDomainSpec[] {
  return DOMAIN_ORDER.map((domain) => DOMAIN_SPECS[domain]);
}

/** Convert one raw service entry into a record of the given domain. */
export function normalizeEntry<D extends PermissionDomain>(domain: D, entry: RawPermissionEntry): RecordOf<D> {
  const scope: ScopeValues = {};
  for (const field of DOMAIN_SCOPE_FIELDS[domain]) {
    const value = entry[field];
    if (value !== undefined) scope[field] = String(value);
  }
  return createPermissionRecord(domain, {
    subjectName: entry.type === 'USER' ? entry.name : null,
    subjectGroup: entry.type === 'GROUP' ? entry.name : null,
    permission: entry.permission,
    scope,
  });
}

/** The service's native shape of a record. */
export function toRawEntry(record: PermissionRecord): RawPermissionEntry {
  const subject = subjectOf(record);
  return { type: subject.type, name: subject.name, permission: record.permission, ...scopeOf(record) };
}
