/**
 * Permission record domain model.
 *
 * A record is one "who has what, where" grant, normalized so that current
 * state (from the server) and desired state (from the document) compare
 * structurally. Records only ever carry `value: true`: a grant that is not
 * present as a record is not granted.
 */

import { SchemaError, SchemaIssue } from './errors';

/** The six permission domains. */
export enum PermissionDomain {
  Global = 'global',
  BuildPlan = 'build-plan',
  Project = 'project',
  Deployment = 'deployment',
  DeploymentProject = 'deployment-project',
  DeploymentEnvironment = 'deployment-environment',
}

/** Fixed processing order; reports follow it too. */
export const DOMAIN_ORDER: readonly PermissionDomain[] = [
  PermissionDomain.Global,
  PermissionDomain.BuildPlan,
  PermissionDomain.Project,
  PermissionDomain.Deployment,
  PermissionDomain.DeploymentProject,
  PermissionDomain.DeploymentEnvironment,
];

/** Narrow an arbitrary string to a domain tag. */
export function parsePermissionDomain(value: string): PermissionDomain | undefined {
  return DOMAIN_ORDER.find((domain) => domain === value);
}

/** Scope qualifier field names. */
export type ScopeField = 'projectKey' | 'planKey' | 'environmentId';

/** Scope qualifiers each domain requires, in key order. */
export const DOMAIN_SCOPE_FIELDS: Readonly<Record<PermissionDomain, readonly ScopeField[]>> = {
  [PermissionDomain.Global]: [],
  [PermissionDomain.BuildPlan]: ['projectKey', 'planKey'],
  [PermissionDomain.Project]: ['projectKey'],
  [PermissionDomain.Deployment]: [],
  [PermissionDomain.DeploymentProject]: ['projectKey'],
  [PermissionDomain.DeploymentEnvironment]: ['projectKey', 'environmentId'],
};

/** Fields shared by every domain's record. */
export interface PermissionRecordBase {
  /** User identity; null when the grant is to a group. */
  readonly subjectName: string | null;
  /** Group identity; null when the grant is to a user. */
  readonly subjectGroup: string | null;
  readonly permission: string;
  readonly value: true;
}

export interface GlobalPermissionRecord extends PermissionRecordBase {
  readonly domain: PermissionDomain.Global;
}

export interface BuildPlanPermissionRecord extends PermissionRecordBase {
  readonly domain: PermissionDomain.BuildPlan;
  readonly projectKey: string;
  readonly planKey: string;
}

export interface ProjectPermissionRecord extends PermissionRecordBase {
  readonly domain: PermissionDomain.Project;
  readonly projectKey: string;
}

export interface DeploymentPermissionRecord extends PermissionRecordBase {
  readonly domain: PermissionDomain.Deployment;
}

export interface DeploymentProjectPermissionRecord extends PermissionRecordBase {
  readonly domain: PermissionDomain.DeploymentProject;
  readonly projectKey: string;
}

export interface DeploymentEnvironmentPermissionRecord extends PermissionRecordBase {
  readonly domain: PermissionDomain.DeploymentEnvironment;
  readonly projectKey: string;
  readonly environmentId: string;
}

export type PermissionRecord =
  | GlobalPermissionRecord
  | BuildPlanPermissionRecord
  | ProjectPermissionRecord
  | DeploymentPermissionRecord
  | DeploymentProjectPermissionRecord
  | DeploymentEnvironmentPermissionRecord;

/** The record shape of one domain. */
export type RecordOf<D extends PermissionDomain> = Extract<PermissionRecord, { domain: D }>;

/** Scope qualifier values, as read from a document or a raw service entry. */
export type ScopeValues = Partial<Record<ScopeField, string>>;

/** Unvalidated input for createPermissionRecord. */
export interface PermissionRecordInput {
  subjectName?: string | null;
  subjectGroup?: string | null;
  permission: string;
  scope?: ScopeValues;
}

/** Subject kind as the permission service names it. */
export type SubjectType = 'USER' | 'GROUP';

export interface Subject {
  type: SubjectType;
  name: string;
}

type RecordBuilders = {
  [D in PermissionDomain]: (base: PermissionRecordBase, scope: Record<ScopeField, string>) => RecordOf<D>;
};

const RECORD_BUILDERS: RecordBuilders = {
  [PermissionDomain.Global]: (base) => ({ domain: PermissionDomain.Global, ...base }),
  [PermissionDomain.BuildPlan]: (base, scope) => ({
    domain: PermissionDomain.BuildPlan,
    ...base,
    projectKey: scope.projectKey,
    planKey: scope.planKey,
  }),
  [PermissionDomain.Project]: (base, scope) => ({
    domain: PermissionDomain.Project,
    ...base,
    projectKey: scope.projectKey,
  }),
  [PermissionDomain.Deployment]: (base) => ({ domain: PermissionDomain.Deployment, ...base }),
  [PermissionDomain.DeploymentProject]: (base, scope) => ({
    domain: PermissionDomain.DeploymentProject,
    ...base,
    projectKey: scope.projectKey,
  }),
  [PermissionDomain.DeploymentEnvironment]: (base, scope) => ({
    domain: PermissionDomain.DeploymentEnvironment,
    ...base,
    projectKey: scope.projectKey,
    environmentId: scope.environmentId,
  }),
};

function isPresent(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Validate input and build an immutable record for a domain.
 * Throws SchemaError listing every problem found.
 */
export function createPermissionRecord<D extends PermissionDomain>(
  domain: D,
  input: PermissionRecordInput,
): RecordOf<D> {
  const issues: SchemaIssue[] = [];
  const hasName = isPresent(input.subjectName);
  const hasGroup = isPresent(input.subjectGroup);

  if (hasName && hasGroup) {
    issues.push({ path: 'subject', message: 'Exactly one of subjectName or subjectGroup may be set, not both' });
  } else if (!hasName && !hasGroup) {
    issues.push({ path: 'subject', message: 'One of subjectName or subjectGroup is required' });
  }

  if (!isPresent(input.permission)) {
    issues.push({ path: 'permission', message: 'Permission must be a non-empty string' });
  }

  const scope: Record<ScopeField, string> = { projectKey: '', planKey: '', environmentId: '' };
  for (const field of DOMAIN_SCOPE_FIELDS[domain]) {
    const value = input.scope?.[field];
    if (isPresent(value)) {
      scope[field] = value.trim();
    } else {
      issues.push({ path: field, message: `${field} is required for ${domain} permissions` });
    }
  }

  if (issues.length > 0) {
    throw new SchemaError(issues);
  }

  const base: PermissionRecordBase = {
    subjectName: hasName && input.subjectName ? input.subjectName.trim() : null,
    subjectGroup: hasGroup && input.subjectGroup ? input.subjectGroup.trim() : null,
    permission: input.permission.trim(),
    value: true,
  };

  const record = RECORD_BUILDERS[domain](base, scope);
  Object.freeze(record);
  return record;
}

/** The subject a record grants to. */
export function subjectOf(record: PermissionRecord): Subject {
  if (record.subjectName !== null) return { type: 'USER', name: record.subjectName };
  if (record.subjectGroup !== null) return { type: 'GROUP', name: record.subjectGroup };
  throw new SchemaError([{ path: 'subject', message: 'Record has no subject' }]);
}

/** Scope qualifier values of a record, keyed by field. */
export function scopeOf(record: PermissionRecord): ScopeValues {
  switch (record.domain) {
    case PermissionDomain.BuildPlan:
      return { projectKey: record.projectKey, planKey: record.planKey };
    case PermissionDomain.Project:
    case PermissionDomain.DeploymentProject:
      return { projectKey: record.projectKey };
    case PermissionDomain.DeploymentEnvironment:
      return { projectKey: record.projectKey, environmentId: record.environmentId };
    case PermissionDomain.Global:
    case PermissionDomain.Deployment:
      return {};
  }
}

const SUBJECT_RANK: Record<SubjectType, string> = { USER: '0', GROUP: '1' };

function sortTuple(record: PermissionRecord): string[] {
  const subject = subjectOf(record);
  const scope = scopeOf(record);
  return [
    record.domain,
    SUBJECT_RANK[subject.type],
    subject.name,
    ...DOMAIN_SCOPE_FIELDS[record.domain].map((field) => scope[field] ?? ''),
    record.permission,
  ];
}

/**
 * Structural identity over domain, subject, scope and permission.
 * `value` is deliberately excluded.
 */
export function identityKey(record: PermissionRecord): string {
  return JSON.stringify(sortTuple(record));
}

/** Deterministic ordering: users before groups, then name, scope, permission. */
export function compareRecords(a: PermissionRecord, b: PermissionRecord): number {
  const left = sortTuple(a);
  const right = sortTuple(b);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    if (left[i] < right[i]) return -1;
    if (left[i] > right[i]) return 1;
  }
  return left.length - right.length;
}

/** Return a sorted copy. */
export function sortRecords<R extends PermissionRecord>(records: Iterable<R>): R[] {
  return [...records].sort(compareRecords);
}

/** Insertion-ordered set of records keyed by identityKey. */
export class RecordSet<R extends PermissionRecord = PermissionRecord> implements Iterable<R> {
  private entries = new Map<string, R>();

  constructor(records?: Iterable<R>) {
    if (records) {
      for (const record of records) this.add(record);
    }
  }

  /** Add a record; returns false when an equal record was already present. */
  add(record: R): boolean {
    const key = identityKey(record);
    if (this.entries.has(key)) return false;
    this.entries.set(key, record);
    return true;
  }

  has(record: PermissionRecord): boolean {
    return this.entries.has(identityKey(record));
  }

  get size(): number {
    return this.entries.size;
  }

  toArray(): R[] {
    return [...this.entries.values()];
  }

  [Symbol.iterator](): Iterator<R> {
    return this.entries.values();
  }
}
