/**
 * Desired-state loader.
 *
 * Validates a parsed document and expands it into records, one per listed
 * permission. Every problem in the document is collected before failing so
 * a single SchemaError reports all of them.
 */

import {
  PermissionDomain,
  RecordOf,
  RecordSet,
  ScopeValues,
  createPermissionRecord,
} from '../domain/permission';
import { SchemaError, SchemaIssue } from '../domain/errors';
import { DomainSpec, domainSpec } from '../engine/domains';
import { isNonEmptyString, isRecord, readKey } from '../util/guards';
import { logger } from '../logger';
import {
  DesiredState,
  GROUP_KEY,
  LABEL_KEY,
  LEGACY_USER_KEY,
  PERMISSIONS_KEY,
  SCOPE_DOCUMENT_KEYS,
  USER_KEY,
  countDesiredRecords,
} from './schema';
import { readDesiredStateFile } from './parser';

const log = logger.child({ component: 'desired-state' });

interface SubjectRef {
  subjectName: string | null;
  subjectGroup: string | null;
}

function readSubject(entry: Record<string, unknown>, path: string, issues: SchemaIssue[]): SubjectRef | undefined {
  const present = [USER_KEY, GROUP_KEY, LEGACY_USER_KEY].filter((key) => entry[key] !== undefined);
  if (present.length !== 1) {
    issues.push({
      path,
      message:
        present.length === 0
          ? `Subject entry needs one of "${USER_KEY}", "${GROUP_KEY}" or "${LEGACY_USER_KEY}"`
          : `Subject entry has more than one of ${present.map((key) => `"${key}"`).join(', ')}`,
    });
    return undefined;
  }

  const key = present[0];
  const value = entry[key];
  if (!isNonEmptyString(value)) {
    issues.push({ path: `${path}.${key}`, message: 'Must be a non-empty string' });
    return undefined;
  }
  return key === GROUP_KEY
    ? { subjectName: null, subjectGroup: value }
    : { subjectName: value, subjectGroup: null };
}

function readPermissionList(value: unknown, path: string, issues: SchemaIssue[]): string[] {
  if (value === undefined) {
    issues.push({ path, message: `"${PERMISSIONS_KEY}" is required` });
    return [];
  }
  if (value === null) return [];
  if (!Array.isArray(value)) {
    issues.push({ path, message: 'Must be a list of permission names' });
    return [];
  }
  const permissions: string[] = [];
  value.forEach((item: unknown, index) => {
    if (isNonEmptyString(item)) {
      permissions.push(item);
    } else {
      issues.push({ path: `${path}[${index}]`, message: 'Permission must be a non-empty string' });
    }
  });
  return permissions;
}

function prefixIssues(err: unknown, path: string, issues: SchemaIssue[]): void {
  if (!(err instanceof SchemaError)) throw err;
  for (const issue of err.issues) {
    issues.push({ path: `${path}.${issue.path}`, message: issue.message });
  }
}

/**
 * Expand one subject entry into records of the domain. Without a scope
 * (its scope entry was invalid) the entry is only validated.
 */
function expandSubjectEntry<D extends PermissionDomain>(
  spec: DomainSpec<D>,
  entry: unknown,
  scope: ScopeValues | undefined,
  path: string,
  issues: SchemaIssue[],
): RecordOf<D>[] {
  if (!isRecord(entry)) {
    issues.push({ path, message: 'Subject entry must be a mapping' });
    return [];
  }
  const subject = readSubject(entry, path, issues);
  const permissions = readPermissionList(entry[PERMISSIONS_KEY], `${path}.${PERMISSIONS_KEY}`, issues);
  if (!subject || !scope) return [];

  const records: RecordOf<D>[] = [];
  for (const permission of permissions) {
    try {
      records.push(createPermissionRecord(spec.domain, { ...subject, permission, scope }));
    } catch (err) {
      prefixIssues(err, path, issues);
    }
  }
  return records;
}

function readScope(
  spec: Pick<DomainSpec<PermissionDomain>, 'scopeFields' | 'documentKey'>,
  entry: Record<string, unknown>,
  path: string,
  issues: SchemaIssue[],
): ScopeValues | undefined {
  const scope: ScopeValues = {};
  let complete = true;
  for (const field of spec.scopeFields) {
    const key = SCOPE_DOCUMENT_KEYS[field];
    const value = readKey(entry, key);
    if (value === undefined || value.trim().length === 0) {
      issues.push({ path: `${path}.${key}`, message: `"${key}" is required for ${spec.documentKey} entries` });
      complete = false;
    } else {
      scope[field] = value;
    }
  }
  return complete ? scope : undefined;
}

/** An unscoped entry that groups subject entries under a label. */
function isLabelledGroup(entry: Record<string, unknown>): boolean {
  const permissions = entry[PERMISSIONS_KEY];
  return Array.isArray(permissions) && permissions.some((item) => isRecord(item));
}

/** A `name` entry with nothing under it reads either as a bare label or as a user with no grants. */
function isEmptyNamedEntry(entry: Record<string, unknown>): boolean {
  const permissions = entry[PERMISSIONS_KEY];
  if (entry[LABEL_KEY] === undefined) return false;
  return permissions === null || (Array.isArray(permissions) && permissions.length === 0);
}

function loadDomain<D extends PermissionDomain>(
  spec: DomainSpec<D>,
  value: unknown,
  issues: SchemaIssue[],
): RecordOf<D>[] {
  const path = spec.documentKey;
  if (value === null) return [];
  if (!Array.isArray(value)) {
    issues.push({ path, message: 'Must be a list' });
    return [];
  }

  const records: RecordOf<D>[] = [];
  value.forEach((entry: unknown, index) => {
    const entryPath = `${path}[${index}]`;

    if (spec.scopeFields.length === 0) {
      if (isRecord(entry) && isEmptyNamedEntry(entry)) {
        log.warn('Named entry lists no permissions and grants nothing', {
          domain: spec.domain,
          path: entryPath,
          name: entry[LABEL_KEY],
        });
      }
      if (isRecord(entry) && isLabelledGroup(entry)) {
        if (entry[LABEL_KEY] !== undefined && !isNonEmptyString(entry[LABEL_KEY])) {
          issues.push({ path: `${entryPath}.${LABEL_KEY}`, message: 'Label must be a non-empty string' });
        }
        const group = entry[PERMISSIONS_KEY];
        const nested: unknown[] = Array.isArray(group) ? group : [];
        nested.forEach((subjectEntry, subjectIndex) => {
          records.push(
            ...expandSubjectEntry(spec, subjectEntry, {}, `${entryPath}.${PERMISSIONS_KEY}[${subjectIndex}]`, issues),
          );
        });
      } else {
        records.push(...expandSubjectEntry(spec, entry, {}, entryPath, issues));
      }
      return;
    }

    if (!isRecord(entry)) {
      issues.push({ path: entryPath, message: 'Scope entry must be a mapping' });
      return;
    }
    const scope = readScope(spec, entry, entryPath, issues);
    const subjects = entry[PERMISSIONS_KEY];
    if (subjects === undefined) {
      issues.push({ path: `${entryPath}.${PERMISSIONS_KEY}`, message: `"${PERMISSIONS_KEY}" is required` });
      return;
    }
    if (subjects === null) return;
    if (!Array.isArray(subjects)) {
      issues.push({ path: `${entryPath}.${PERMISSIONS_KEY}`, message: 'Must be a list of subject entries' });
      return;
    }
    subjects.forEach((subjectEntry: unknown, subjectIndex) => {
      const subjectPath = `${entryPath}.${PERMISSIONS_KEY}[${subjectIndex}]`;
      records.push(...expandSubjectEntry(spec, subjectEntry, scope, subjectPath, issues));
    });
  });

  return dedupe(spec, records);
}

function dedupe<D extends PermissionDomain>(spec: DomainSpec<D>, records: RecordOf<D>[]): RecordOf<D>[] {
  const set = new RecordSet<RecordOf<D>>();
  const unknownPermissions = new Set<string>();
  for (const record of records) {
    if (!set.add(record)) {
      log.warn('Duplicate desired permission ignored', {
        domain: spec.domain,
        subject: record.subjectName ?? record.subjectGroup,
        permission: record.permission,
      });
    }
    if (!spec.vocabulary.includes(record.permission)) unknownPermissions.add(record.permission);
  }
  for (const permission of unknownPermissions) {
    log.warn('Permission is not in the known vocabulary for this domain', { domain: spec.domain, permission });
  }
  return set.toArray();
}

/** Validate a parsed document and expand it into desired state. */
export function loadDesiredState(document: unknown): DesiredState {
  if (!isRecord(document)) {
    throw new SchemaError([{ path: '$', message: 'Desired state must be a mapping of permission sections' }]);
  }
  const sections: Record<string, unknown> = document;
  const issues: SchemaIssue[] = [];

  const section = <D extends PermissionDomain>(domain: D): RecordOf<D>[] => {
    const spec = domainSpec(domain);
    if (!(spec.documentKey in sections)) {
      issues.push({ path: spec.documentKey, message: 'Missing required section' });
      return [];
    }
    return loadDomain(spec, sections[spec.documentKey], issues);
  };

  const state: DesiredState = {
    [PermissionDomain.Global]: section(PermissionDomain.Global),
    [PermissionDomain.BuildPlan]: section(PermissionDomain.BuildPlan),
    [PermissionDomain.Project]: section(PermissionDomain.Project),
    [PermissionDomain.Deployment]: section(PermissionDomain.Deployment),
    [PermissionDomain.DeploymentProject]: section(PermissionDomain.DeploymentProject),
    [PermissionDomain.DeploymentEnvironment]: section(PermissionDomain.DeploymentEnvironment),
  };

  if (issues.length > 0) {
    throw new SchemaError(issues);
  }
  return state;
}

/** Read, parse and validate a desired-state file. */
export async function loadDesiredStateFile(path: string): Promise<DesiredState> {
  const document = await readDesiredStateFile(path);
  const state = loadDesiredState(document);
  log.info('Desired state loaded', { path, records: countDesiredRecords(state) });
  return state;
}
