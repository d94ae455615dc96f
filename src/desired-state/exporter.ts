/**
 * Desired-state exporter: the inverse of the loader.
 *
 * Turns records (typically the server's current permissions) into a
 * document the loader accepts, grouped by scope and then by subject, so a
 * desired-state file can be bootstrapped from a live server.
 */

import YAML from 'yaml';
import {
  PermissionDomain,
  PermissionRecord,
  RecordOf,
  scopeOf,
  sortRecords,
  subjectOf,
} from '../domain/permission';
import { FetchError } from '../domain/errors';
import { PermissionService } from '../client/permission-service';
import { DomainSpec, domainSpec, normalizeEntry, orderedDomainSpecs } from '../engine/domains';
import { DesiredState, GROUP_KEY, PERMISSIONS_KEY, SCOPE_DOCUMENT_KEYS, USER_KEY } from './schema';

export interface SubjectEntry {
  user?: string;
  group?: string;
  permissions: string[];
}

export type ScopeEntry = Record<string, string | SubjectEntry[]>;

export type DesiredStateDocument = Record<string, SubjectEntry[] | ScopeEntry[]>;

/** Group sorted records into subject entries, preserving first-seen order. */
function subjectEntries(records: readonly PermissionRecord[]): SubjectEntry[] {
  const entries = new Map<string, SubjectEntry>();
  for (const record of records) {
    const subject = subjectOf(record);
    const key = `${subject.type}:${subject.name}`;
    let entry = entries.get(key);
    if (!entry) {
      entry = subject.type === 'GROUP'
        ? { [GROUP_KEY]: subject.name, [PERMISSIONS_KEY]: [] }
        : { [USER_KEY]: subject.name, [PERMISSIONS_KEY]: [] };
      entries.set(key, entry);
    }
    entry.permissions.push(record.permission);
  }
  return [...entries.values()];
}

function exportDomain<D extends PermissionDomain>(
  spec: DomainSpec<D>,
  records: readonly RecordOf<D>[],
): SubjectEntry[] | ScopeEntry[] {
  const sorted = sortRecords(records);
  if (spec.scopeFields.length === 0) {
    return subjectEntries(sorted);
  }

  const byScope = new Map<string, { scope: Record<string, string>; records: PermissionRecord[] }>();
  for (const record of sorted) {
    const values = scopeOf(record);
    const scope: Record<string, string> = {};
    for (const field of spec.scopeFields) {
      scope[SCOPE_DOCUMENT_KEYS[field]] = values[field] ?? '';
    }
    const key = JSON.stringify(scope);
    const group = byScope.get(key) ?? { scope, records: [] };
    group.records.push(record);
    byScope.set(key, group);
  }

  return [...byScope.values()]
    .sort((a, b) => compareScopes(a.scope, b.scope))
    .map((group): ScopeEntry => ({ ...group.scope, [PERMISSIONS_KEY]: subjectEntries(group.records) }));
}

function compareScopes(a: Record<string, string>, b: Record<string, string>): number {
  const left = JSON.stringify(Object.values(a));
  const right = JSON.stringify(Object.values(b));
  return left < right ? -1 : left > right ? 1 : 0;
}

/** Build a desired-state document from records. */
export function exportDesiredState(state: DesiredState): DesiredStateDocument {
  const document: DesiredStateDocument = {};
  const add = <D extends PermissionDomain>(domain: D): void => {
    const spec = domainSpec(domain);
    document[spec.documentKey] = exportDomain(spec, state[domain]);
  };
  for (const spec of orderedDomainSpecs()) add(spec.domain);
  return document;
}

/** Fetch every domain from the service and normalize it into records. */
export async function fetchCurrentState(service: PermissionService): Promise<DesiredState> {
  const fetchDomain = async <D extends PermissionDomain>(domain: D): Promise<RecordOf<D>[]> => {
    const spec = domainSpec(domain);
    try {
      const entries = await spec.fetch(service);
      return sortRecords(entries.map((entry) => normalizeEntry(domain, entry)));
    } catch (err) {
      throw new FetchError(domain, err);
    }
  };

  return {
    [PermissionDomain.Global]: await fetchDomain(PermissionDomain.Global),
    [PermissionDomain.BuildPlan]: await fetchDomain(PermissionDomain.BuildPlan),
    [PermissionDomain.Project]: await fetchDomain(PermissionDomain.Project),
    [PermissionDomain.Deployment]: await fetchDomain(PermissionDomain.Deployment),
    [PermissionDomain.DeploymentProject]: await fetchDomain(PermissionDomain.DeploymentProject),
    [PermissionDomain.DeploymentEnvironment]: await fetchDomain(PermissionDomain.DeploymentEnvironment),
  };
}

/** Export the service's current permissions as a desired-state document. */
export async function exportCurrentState(service: PermissionService): Promise<DesiredStateDocument> {
  return exportDesiredState(await fetchCurrentState(service));
}

export function renderDesiredState(document: DesiredStateDocument): string {
  return YAML.stringify(document);
}
