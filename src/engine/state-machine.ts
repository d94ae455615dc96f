/**
 * Run and domain state machines.
 *
 * Enforces valid state transitions for runs and their domains,
 * producing typed errors on invalid transitions.
 */

import {
  DomainRunStatus,
  RunStatus,
  VALID_DOMAIN_TRANSITIONS,
  VALID_RUN_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

function transition<S extends string>(
  kind: 'RUN' | 'DOMAIN',
  table: Record<S, S[]>,
  current: S,
  target: S,
): TransitionResult<S> {
  const validTargets = table[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: `${kind}.INVALID_TRANSITION`,
        message: `Invalid ${kind.toLowerCase()} state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a run state transition. */
export function transitionRunStatus(current: RunStatus, target: RunStatus): TransitionResult<RunStatus> {
  return transition('RUN', VALID_RUN_TRANSITIONS, current, target);
}

/** Attempt a domain state transition. */
export function transitionDomainStatus(
  current: DomainRunStatus,
  target: DomainRunStatus,
): TransitionResult<DomainRunStatus> {
  return transition('DOMAIN', VALID_DOMAIN_TRANSITIONS, current, target);
}

/**
 * Final run status from its domain outcomes: failed when every domain
 * failed, partial when any domain failed or had failed applies.
 */
export function resolveRunStatus(statuses: DomainRunStatus[]): RunStatus {
  if (statuses.length > 0 && statuses.every((status) => status === DomainRunStatus.Failed)) {
    return RunStatus.Failed;
  }
  if (statuses.some((status) => status === DomainRunStatus.Failed || status === DomainRunStatus.Partial)) {
    return RunStatus.Partial;
  }
  return RunStatus.Succeeded;
}
