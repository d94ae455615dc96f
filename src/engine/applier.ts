/**
 * Applier.
 *
 * Turns a diff into service calls: every grant first, then every revoke, so
 * a subject whose permission set is being replaced never passes through a
 * state with neither the old nor the new grant. A failed call is recorded
 * and the remaining calls are still attempted, even when a hook throws.
 */

import { PermissionDomain, PermissionRecord, RecordOf } from '../domain/permission';
import { ApplyError, TypedError, errorMessage } from '../domain/errors';
import { ApplyAction, ApplyFailure } from '../domain/run';
import { PermissionService } from '../client/permission-service';
import { logger } from '../logger';
import { DomainSpec } from './domains';
import { RecordDiff } from './diff';

export interface ApplyOutcome<R extends PermissionRecord> {
  granted: R[];
  revoked: R[];
  failures: ApplyFailure<R>[];
}

/** Notification for each attempted call; `error` is set when it failed. */
export interface AppliedEvent<R> {
  action: ApplyAction;
  record: R;
  error?: TypedError;
}

export interface ApplyHooks<R> {
  onApplied?: (event: AppliedEvent<R>) => void | Promise<void>;
}

export async function applyDiff<D extends PermissionDomain>(
  spec: DomainSpec<D>,
  service: PermissionService,
  diff: Pick<RecordDiff<RecordOf<D>>, 'added' | 'removed'>,
  hooks: ApplyHooks<RecordOf<D>> = {},
): Promise<ApplyOutcome<RecordOf<D>>> {
  const log = logger.child({ component: 'applier', domain: spec.domain });
  const outcome: ApplyOutcome<RecordOf<D>> = { granted: [], revoked: [], failures: [] };

  const attempt = async (action: ApplyAction, record: RecordOf<D>): Promise<void> => {
    let error: TypedError | undefined;
    try {
      if (action === 'grant') {
        await spec.grant(service, record);
        outcome.granted.push(record);
      } else {
        await spec.revoke(service, record);
        outcome.revoked.push(record);
      }
      log.info(`Permission ${action === 'grant' ? 'granted' : 'revoked'}`, { permission: record.permission });
    } catch (err) {
      error = new ApplyError(action, spec.domain, err).typedError;
      outcome.failures.push({ action, record, error });
      log.error(error.message, { permission: record.permission, code: error.code });
    }
    try {
      await hooks.onApplied?.({ action, record, error });
    } catch (hookErr) {
      log.error('Apply hook failed', { permission: record.permission, message: errorMessage(hookErr) });
    }
  };

  for (const record of diff.added) {
    await attempt('grant', record);
  }
  for (const record of diff.removed) {
    await attempt('revoke', record);
  }

  return outcome;
}
