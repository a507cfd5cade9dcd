// Versioned aspect state machine
//
// Each (entity, aspect) is ABSENT or PRESENT. planTransition decides what a
// change event does to that state without touching storage, so every check
// runs before anything is written.
//
//   change type           | ABSENT(last)          | PRESENT(v, payload)
//   ----------------------+-----------------------+----------------------------
//   CREATE, CREATE_ENTITY | PRESENT(last + 1)     | AlreadyExistsError
//   UPSERT                | PRESENT(last + 1)     | PRESENT(v + 1)
//   UPDATE                | NotFoundError         | UnsupportedOperationError
//   DELETE                | no-op                 | ABSENT(v)
//   PATCH                 | NotFoundError         | PRESENT(v + 1, merged)
//   RESTATE               | NotFoundError         | PRESENT(v), re-indexed

import type { AspectPayload, ChangeEvent } from '@metagraph/protocol';
import type { StoredAspect } from '@metagraph/repositories';
import { AlreadyExistsError, NotFoundError, UnsupportedOperationError } from '../errors.js';
import { applyMergePatch } from './merge.js';

export type AspectState =
  | {
      status: 'absent';

      /**
       * Version of the tombstone, or null when the aspect was never written
       */
      lastVersion: number | null;
    }
  | {
      status: 'present';
      version: number;
      payload: AspectPayload;
    };

export type TransitionPlan =
  | {
      action: 'write';
      outcome: 'created' | 'upserted' | 'patched' | 'restated';
      version: number;
      payload: AspectPayload;
    }
  | { action: 'remove'; outcome: 'deleted'; version: number }
  | { action: 'none'; outcome: 'noop' };

export function stateOf(stored: StoredAspect | null): AspectState {
  if (!stored) {
    return { status: 'absent', lastVersion: null };
  }
  if (stored.removed) {
    return { status: 'absent', lastVersion: stored.version };
  }
  return { status: 'present', version: stored.version, payload: stored.payload };
}

/**
 * Decide the effect of a change event on a versioned aspect.
 *
 * @throws AlreadyExistsError, NotFoundError or UnsupportedOperationError when
 * the change is not allowed in the current state
 */
export function planTransition(state: AspectState, event: ChangeEvent): TransitionPlan {
  return state.status === 'absent'
    ? planFromAbsent(state.lastVersion, event)
    : planFromPresent(state.version, state.payload, event);
}

function planFromAbsent(lastVersion: number | null, event: ChangeEvent): TransitionPlan {
  const next = (lastVersion ?? 0) + 1;
  switch (event.changeType) {
    case 'CREATE':
    case 'CREATE_ENTITY':
      return { action: 'write', outcome: 'created', version: next, payload: event.payload };
    case 'UPSERT':
      return { action: 'write', outcome: 'upserted', version: next, payload: event.payload };
    case 'DELETE':
      return { action: 'none', outcome: 'noop' };
    case 'UPDATE':
    case 'PATCH':
    case 'RESTATE':
      throw new NotFoundError(event.entityUrn, event.aspectName);
  }
}

function planFromPresent(
  version: number,
  payload: AspectPayload,
  event: ChangeEvent
): TransitionPlan {
  switch (event.changeType) {
    case 'CREATE':
    case 'CREATE_ENTITY':
      throw new AlreadyExistsError(event.entityUrn, event.aspectName);
    case 'UPDATE':
      throw new UnsupportedOperationError(event.changeType, event.aspectName);
    case 'UPSERT':
      return { action: 'write', outcome: 'upserted', version: version + 1, payload: event.payload };
    case 'PATCH':
      return {
        action: 'write',
        outcome: 'patched',
        version: version + 1,
        payload: applyMergePatch(payload, event.patch),
      };
    case 'RESTATE':
      return { action: 'write', outcome: 'restated', version, payload: event.payload };
    case 'DELETE':
      return { action: 'remove', outcome: 'deleted', version };
  }
}
