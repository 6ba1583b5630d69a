/**
 * Transition planning: a pure table from observed state to the next action
 */

import { StackState, type OrphanDisposition, type StackResolution, type TransitionDecision } from '../types/stacks.js';

/**
 * Pick the transition for a resolved stack.
 *
 * Only ABSENT with importable orphans depends on the operator: without a
 * disposition the planner answers CONFIRM_ORPHANS and the caller asks.
 * Tag-only orphans have no template slot and never count as importable.
 */
export function planTransition(
  resolution: Pick<StackResolution, 'state' | 'orphans' | 'rawStatus'>,
  disposition?: OrphanDisposition
): TransitionDecision {
  const { state } = resolution;

  switch (state) {
    case StackState.ABSENT: {
      const importable = resolution.orphans.filter(orphan => orphan.logicalId !== undefined);
      if (importable.length === 0) {
        return { type: 'CREATE' };
      }
      if (disposition === 'import') {
        return { type: 'IMPORT', candidates: importable };
      }
      if (disposition === 'discard') {
        return { type: 'DISCARD_THEN_CREATE', candidates: importable };
      }
      return { type: 'CONFIRM_ORPHANS', candidates: importable };
    }

    case StackState.HEALTHY:
    case StackState.FAILED_UPDATE:
      return { type: 'UPDATE', bestEffort: false };

    case StackState.DEGRADED:
      return { type: 'UPDATE', bestEffort: true };

    case StackState.FAILED_INITIAL:
      return { type: 'TEARDOWN_THEN_CREATE' };

    case StackState.BUSY:
      return {
        type: 'FAIL',
        category: 'STATE_CONFLICT',
        reason:
          resolution.rawStatus === 'REVIEW_IN_PROGRESS'
            ? 'Stack is waiting on an unexecuted change set (REVIEW_IN_PROGRESS); delete the change set or the stack, then retry'
            : `Operation in progress (${resolution.rawStatus ?? 'unknown status'}), retry later`,
      };

    case StackState.STUCK:
      return {
        type: 'FAIL',
        category: 'IRRECOVERABLE',
        reason: 'Stack deletion failed earlier; manual resource cleanup required',
      };

    default:
      return assertNever(state);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled stack state: ${String(value)}`);
}
