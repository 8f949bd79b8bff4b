/**
 * Slice state machine.
 *
 * Enforces valid aggregate state transitions for slices, producing typed
 * errors on invalid transitions.
 */

import { SliceState, VALID_SLICE_TRANSITIONS } from '../domain/reservation';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a slice state transition. */
export function transitionSliceState(
  current: SliceState,
  target: SliceState,
): TransitionResult<SliceState> {
  const validTargets = VALID_SLICE_TRANSITIONS[current];
  if (!validTargets || !validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'SLICE.INVALID_TRANSITION',
        message: `Invalid slice state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

export function isTerminalSliceState(state: SliceState): boolean {
  return state === SliceState.Deleted;
}
