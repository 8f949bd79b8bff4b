/**
 * Reservation and slice lifecycle states.
 *
 * Every requested entity carries an orchestrator-tracked reservation state;
 * the slice carries an aggregate state derived from them.
 */

/** Orchestrator-tracked lifecycle of one requested entity. */
export enum ReservationState {
  Unsubmitted = 'Unsubmitted',
  Ticketed = 'Ticketed',
  Provisioning = 'Provisioning',
  Active = 'Active',
  ActiveTicketed = 'ActiveTicketed',
  Closing = 'Closing',
  Closed = 'Closed',
  Failed = 'Failed',
}

/** Aggregate slice lifecycle. */
export enum SliceState {
  Unsubmitted = 'Unsubmitted',
  Submitted = 'Submitted',
  Pending = 'Pending',
  Stable = 'Stable',
  Failed = 'Failed',
  Deleted = 'Deleted',
}

/** Result of aggregating entity states. Pending always re-enters polling. */
export type AggregateState = SliceState.Stable | SliceState.Failed | SliceState.Pending;

/** Valid state transitions for slices. */
export const VALID_SLICE_TRANSITIONS: Record<SliceState, SliceState[]> = {
  [SliceState.Unsubmitted]: [SliceState.Submitted, SliceState.Deleted],
  [SliceState.Submitted]: [SliceState.Pending, SliceState.Stable, SliceState.Failed, SliceState.Deleted],
  [SliceState.Pending]: [SliceState.Pending, SliceState.Stable, SliceState.Failed, SliceState.Deleted],
  // A renewed or re-polled slice may observe entities leaving Active again.
  [SliceState.Stable]: [SliceState.Stable, SliceState.Pending, SliceState.Failed, SliceState.Deleted],
  // A modification that drops the failed entities puts the slice back to Pending.
  [SliceState.Failed]: [SliceState.Failed, SliceState.Pending, SliceState.Deleted],
  [SliceState.Deleted]: [],
};

export const ACTIVE_RESERVATION_STATES: ReadonlySet<ReservationState> = new Set([
  ReservationState.Active,
  ReservationState.ActiveTicketed,
]);

/** States in which the orchestrator is still working on the reservation. */
export const IN_FLIGHT_RESERVATION_STATES: ReadonlySet<ReservationState> = new Set([
  ReservationState.Ticketed,
  ReservationState.Provisioning,
  ReservationState.Closing,
]);

const RESERVATION_STATE_VALUES = new Set<string>(Object.values(ReservationState));
const SLICE_STATE_VALUES = new Set<string>(Object.values(SliceState));

export function isReservationState(value: unknown): value is ReservationState {
  return typeof value === 'string' && RESERVATION_STATE_VALUES.has(value);
}

export function isSliceState(value: unknown): value is SliceState {
  return typeof value === 'string' && SLICE_STATE_VALUES.has(value);
}

export function isActiveReservation(state: ReservationState): boolean {
  return ACTIVE_RESERVATION_STATES.has(state);
}

/** A reservation that is not in flight may be removed from the graph. */
export function isSettledReservation(state: ReservationState): boolean {
  return !IN_FLIGHT_RESERVATION_STATES.has(state);
}

/** Authoritative reservation fields shared by every entity. */
export interface ReservationInfo {
  reservationId?: string;
  state: ReservationState;
  /** Orchestrator notice attached to a failed or closing reservation. */
  errorMessage?: string;
}

export const UNSUBMITTED_RESERVATION: Readonly<ReservationInfo> = Object.freeze({
  state: ReservationState.Unsubmitted,
});
