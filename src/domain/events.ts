/**
 * Slice lifecycle event model.
 *
 * Events are emitted with a stable, versioned schema so notebooks and
 * dashboards can follow a slice without polling the graph.
 */

/** Event types emitted by the client. */
export type SliceEventType =
  | 'slice.submitted'
  | 'slice.modified'
  | 'slice.state_changed'
  | 'slice.wait_finished'
  | 'slice.renewed'
  | 'slice.deleted'
  | 'node.configured'
  | 'node.configuration_failed';

export interface SliceEvent {
  id: string;
  type: SliceEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  sliceName: string;
  sliceId?: string;
  /** Node the event is about, for node.* events. */
  node?: string;
  /** Event-specific payload. */
  payload: Record<string, unknown>;
}

export interface EventSubscription {
  id: string;
  /** Only deliver events of one slice. */
  sliceName?: string;
  /** Filter by event types. */
  eventTypes?: SliceEventType[];
  callback: (event: SliceEvent) => void;
}
