/**
 * Orchestrator Client Adapter.
 *
 * The only way the library reaches the orchestrator. Implementations own
 * the wire protocol and credentials; the core sees snapshots keyed by the
 * entity names of the local graph.
 *
 * Implementations must report network and HTTP-level failures as
 * TransportError (retried by the core) and semantic refusals as
 * RejectedError (never retried).
 */

import { TopologySnapshot } from '../domain/snapshot';
import { SliceRequest } from '../domain/request';

export interface CallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface SubmitResult {
  sliceId: string;
  snapshot: TopologySnapshot;
}

export interface OrchestratorAdapter {
  submit(request: SliceRequest, options?: CallOptions): Promise<SubmitResult>;
  query(sliceId: string, options?: CallOptions): Promise<TopologySnapshot>;
  delete(sliceId: string, options?: CallOptions): Promise<void>;
  /** Extend the lease; `leaseEnd` is ISO-8601. */
  renew(sliceId: string, leaseEnd: string, options?: CallOptions): Promise<void>;
  /** Replace the slice's topology with `request.topology`; returns the first snapshot after the change. */
  modify(sliceId: string, request: SliceRequest, options?: CallOptions): Promise<TopologySnapshot>;
}
