/**
 * slicekit: client-side topology model, reconciliation engine and post-boot
 * configurator for testbed slices.
 */

export { SliceClient } from './client';
export type { SliceClientOptions, SubmitOptions } from './client';
export * from './config/settings';
export * from './configure/address-plan';
export * from './configure/ip-commands';
export * from './configure/post-boot';
export * from './domain/errors';
export * from './domain/events';
export * from './domain/request';
export * from './domain/reservation';
export * from './domain/snapshot';
export * from './domain/topology';
export * from './engine/backoff';
export * from './engine/clock';
export * from './engine/poller';
export * from './engine/reconciler';
export * from './engine/state-machine';
export * from './events/publisher';
export * from './logger';
export * from './orchestrator/adapter';
export * from './orchestrator/simulated';
export * from './remote/channel';
export * from './remote/connector';
export * from './remote/ssh2-connector';
export * from './remote/worker-pool';
export * from './storage/document';
export * from './storage/file-store';
export * from './storage/memory-store';
export * from './storage/store';
export * from './topology/addressing';
export * from './topology/catalog';
export * from './topology/graph';
export * from './topology/slice';
export * from './topology/validator';
