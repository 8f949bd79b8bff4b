/**
 * Slice state storage interface.
 *
 * Persists slice documents keyed by slice name with pluggable backends, so a
 * later process can resume a slice without resubmitting it.
 */

import { SliceDocument } from './document';

export interface SliceStateStore {
  /** Write the document, replacing any earlier one of the same slice. */
  save(document: SliceDocument): Promise<void>;
  /** The stored document as parsed JSON, or null when none exists. */
  load(sliceName: string): Promise<unknown | null>;
  /** Names of every stored slice, sorted. */
  list(): Promise<string[]>;
  /** Returns false when nothing was stored under the name. */
  delete(sliceName: string): Promise<boolean>;
}
