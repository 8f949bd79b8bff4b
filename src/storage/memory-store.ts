/**
 * In-memory slice store.
 *
 * Reference implementation for tests and short-lived scripts. Documents are
 * deep-copied on the way in and out so callers never alias stored data.
 */

import { SliceDocument } from './document';
import { SliceStateStore } from './store';

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

export class MemorySliceStore implements SliceStateStore {
  private readonly documents = new Map<string, SliceDocument>();

  async save(document: SliceDocument): Promise<void> {
    this.documents.set(document.slice.name, deepCopy(document));
  }

  async load(sliceName: string): Promise<unknown | null> {
    const document = this.documents.get(sliceName);
    // Stored documents drop undefined fields, as JSON would.
    return document ? JSON.parse(JSON.stringify(document)) : null;
  }

  async list(): Promise<string[]> {
    return [...this.documents.keys()].sort();
  }

  async delete(sliceName: string): Promise<boolean> {
    return this.documents.delete(sliceName);
  }
}
