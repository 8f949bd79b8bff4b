/**
 * File-backed slice store.
 *
 * One JSON document per slice under `<dataDir>/slices/<name>.json`. Writes
 * go to a temporary file first and are renamed into place.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuid } from 'uuid';
import { StateFileError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { SliceDocument } from './document';
import { SliceStateStore } from './store';

const SLICE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export class FileSliceStore implements SliceStateStore {
  private readonly dir: string;
  private readonly log: Logger;

  constructor(dataDir: string, log: Logger = rootLogger) {
    this.dir = path.join(dataDir, 'slices');
    this.log = log.child({ module: 'store' });
  }

  async save(document: SliceDocument): Promise<void> {
    const target = this.pathFor(document.slice.name);
    const temp = `${target}.${uuid()}.tmp`;
    await fs.mkdir(this.dir, { recursive: true });
    try {
      await fs.writeFile(temp, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
      await fs.rename(temp, target);
    } catch (err) {
      await fs.rm(temp, { force: true });
      throw err;
    }
    this.log.debug('Slice state saved', { slice: document.slice.name, path: target });
  }

  async load(sliceName: string): Promise<unknown | null> {
    const file = this.pathFor(sliceName);
    let text: string;
    try {
      text = await fs.readFile(file, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new StateFileError(`Slice state file ${file} is not valid JSON`, {
        path: file,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return entries
      .filter((f) => f.endsWith('.json'))
      .map((f) => f.slice(0, -'.json'.length))
      .sort();
  }

  async delete(sliceName: string): Promise<boolean> {
    try {
      await fs.unlink(this.pathFor(sliceName));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  private pathFor(sliceName: string): string {
    if (!SLICE_NAME_PATTERN.test(sliceName)) {
      throw new StateFileError(`Slice name "${sliceName}" cannot be used as a file name`, { slice: sliceName });
    }
    return path.join(this.dir, `${sliceName}.json`);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
