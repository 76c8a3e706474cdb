import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { ShardTargetsError, isNotFound } from './errors.js';
import { currentFormat, encodeCurrent, legacyFormat, type StoreFormat, type StoreFormatName } from './formats.js';
import { parseJson, stringifyJson } from './json.js';
import type { StoredTargets } from './types.js';

export type FileBackedTargetsStoreOptions = {
  storeDir: string;
  storeFileName?: string;
  legacyStoreFileName?: string;

  /** Read formats in priority order. Defaults to [current, legacy]. */
  formats?: StoreFormat[];
};

export type LoadedTargets = StoredTargets & {
  format: StoreFormatName;
  filename: string;
};

export class FileBackedTargetsStore {
  public readonly storeDir: string;
  public readonly filename: string;
  private readonly formats: StoreFormat[];

  constructor(opts: FileBackedTargetsStoreOptions) {
    this.storeDir = opts.storeDir;

    const current = currentFormat(opts.storeFileName);
    this.filename = path.join(this.storeDir, current.fileName);
    this.formats = opts.formats ?? [current, legacyFormat(opts.legacyStoreFileName)];
  }

  /**
   * Returns the first format whose file exists, or null when none does.
   */
  async load(): Promise<LoadedTargets | null> {
    for (const format of this.formats) {
      const filename = path.join(this.storeDir, format.fileName);

      let raw: string;
      try {
        raw = await fs.readFile(filename, 'utf8');
      } catch (e) {
        if (isNotFound(e)) continue;
        throw new ShardTargetsError({ stage: 'load', context: 'load', file: filename, cause: e });
      }

      try {
        const parsed = format.parse(parseJson(raw));
        return { ...parsed, format: format.name, filename };
      } catch (e) {
        throw new ShardTargetsError({ stage: 'decode', context: 'decode', file: filename, cause: e });
      }
    }

    return null;
  }

  async save(data: StoredTargets): Promise<void> {
    const tmp = `${this.filename}.tmp`;

    try {
      await fs.mkdir(this.storeDir, { recursive: true });

      const json = stringifyJson(encodeCurrent(data), 2);
      try {
        await fs.writeFile(tmp, json, 'utf8');
        await fs.rename(tmp, this.filename);
      } catch (e) {
        await fs.rm(tmp, { force: true });
        throw e;
      }
    } catch (e) {
      throw new ShardTargetsError({ stage: 'save', context: 'write', file: this.filename, cause: e });
    }
  }
}
