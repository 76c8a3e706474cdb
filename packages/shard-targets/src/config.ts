// packages/shard-targets/src/config.ts
import type { Registry } from 'prom-client';

import { DEFAULT_LEGACY_STORE_FILENAME, DEFAULT_STORE_FILENAME } from './formats.js';
import { createConsoleLogger, type Logger } from './logger.js';

export type TargetsManagerOptions = {
  storeDir: string;
  storeFileName?: string;
  legacyStoreFileName?: string;

  // clock used for the idle stamp
  now?: () => Date;

  /** Registry the two instruments are registered on. A private one when omitted. */
  registry?: Registry;
  logger?: Logger;
};

export type TargetsManagerConfig = {
  storeDir: string;
  storeFileName: string;
  legacyStoreFileName: string;
  now: () => Date;
  registry?: Registry;
  logger: Logger;
};

export function resolveManagerConfig(opts: TargetsManagerOptions): TargetsManagerConfig {
  const storeDir = String(opts.storeDir ?? '').trim();
  if (!storeDir) throw new Error('storeDir is required');

  return {
    storeDir,
    storeFileName: opts.storeFileName ?? DEFAULT_STORE_FILENAME,
    legacyStoreFileName: opts.legacyStoreFileName ?? DEFAULT_LEGACY_STORE_FILENAME,
    now: opts.now ?? (() => new Date()),
    registry: opts.registry,
    logger: opts.logger ?? createConsoleLogger(),
  };
}
