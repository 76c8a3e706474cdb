// packages/shard-targets/src/tests/helpers.ts
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { LogData, Logger, LogLevel } from '../logger.js';
import { TargetState, type Target } from '../types.js';

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shard-targets-'));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

export type RecordedEvent = { level: LogLevel; event: string; data?: LogData };

export function recordingLogger(): Logger & { events: RecordedEvent[] } {
  const events: RecordedEvent[] = [];
  const push = (level: LogLevel) => (event: string, data?: LogData) => {
    events.push({ level, event, data });
  };
  return {
    events,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
  };
}

export function target(hash: number | bigint, series = 10, state: TargetState = TargetState.Normal): Target {
  return { hash: BigInt(hash), series, state };
}

export function fixedClock(start: string) {
  let current = new Date(start);
  return {
    now: () => current,
    set(iso: string) {
      current = new Date(iso);
    },
  };
}
