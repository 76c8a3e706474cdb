// packages/shard-targets/src/formats.ts
//
// On-disk formats, in priority order. Each parser is independent and pure:
// it takes the JSON value of one file (see parseJson) and returns the persisted
// half of a snapshot.
import { z } from 'zod';

import { TargetState, type StoredTargets, type Target, type TargetHash, type TargetsByJob } from './types.js';

export const DEFAULT_STORE_FILENAME = 'kvass-shard.json';
export const DEFAULT_LEGACY_STORE_FILENAME = 'targets.json';

const MAX_HASH = 2n ** 64n - 1n;

const count = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

// uint64; values above 2^53 arrive as bigint from parseJson
const hashModel = z
  .union([z.bigint(), z.number().int()])
  .transform((h) => BigInt(h))
  .refine((h) => h >= 0n && h <= MAX_HASH, { message: 'Hash must be an unsigned 64-bit integer' });

// older writers stored Normal as the empty string (or omitted it)
const stateModel = z
  .enum(['', TargetState.Normal, TargetState.InTransfer])
  .optional()
  .transform((s): TargetState => (s === TargetState.InTransfer ? TargetState.InTransfer : TargetState.Normal));

const targetModel = z
  .object({
    Hash: hashModel,
    Series: count.default(0),
    TotalSeries: count.optional(),
    Labels: z.record(z.string()).optional(),
    State: stateModel,
  })
  .transform((t): Target => {
    const out: Target = { hash: t.Hash, series: t.Series, state: t.State };
    if (t.TotalSeries !== undefined) out.totalSeries = t.TotalSeries;
    if (t.Labels !== undefined) out.labels = t.Labels;
    return out;
  });

const targetsByJobModel = z.record(z.array(targetModel));

const currentFileModel = z.object({
  Targets: targetsByJobModel.nullable().optional(),
  IdleAt: z.string().datetime({ offset: true }).nullable().optional(),
});

export type StoreFormatName = 'current' | 'legacy';

export type StoreFormat = {
  name: StoreFormatName;
  fileName: string;
  parse(raw: unknown): StoredTargets;
};

export type EncodedTarget = {
  Hash: TargetHash;
  Series: number;
  TotalSeries?: number;
  Labels?: Record<string, string>;
  State: TargetState;
};

export type CurrentFile = {
  Targets: Record<string, EncodedTarget[]>;
  IdleAt: string | null;
};

export function parseTargetsByJob(raw: unknown): TargetsByJob {
  return targetsByJobModel.parse(raw);
}

export function currentFormat(fileName: string = DEFAULT_STORE_FILENAME): StoreFormat {
  return {
    name: 'current',
    fileName,
    parse(raw) {
      const file = currentFileModel.parse(raw);
      return {
        targets: file.Targets ?? {},
        idleAt: file.IdleAt ? new Date(file.IdleAt) : null,
      };
    },
  };
}

/** Bare job -> targets map; carries no idle state. */
export function legacyFormat(fileName: string = DEFAULT_LEGACY_STORE_FILENAME): StoreFormat {
  return {
    name: 'legacy',
    fileName,
    parse(raw) {
      return { targets: parseTargetsByJob(raw), idleAt: null };
    },
  };
}

function encodeTarget(t: Target): EncodedTarget {
  const out: EncodedTarget = { Hash: t.hash, Series: t.series, State: t.state };
  if (t.totalSeries !== undefined) out.TotalSeries = t.totalSeries;
  if (t.labels !== undefined) out.Labels = t.labels;
  return out;
}

export function encodeCurrent(data: StoredTargets): CurrentFile {
  const Targets: Record<string, EncodedTarget[]> = {};
  for (const [job, targets] of Object.entries(data.targets)) {
    Targets[job] = targets.map(encodeTarget);
  }
  return { Targets, IdleAt: data.idleAt ? data.idleAt.toISOString() : null };
}
