// packages/shard-targets/src/types.ts
import type { ScrapeStatus } from './scrape_status.js';

export const TargetState = {
  Normal: 'normal',
  InTransfer: 'in_transfer',
} as const;

export type TargetState = (typeof TargetState)[keyof typeof TargetState];

// uint64 assigned by the coordinator
export type TargetHash = bigint;

/**
 * One scrape endpoint assigned to this shard.
 * `hash` is stable across reconciliations; every other field may change.
 */
export type Target = {
  hash: TargetHash;
  series: number;

  /** Series count before relabelling, when the coordinator reports it. */
  totalSeries?: number;

  /**
   * Target labels. `__scheme__`, `__address__` and `__metrics_path__`
   * are used to render the target URL in log events.
   */
  labels?: Record<string, string>;

  state: TargetState;
};

/** job name -> targets (order kept as given) */
export type TargetsByJob = Record<string, Target[]>;

export type TargetsSnapshot = {
  targets: TargetsByJob;

  // non-null iff the shard owns zero targets
  idleAt: Date | null;

  // runtime only, never persisted
  status: Map<TargetHash, ScrapeStatus>;
};

/** The persisted half of a snapshot. */
export type StoredTargets = {
  targets: TargetsByJob;
  idleAt: Date | null;
};

export type UpdateCallback = (targets: TargetsByJob) => void | Promise<void>;
