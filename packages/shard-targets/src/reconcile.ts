// packages/shard-targets/src/reconcile.ts
import { ScrapeStatus } from './scrape_status.js';
import { TargetState, type Target, type TargetHash, type TargetsByJob } from './types.js';

export type TransferTransition = {
  job: string;
  hash: TargetHash;
  url: string;
};

export type ReconcileResult = {
  status: Map<TargetHash, ScrapeStatus>;
  transitions: TransferTransition[];
};

/**
 * Render a target as scheme://address/path (no params).
 * Falls back to the hash when the labels do not carry an address.
 */
export function targetUrl(t: Target): string {
  const labels = t.labels ?? {};
  const address = labels.__address__;
  if (!address) return `hash:${t.hash}`;

  const scheme = labels.__scheme__ || 'http';
  const metricsPath = labels.__metrics_path__ || '/metrics';
  return `${scheme}://${address}${metricsPath}`;
}

function assertNever(x: never): never {
  throw new Error(`unhandled target state: ${String(x)}`);
}

/** True when this reconciliation moves a target from Normal into transfer. */
export function beginsTransfer(prev: TargetState, next: TargetState): boolean {
  switch (prev) {
    case TargetState.Normal:
      switch (next) {
        case TargetState.InTransfer:
          return true;
        case TargetState.Normal:
          return false;
        default:
          return assertNever(next);
      }
    case TargetState.InTransfer:
      return false;
    default:
      return assertNever(prev);
  }
}

/**
 * Build the status table for `targets`.
 * - known hashes keep their ScrapeStatus instance
 * - new hashes get a fresh one seeded from the target's series
 * - hashes not in `targets` are dropped
 * - Normal -> InTransfer resets attemptCount
 */
export function reconcileStatus(
  targets: TargetsByJob,
  previous: ReadonlyMap<TargetHash, ScrapeStatus>
): ReconcileResult {
  const status = new Map<TargetHash, ScrapeStatus>();
  const transitions: TransferTransition[] = [];

  for (const [job, list] of Object.entries(targets)) {
    for (const t of list) {
      const st = status.get(t.hash) ?? previous.get(t.hash) ?? new ScrapeStatus(t.series);
      status.set(t.hash, st);

      if (beginsTransfer(st.state, t.state)) {
        st.attemptCount = 0;
        transitions.push({ job, hash: t.hash, url: targetUrl(t) });
      }

      st.state = t.state;
    }
  }

  return { status, transitions };
}
