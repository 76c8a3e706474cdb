// packages/shard-targets/src/idle.ts

/**
 * Idle stamp after a reconciliation.
 * An existing stamp is kept while the shard stays empty.
 */
export function nextIdleAt(statusSize: number, current: Date | null, now: () => Date): Date | null {
  if (statusSize !== 0) return null;
  return current ?? now();
}
