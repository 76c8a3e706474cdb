// packages/shard-targets/src/manager.ts
import { UpdateCallbacks } from './callbacks.js';
import { resolveManagerConfig, type TargetsManagerConfig, type TargetsManagerOptions } from './config.js';
import { ShardTargetsError } from './errors.js';
import { FileBackedTargetsStore } from './filestore.js';
import { nextIdleAt } from './idle.js';
import { TargetsMetrics } from './metrics.js';
import { reconcileStatus } from './reconcile.js';
import type { TargetsByJob, TargetsSnapshot, UpdateCallback } from './types.js';

function emptySnapshot(): TargetsSnapshot {
  return { targets: {}, idleAt: null, status: new Map() };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Owns the targets assigned to this shard.
 *
 * `load` and `update` are serialized through one internal lock; reads are not.
 * State is write-behind: targets/status/idleAt are updated before callbacks and
 * the file write, and stay updated when either fails.
 */
export class TargetsManager {
  readonly metrics: TargetsMetrics;
  readonly store: FileBackedTargetsStore;

  private readonly cfg: TargetsManagerConfig;
  private readonly callbacks = new UpdateCallbacks();
  private readonly snapshot: TargetsSnapshot = emptySnapshot();
  private lock: Promise<void> = Promise.resolve();

  constructor(opts: TargetsManagerOptions) {
    this.cfg = resolveManagerConfig(opts);
    this.metrics = new TargetsMetrics(this.cfg.registry);
    this.store = new FileBackedTargetsStore({
      storeDir: this.cfg.storeDir,
      storeFileName: this.cfg.storeFileName,
      legacyStoreFileName: this.cfg.legacyStoreFileName,
    });
  }

  /**
   * Read the last snapshot (current file, else legacy file, else empty)
   * and run it through one update, which rewrites it in the current format.
   *
   * Only read and decode errors reject. A failed callback or write during that
   * update is logged and counted, and the loaded state stays in place.
   */
  async load(): Promise<void> {
    await this.withLock(async () => {
      const loaded = await this.store.load();
      const log = this.cfg.logger;

      if (loaded) {
        this.snapshot.targets = loaded.targets;
        this.snapshot.idleAt = loaded.idleAt;
        log.info('targets.load', { format: loaded.format, file: loaded.filename });
        if (loaded.format === 'legacy') {
          log.info('targets.migrated', { from: loaded.filename, to: this.store.filename });
        }
      } else {
        log.info('targets.load', { format: null, storeDir: this.cfg.storeDir });
      }

      try {
        await this.applyUpdate(this.snapshot.targets);
      } catch (e) {
        this.logUpdateFailure(e);
      }
    });
  }

  /**
   * Observers run inside `update`, with the lock held. They may read
   * `currentSnapshot()` but must not call `load` or `update`.
   */
  registerObservers(...fns: UpdateCallback[]): void {
    this.callbacks.add(...fns);
  }

  /** Replace the whole target set. There is no per-target update. */
  async update(desired: TargetsByJob): Promise<void> {
    await this.withLock(async () => {
      try {
        await this.applyUpdate(desired);
      } catch (e) {
        this.logUpdateFailure(e);
        throw e;
      }
    });
  }

  /**
   * Live view of the manager state. The maps are shared with the manager:
   * treat them as read-only.
   */
  currentSnapshot(): TargetsSnapshot {
    return this.snapshot;
  }

  private logUpdateFailure(e: unknown): void {
    this.cfg.logger.warn('targets.update.failed', { error: errorMessage(e) });
  }

  private async applyUpdate(desired: TargetsByJob): Promise<void> {
    const log = this.cfg.logger;
    let ok = false;

    try {
      this.snapshot.targets = desired;

      const { status, transitions } = reconcileStatus(desired, this.snapshot.status);
      this.snapshot.status = status;
      for (const t of transitions) {
        log.info('target.transfer.begin', { job: t.job, hash: t.hash, url: t.url });
      }

      this.snapshot.idleAt = nextIdleAt(status.size, this.snapshot.idleAt, this.cfg.now);

      try {
        await this.callbacks.run(desired);
      } catch (e) {
        throw new ShardTargetsError({ stage: 'callback', context: 'do callbacks', cause: e });
      }

      await this.store.save(this.snapshot);
      ok = true;
    } finally {
      this.metrics.record(ok, this.snapshot.status.size);
    }
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.lock;
    let release: (() => void) | undefined;
    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });
    await prev;
    try {
      return await fn();
    } finally {
      release?.();
    }
  }
}
