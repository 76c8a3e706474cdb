// packages/shard-targets/src/callbacks.ts
import type { TargetsByJob, UpdateCallback } from './types.js';

export class UpdateCallbacks {
  private readonly callbacks: UpdateCallback[] = [];

  add(...fns: UpdateCallback[]): void {
    this.callbacks.push(...fns);
  }

  get size(): number {
    return this.callbacks.length;
  }

  // strictly in registration order; first failure stops the rest
  async run(targets: TargetsByJob): Promise<void> {
    for (const call of this.callbacks) {
      await call(targets);
    }
  }
}
