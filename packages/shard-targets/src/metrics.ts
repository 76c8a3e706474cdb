// packages/shard-targets/src/metrics.ts
import { Counter, Gauge, Registry } from 'prom-client';

export const TARGETS_UPDATED_TOTAL = 'kvass_sidecar_targets_updated_total';
export const TARGETS_TOTAL = 'kvass_sidecar_targets_total';

function counterOn(registry: Registry): Counter<string> {
  const existing = registry.getSingleMetric(TARGETS_UPDATED_TOTAL);
  if (existing instanceof Counter) return existing;

  return new Counter<string>({
    name: TARGETS_UPDATED_TOTAL,
    help: 'Target set updates applied by this sidecar, by outcome.',
    labelNames: ['success'],
    registers: [registry],
  });
}

function gaugeOn(registry: Registry): Gauge {
  const existing = registry.getSingleMetric(TARGETS_TOTAL);
  if (existing instanceof Gauge) return existing;

  return new Gauge({
    name: TARGETS_TOTAL,
    help: 'Targets currently tracked by this sidecar.',
    registers: [registry],
  });
}

export class TargetsMetrics {
  readonly registry: Registry;
  readonly updates: Counter<string>;
  readonly tracked: Gauge;

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;
    this.updates = counterOn(registry);
    this.tracked = gaugeOn(registry);
  }

  record(success: boolean, trackedTargets: number): void {
    this.updates.inc({ success: String(success) });
    this.tracked.set(trackedTargets);
  }
}
