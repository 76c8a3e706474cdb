// packages/cli/src/commands/metrics.ts
import type { Command } from 'commander';

import type { CommandDeps } from '../context.js';

export function registerMetricsCommand(program: Command, deps: CommandDeps): Command {
  return program
    .command('metrics')
    .description('Load the store and print the Prometheus exposition')
    .action(async () => {
      const manager = deps.openManager();
      await manager.load();
      deps.out((await manager.metrics.registry.metrics()).trimEnd());
    });
}
