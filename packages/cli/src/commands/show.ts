// packages/cli/src/commands/show.ts
import type { Command } from 'commander';

import { stringifyJson } from '@shard-sidecar/targets';

import type { CommandDeps } from '../context.js';

export function registerShowCommand(program: Command, deps: CommandDeps): Command {
  return program
    .command('show')
    .description('Load the store and print targets, idle stamp and runtime status')
    .action(async () => {
      const manager = deps.openManager();
      await manager.load();

      const snap = manager.currentSnapshot();
      const status = [...snap.status].map(([hash, st]): [string, unknown] => [hash.toString(), st.toJSON()]);
      deps.out(
        stringifyJson(
          {
            targets: snap.targets,
            idleAt: snap.idleAt ? snap.idleAt.toISOString() : null,
            status: Object.fromEntries(status),
          },
          2
        )
      );
    });
}
