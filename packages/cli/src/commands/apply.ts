// packages/cli/src/commands/apply.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import type { Command } from 'commander';

import { parseJson, parseTargetsByJob, type TargetsByJob } from '@shard-sidecar/targets';

import type { CommandDeps } from '../context.js';

export function registerApplyCommand(program: Command, deps: CommandDeps): Command {
  return program
    .command('apply')
    .description('Replace the assigned targets with a job -> targets JSON map')
    .argument('<file>', 'JSON file: { "<job>": [{ "Hash": 1, "Series": 10, "State": "normal" }] }')
    .action(async (file: string) => {
      const filename = path.resolve(deps.cwd, file);

      let desired: TargetsByJob;
      try {
        desired = parseTargetsByJob(parseJson(await fs.readFile(filename, 'utf8')));
      } catch (e) {
        throw new Error(`apply: cannot read targets from ${filename}`, { cause: e });
      }

      const manager = deps.openManager();
      await manager.load();
      await manager.update(desired);

      const snap = manager.currentSnapshot();
      deps.out(`applied:  ${Object.keys(desired).length} job(s), ${snap.status.size} target(s)`);
      deps.out(`idle:     ${snap.idleAt ? snap.idleAt.toISOString() : 'no'}`);
      deps.out(`store:    ${manager.store.filename}`);
    });
}
