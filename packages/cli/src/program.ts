// packages/cli/src/program.ts
import { Command } from 'commander';

import { TargetsManager, createConsoleLogger, type Logger } from '@shard-sidecar/targets';

import { registerApplyCommand } from './commands/apply.js';
import { registerMetricsCommand } from './commands/metrics.js';
import { registerShowCommand } from './commands/show.js';
import type { CommandDeps } from './context.js';
import { resolveStoreDir } from './paths.js';

export type ProgramOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  out?: (line: string) => void;
  logger?: Logger;
};

export function buildProgram(opts: ProgramOptions = {}): Command {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  // manager events go to stderr so stdout stays machine readable
  const logger = opts.logger ?? createConsoleLogger({ write: (line) => console.error(line) });

  const program = new Command();
  program
    .name('shard-sidecar')
    .description('Inspect and update the targets assigned to this shard')
    .option('--store-dir <dir>', 'store directory (default: $SHARD_SIDECAR_STORE_DIR or ./.shard-sidecar)');

  const deps: CommandDeps = {
    cwd,
    out: opts.out ?? ((line) => console.log(line)),
    openManager: () => {
      const { storeDir } = program.opts<{ storeDir?: string }>();
      return new TargetsManager({ storeDir: resolveStoreDir({ cwd, override: storeDir, env }), logger });
    },
  };

  registerShowCommand(program, deps);
  registerApplyCommand(program, deps);
  registerMetricsCommand(program, deps);

  return program;
}
