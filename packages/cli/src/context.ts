// packages/cli/src/context.ts
import type { TargetsManager } from '@shard-sidecar/targets';

export type CommandDeps = {
  cwd: string;
  openManager: () => TargetsManager;
  out: (line: string) => void;
};
