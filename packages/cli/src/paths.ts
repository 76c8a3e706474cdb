// packages/cli/src/paths.ts
import path from 'node:path';

export const STORE_DIR_ENV = 'SHARD_SIDECAR_STORE_DIR';
export const DEFAULT_STORE_DIRNAME = '.shard-sidecar';

/**
 * Store directory, first match wins:
 *   1) --store-dir
 *   2) SHARD_SIDECAR_STORE_DIR
 *   3) <cwd>/.shard-sidecar
 * Relative values resolve against cwd.
 */
export function resolveStoreDir(args: {
  cwd: string;
  override?: string | null;
  env?: NodeJS.ProcessEnv;
}): string {
  const { cwd, override, env } = args;

  const flag = String(override ?? '').trim();
  if (flag) return path.resolve(cwd, flag);

  const fromEnv = String(env?.[STORE_DIR_ENV] ?? '').trim();
  if (fromEnv) return path.resolve(cwd, fromEnv);

  return path.resolve(cwd, DEFAULT_STORE_DIRNAME);
}
