#!/usr/bin/env node
// packages/cli/src/index.ts
/**
 * shard-sidecar: operator CLI for the targets store of one shard.
 *
 *   shard-sidecar --store-dir /prometheus show
 *   shard-sidecar --store-dir /prometheus apply ./targets.json
 *   shard-sidecar metrics
 */
import { buildProgram } from './program.js';

try {
  await buildProgram().parseAsync(process.argv);
} catch (err) {
  const msg = err instanceof Error ? err.stack ?? err.message : String(err);
  console.error('❌', msg);
  process.exitCode = 1;
}
