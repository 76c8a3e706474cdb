// packages/cli/src/tests/paths.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { resolveStoreDir } from '../paths.js';

test('store dir: defaults under cwd', () => {
  assert.equal(resolveStoreDir({ cwd: '/repo', env: {} }), path.resolve('/repo', '.shard-sidecar'));
});

test('store dir: env wins over the default', () => {
  assert.equal(
    resolveStoreDir({ cwd: '/repo', env: { SHARD_SIDECAR_STORE_DIR: '/prometheus' } }),
    path.resolve('/prometheus')
  );
});

test('store dir: --store-dir wins over env', () => {
  const dir = resolveStoreDir({
    cwd: '/repo',
    override: './custom',
    env: { SHARD_SIDECAR_STORE_DIR: '/prometheus' },
  });
  assert.equal(dir, path.resolve('/repo', 'custom'));
});

test('store dir: blank values are ignored', () => {
  assert.equal(
    resolveStoreDir({ cwd: '/repo', override: '  ', env: { SHARD_SIDECAR_STORE_DIR: '' } }),
    path.resolve('/repo', '.shard-sidecar')
  );
});
