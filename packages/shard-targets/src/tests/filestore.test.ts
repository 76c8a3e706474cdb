// packages/shard-targets/src/tests/filestore.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';

import { ShardTargetsError } from '../errors.js';
import { FileBackedTargetsStore } from '../filestore.js';
import { currentFormat, legacyFormat } from '../formats.js';
import { TargetState } from '../types.js';
import { target, withTempDir } from './helpers.js';

test('load: nothing on disk returns null', async () => {
  await withTempDir(async (dir) => {
    const store = new FileBackedTargetsStore({ storeDir: path.join(dir, 'missing') });
    assert.equal(await store.load(), null);
  });
});

test('save creates the directory and load reads it back', async () => {
  await withTempDir(async (dir) => {
    const storeDir = path.join(dir, 'nested', 'store');
    const store = new FileBackedTargetsStore({ storeDir });
    const idleAt = new Date(Date.UTC(2026, 4, 1, 12, 0, 0));

    await store.save({ targets: { job1: [target(1, 10)] }, idleAt });

    assert.equal(store.filename, path.join(storeDir, 'kvass-shard.json'));
    const raw = JSON.parse(await fs.readFile(store.filename, 'utf8'));
    assert.deepEqual(raw, {
      Targets: { job1: [{ Hash: 1, Series: 10, State: 'normal' }] },
      IdleAt: '2026-05-01T12:00:00.000Z',
    });

    const loaded = await store.load();
    assert.ok(loaded);
    assert.equal(loaded.format, 'current');
    assert.equal(loaded.filename, store.filename);
    assert.deepEqual(loaded.targets, { job1: [{ hash: 1n, series: 10, state: TargetState.Normal }] });
    assert.equal(loaded.idleAt?.getTime(), idleAt.getTime());

    // no temp file left behind
    assert.deepEqual(await fs.readdir(storeDir), ['kvass-shard.json']);
  });
});

test('load falls back to the legacy file', async () => {
  await withTempDir(async (dir) => {
    await fs.writeFile(path.join(dir, 'targets.json'), JSON.stringify({ job1: [{ Hash: 1, Series: 5 }] }));

    const loaded = await new FileBackedTargetsStore({ storeDir: dir }).load();
    assert.ok(loaded);
    assert.equal(loaded.format, 'legacy');
    assert.equal(loaded.filename, path.join(dir, 'targets.json'));
    assert.deepEqual(loaded.targets, { job1: [{ hash: 1n, series: 5, state: TargetState.Normal }] });
    assert.equal(loaded.idleAt, null);
  });
});

test('the current file wins over the legacy file', async () => {
  await withTempDir(async (dir) => {
    await fs.writeFile(path.join(dir, 'targets.json'), JSON.stringify({ old: [{ Hash: 1 }] }));
    await fs.writeFile(path.join(dir, 'kvass-shard.json'), JSON.stringify({ Targets: { new: [] }, IdleAt: null }));

    const loaded = await new FileBackedTargetsStore({ storeDir: dir }).load();
    assert.equal(loaded?.format, 'current');
    assert.deepEqual(loaded?.targets, { new: [] });
  });
});

test('custom file names and format order', async () => {
  await withTempDir(async (dir) => {
    await fs.writeFile(path.join(dir, 'old.json'), JSON.stringify({ a: [{ Hash: 2 }] }));
    await fs.writeFile(path.join(dir, 'shard.json'), JSON.stringify({ Targets: { b: [] }, IdleAt: null }));

    const named = new FileBackedTargetsStore({
      storeDir: dir,
      storeFileName: 'shard.json',
      legacyStoreFileName: 'old.json',
    });
    assert.equal(named.filename, path.join(dir, 'shard.json'));
    assert.equal((await named.load())?.format, 'current');

    const legacyFirst = new FileBackedTargetsStore({
      storeDir: dir,
      formats: [legacyFormat('old.json'), currentFormat('shard.json')],
    });
    assert.equal((await legacyFirst.load())?.format, 'legacy');
  });
});

test('load: malformed JSON is a decode error naming the file', async () => {
  await withTempDir(async (dir) => {
    const file = path.join(dir, 'kvass-shard.json');
    await fs.writeFile(file, '{"Targets":');

    const err = await new FileBackedTargetsStore({ storeDir: dir }).load().then(
      () => null,
      (e: unknown) => e
    );
    assert.ok(err instanceof ShardTargetsError);
    assert.equal(err.stage, 'decode');
    assert.equal(err.file, file);
    assert.ok(err.message.startsWith(`decode ${file}: `));
  });
});

test('load: schema mismatch in the legacy file is a decode error', async () => {
  await withTempDir(async (dir) => {
    await fs.writeFile(path.join(dir, 'targets.json'), JSON.stringify({ job1: [{ Series: 3 }] }));

    await assert.rejects(new FileBackedTargetsStore({ storeDir: dir }).load(), (e: unknown) => {
      return e instanceof ShardTargetsError && e.stage === 'decode' && e.file === path.join(dir, 'targets.json');
    });
  });
});

test('load: read failures other than a missing file are load errors', async () => {
  await withTempDir(async (dir) => {
    await fs.mkdir(path.join(dir, 'kvass-shard.json'));

    await assert.rejects(new FileBackedTargetsStore({ storeDir: dir }).load(), (e: unknown) => {
      return e instanceof ShardTargetsError && e.stage === 'load';
    });
  });
});

test('save: write failures are save errors', async () => {
  await withTempDir(async (dir) => {
    const blocker = path.join(dir, 'not-a-dir');
    await fs.writeFile(blocker, 'x');

    const store = new FileBackedTargetsStore({ storeDir: blocker });
    await assert.rejects(store.save({ targets: {}, idleAt: null }), (e: unknown) => {
      return e instanceof ShardTargetsError && e.stage === 'save' && e.file === path.join(blocker, 'kvass-shard.json');
    });
  });
});

test('save: a failed rename removes the temp file', async () => {
  await withTempDir(async (dir) => {
    // a non-empty directory where the snapshot belongs makes the rename fail
    await fs.mkdir(path.join(dir, 'kvass-shard.json'));
    await fs.writeFile(path.join(dir, 'kvass-shard.json', 'keep'), 'x');

    const store = new FileBackedTargetsStore({ storeDir: dir });
    await assert.rejects(store.save({ targets: { job1: [target(1)] }, idleAt: null }), (e: unknown) => {
      return e instanceof ShardTargetsError && e.stage === 'save';
    });

    assert.deepEqual(await fs.readdir(dir), ['kvass-shard.json']);
  });
});
