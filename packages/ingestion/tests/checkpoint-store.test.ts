import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { CheckpointStore } from '../src/checkpoint/checkpoint-store';
import { FileCheckpointStore } from '../src/checkpoint/file-checkpoint-store';
import { metrics } from '../src/core/metrics';
import { CheckpointsRepository } from '../src/db/repositories/checkpoints.repo';
import { FakeStateTable, PEER_ID, silentLogger } from './helpers/fakes';

describe('FileCheckpointStore', () => {
  let dir: string;
  let stateDir: string;
  let store: FileCheckpointStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'checkpoint-'));
    stateDir = join(dir, 'state');
    store = new FileCheckpointStore(stateDir, silentLogger());
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should start from 0 when no state exists', async () => {
    expect(await store.load(PEER_ID)).toBe(0);
  });

  it('should persist the cursor as a plain integer per peer', async () => {
    expect(await store.save(PEER_ID, 120)).toBe(true);

    expect(await readFile(join(stateDir, '42'), 'utf-8')).toBe('120');
    expect(await store.load(PEER_ID)).toBe(120);
    expect(await store.load(7)).toBe(0);
  });

  it('should never lower a stored cursor', async () => {
    await store.save(PEER_ID, 10);
    expect(await store.save(PEER_ID, 4)).toBe(true);
    expect(await store.load(PEER_ID)).toBe(10);
  });

  it('should reset to 0 explicitly', async () => {
    await store.save(PEER_ID, 10);
    expect(await store.reset(PEER_ID)).toBe(true);
    expect(await store.load(PEER_ID)).toBe(0);
  });

  it('should fall back to 0 on a corrupt state file', async () => {
    await store.save(PEER_ID, 1);
    await writeFile(join(stateDir, '42'), 'not-a-number');
    expect(await store.load(PEER_ID)).toBe(0);
  });

  it('should reject invalid cursors', async () => {
    expect(await store.save(PEER_ID, -1)).toBe(false);
    expect(await store.save(PEER_ID, 2.5)).toBe(false);
    expect(await store.load(PEER_ID)).toBe(0);
  });

  it('should report a failed write instead of throwing', async () => {
    const blocked = join(dir, 'blocked');
    await writeFile(blocked, '');
    const failing = new FileCheckpointStore(blocked, silentLogger());
    const before = metrics.get('checkpoint_save_failures');

    expect(await failing.save(PEER_ID, 5)).toBe(false);
    expect(metrics.get('checkpoint_save_failures')).toBe(before + 1);
  });
});

describe('checkpoint backend equivalence', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'checkpoint-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function observe(store: CheckpointStore) {
    const seen: Array<number | boolean> = [];
    seen.push(await store.load(PEER_ID));
    seen.push(await store.save(PEER_ID, 5));
    seen.push(await store.save(PEER_ID, 3));
    seen.push(await store.load(PEER_ID));
    seen.push(await store.save(PEER_ID, -1));
    seen.push(await store.reset(PEER_ID));
    seen.push(await store.load(PEER_ID));
    seen.push(await store.save(PEER_ID, 7));
    seen.push(await store.load(PEER_ID));
    return seen;
  }

  it('should observe the same values on the file and database backends', async () => {
    const fromFile = await observe(new FileCheckpointStore(join(dir, 'state'), silentLogger()));
    const fromDatabase = await observe(new CheckpointsRepository(new FakeStateTable(), silentLogger()));

    expect(fromFile).toEqual([0, true, true, 5, false, true, 0, true, 7]);
    expect(fromDatabase).toEqual(fromFile);
  });
});
