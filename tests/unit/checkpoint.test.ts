import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { chmod, mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  adoptSeededEntry,
  CheckpointStore,
  emptyCheckpoint,
  entriesForAthlete,
  findByAthleteId,
  subjectEntry,
  type Checkpoint,
} from '../../src/lib/checkpoint';
import { PersistenceError } from '../../src/lib/errors';
import { makeTempDir, removeTempDir } from '../helpers/records';

describe('CheckpointStore', () => {
  let dir: string;
  let path: string;
  let store: CheckpointStore;

  beforeEach(async () => {
    dir = await makeTempDir('checkpoint-');
    path = join(dir, 'strava_checkpoint.json');
    store = new CheckpointStore(path);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  const sample = (): Checkpoint => ({
    last_batch_index: 3,
    athletes: {
      '2_Alice': { refresh_token: 'refresh-a', last_activity_ts: '2025-03-03T06:00:00.000Z', athlete_id: '9001' },
    },
  });

  it('should start empty when the file is missing', async () => {
    expect(await store.load()).toEqual({ last_batch_index: 0, athletes: {} });
  });

  it('should start empty when the file is not JSON', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await writeFile(path, '{"last_batch_index": 1,');

    expect(await store.load()).toEqual(emptyCheckpoint());
    expect(warn).toHaveBeenCalledWith(`[Checkpoint] ${path} is not valid JSON; starting fresh`);
  });

  it('should start empty when the file has the wrong shape', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    await writeFile(path, JSON.stringify({ last_batch_index: 'three', athletes: [] }));

    expect(await store.load()).toEqual(emptyCheckpoint());
  });

  it('should fill in defaults for a partial file', async () => {
    await writeFile(path, JSON.stringify({ athletes: { '7': { refresh_token: 'refresh-7' } } }));

    expect(await store.load()).toEqual({ last_batch_index: 0, athletes: { '7': { refresh_token: 'refresh-7' } } });
  });

  it('should save atomically and load what was saved', async () => {
    await store.save(sample());

    expect(await store.load()).toEqual(sample());
    expect(await readFile(path, 'utf-8')).toBe(`${JSON.stringify(sample(), null, 2)}\n`);
    expect(existsSync(`${path}.tmp`)).toBe(false);
  });

  it('should keep the checkpoint readable by its owner only', async () => {
    await writeFile(path, '{}');
    await chmod(path, 0o644);

    await store.save(sample());

    expect((await stat(path)).mode & 0o777).toBe(0o600);
  });

  it('should keep unknown fields written by other tools', async () => {
    await writeFile(path, JSON.stringify({ last_batch_index: 0, athletes: { '7': { refresh_token: 'r', note: 'keep me' } } }));

    const loaded = await store.load();
    await store.save(loaded);

    expect(JSON.parse(await readFile(path, 'utf-8')).athletes['7'].note).toBe('keep me');
  });

  it('should leave the previous file intact when a save fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    await store.save(sample());
    // A directory where the temp file should go makes the write fail.
    await mkdir(`${path}.tmp`);

    const next = sample();
    next.last_batch_index = 4;
    await expect(store.save(next)).rejects.toBeInstanceOf(PersistenceError);
    expect(await store.load()).toEqual(sample());
  });

  it('should report a failed save through persist without throwing', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    await mkdir(`${path}.tmp`);

    expect(await store.persist(sample())).toBe(false);
    expect(error).toHaveBeenCalledTimes(1);
    expect(existsSync(path)).toBe(false);
  });
});

describe('checkpoint entries', () => {
  it('should create an entry on first use and reuse it afterwards', () => {
    const checkpoint = emptyCheckpoint();

    const entry = subjectEntry(checkpoint, '2_Alice');
    entry.refresh_token = 'refresh-a';

    expect(subjectEntry(checkpoint, '2_Alice')).toBe(entry);
    expect(checkpoint.athletes).toEqual({ '2_Alice': { refresh_token: 'refresh-a' } });
  });

  it('should find an entry by athlete id or by key', () => {
    const checkpoint: Checkpoint = {
      last_batch_index: 0,
      athletes: {
        '2_Alice': { athlete_id: '9001', refresh_token: 'refresh-a' },
        '9002': { refresh_token: 'refresh-b' },
      },
    };

    expect(findByAthleteId(checkpoint, '9001')?.key).toBe('2_Alice');
    expect(findByAthleteId(checkpoint, '9002')?.entry.refresh_token).toBe('refresh-b');
    expect(findByAthleteId(checkpoint, '9003')).toBeNull();
  });

  it('should prefer the roster-keyed entry over one keyed by the bare athlete id', () => {
    const checkpoint: Checkpoint = {
      last_batch_index: 0,
      athletes: {
        '2_Alice': { athlete_id: '9001', refresh_token: 'rotated' },
        '9001': { athlete_id: '9001', refresh_token: 'stale' },
      },
    };

    expect(Object.keys(checkpoint.athletes)).toEqual(['9001', '2_Alice']);
    expect(findByAthleteId(checkpoint, '9001')).toEqual({
      key: '2_Alice',
      entry: { athlete_id: '9001', refresh_token: 'rotated' },
    });
    expect(entriesForAthlete(checkpoint, '9001').map((m) => m.key)).toEqual(['9001', '2_Alice']);
  });

  it('should fold a seeded entry into the roster-keyed one', () => {
    const checkpoint: Checkpoint = {
      last_batch_index: 0,
      athletes: {
        '9001': { athlete_id: '9001', refresh_token: 'seed-token', seeded_at: '2025-03-01T00:00:00.000Z' },
        '3_Bob': { athlete_id: '9002', refresh_token: 'refresh-b' },
      },
    };

    expect(adoptSeededEntry(checkpoint, '2_Alice', '9001')).toBe(true);
    expect(adoptSeededEntry(checkpoint, '2_Alice', '9001')).toBe(false);
    expect(checkpoint.athletes).toEqual({
      '3_Bob': { athlete_id: '9002', refresh_token: 'refresh-b' },
      '2_Alice': { athlete_id: '9001', refresh_token: 'seed-token', seeded_at: '2025-03-01T00:00:00.000Z' },
    });
  });

  it('should keep the roster entry token when folding in a seeded entry', () => {
    const checkpoint: Checkpoint = {
      last_batch_index: 0,
      athletes: {
        '9001': { athlete_id: '9001', refresh_token: 'seed-token' },
        '2_Alice': { refresh_token: 'rotated', last_activity_ts: '2025-03-03T06:00:00Z' },
      },
    };

    adoptSeededEntry(checkpoint, '2_Alice', '9001');

    expect(checkpoint.athletes).toEqual({
      '2_Alice': { athlete_id: '9001', refresh_token: 'rotated', last_activity_ts: '2025-03-03T06:00:00Z' },
    });
  });
});
