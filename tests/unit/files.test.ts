import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { readFileIfExists, writeFileAtomic } from '../../src/lib/files';
import { makeTempDir, removeTempDir } from '../helpers/records';

describe('writeFileAtomic', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('files-');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  const modeOf = async (path: string) => (await stat(path)).mode & 0o777;

  it('should keep the permissions of the file it replaces', async () => {
    const path = join(dir, 'roster.csv');
    await writeFile(path, 'Name\n');
    await chmod(path, 0o640);

    await writeFileAtomic(path, 'Name\nAlice\n');

    expect(await readFile(path, 'utf-8')).toBe('Name\nAlice\n');
    expect(await modeOf(path)).toBe(0o640);
  });

  it('should apply an explicit mode', async () => {
    const path = join(dir, 'secret.json');
    await writeFile(path, '{}');
    await chmod(path, 0o644);

    await writeFileAtomic(path, '{"a":1}', { mode: 0o600 });

    expect(await modeOf(path)).toBe(0o600);
  });

  it('should create missing directories', async () => {
    const path = join(dir, 'nested', 'out', 'activities.json');

    await writeFileAtomic(path, '[]');

    expect(await readFileIfExists(path)).toBe('[]');
  });
});

describe('readFileIfExists', () => {
  it('should return null for a missing file', async () => {
    expect(await readFileIfExists(join('/nonexistent-dir', 'nothing.txt'))).toBeNull();
  });
});
