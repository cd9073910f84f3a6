import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  backupDatabase,
  backupFileName,
  listBackups,
  restoreDatabase,
} from '../src/services/backup.js';
import { NotFoundError } from '../src/types/errors.js';
import { ManualClock } from '../src/utils/clock.js';
import { T0 } from './helpers.js';

describe('backups', () => {
  let dir: string;
  let source: string;
  let backupDir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'warehouse-backup-'));
    source = join(dir, 'data_warehouse.db');
    backupDir = join(dir, 'backups');
    await writeFile(source, 'original');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('names backups by UTC timestamp', () => {
    expect(backupFileName(new Date('2024-03-05T07:08:09.000Z'))).toBe(
      'data_warehouse_20240305_070809.db'
    );
  });

  it('copies the database into the backup directory', async () => {
    const path = await backupDatabase(source, backupDir, 5, new ManualClock(T0));

    expect(path).toBe(join(backupDir, 'data_warehouse_20240101_000000.db'));
    expect(await readFile(path, 'utf8')).toBe('original');
  });

  it('keeps only the newest backups', async () => {
    const clock = new ManualClock(T0);
    for (let i = 0; i < 3; i++) {
      await backupDatabase(source, backupDir, 2, clock);
      clock.advance(1);
    }

    const backups = await listBackups(backupDir);

    expect(backups.map((backup) => backup.name)).toEqual([
      'data_warehouse_20240101_000002.db',
      'data_warehouse_20240101_000001.db',
    ]);
    expect(await readdir(backupDir)).toHaveLength(2);
  });

  it('ignores unrelated files and missing directories', async () => {
    expect(await listBackups(join(dir, 'nowhere'))).toEqual([]);

    await backupDatabase(source, backupDir, 5, new ManualClock(T0));
    await writeFile(join(backupDir, 'notes.txt'), 'not a backup');

    expect((await listBackups(backupDir)).map((backup) => backup.name)).toEqual([
      'data_warehouse_20240101_000000.db',
    ]);
  });

  it('restores a backup over the database', async () => {
    const path = await backupDatabase(source, backupDir, 5, new ManualClock(T0));
    await writeFile(source, 'changed');

    await restoreDatabase(path, source);

    expect(await readFile(source, 'utf8')).toBe('original');
  });

  it('fails on missing files', async () => {
    await expect(backupDatabase(join(dir, 'missing.db'), backupDir, 5)).rejects.toThrow(
      NotFoundError
    );
    await expect(restoreDatabase(join(dir, 'missing.db'), source)).rejects.toThrow(
      `Backup not found: ${join(dir, 'missing.db')}`
    );
  });
});
