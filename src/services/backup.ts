/**
 * File-level backups of the SQLite database.
 */

import { copyFile, mkdir, readdir, stat, unlink } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname, join } from 'path';
import { logger } from '../utils/logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { NotFoundError } from '../types/errors.js';

const BACKUP_PATTERN = /^data_warehouse_\d{8}_\d{6}\.db$/;

export interface BackupEntry {
  name: string;
  path: string;
  modifiedAt: Date;
  size: number;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `data_warehouse_YYYYMMDD_HHMMSS.db`, in UTC.
 */
export function backupFileName(instant: Date): string {
  const date = `${instant.getUTCFullYear()}${pad(instant.getUTCMonth() + 1)}${pad(instant.getUTCDate())}`;
  const time = `${pad(instant.getUTCHours())}${pad(instant.getUTCMinutes())}${pad(instant.getUTCSeconds())}`;
  return `data_warehouse_${date}_${time}.db`;
}

/**
 * Backups in `backupDir`, newest first. Empty when the directory is missing.
 */
export async function listBackups(backupDir: string): Promise<BackupEntry[]> {
  if (!existsSync(backupDir)) {
    return [];
  }

  const names = (await readdir(backupDir)).filter((name) => BACKUP_PATTERN.test(name));
  const entries = await Promise.all(
    names.map(async (name): Promise<BackupEntry> => {
      const path = join(backupDir, name);
      const info = await stat(path);
      return { name, path, modifiedAt: info.mtime, size: info.size };
    })
  );

  // Names sort by timestamp, so they break mtime ties.
  return entries.sort(
    (a, b) =>
      b.modifiedAt.getTime() - a.modifiedAt.getTime() || b.name.localeCompare(a.name)
  );
}

/**
 * Delete all but the `maxBackups` newest backups. Returns the removed paths.
 */
export async function pruneBackups(backupDir: string, maxBackups: number): Promise<string[]> {
  const backups = await listBackups(backupDir);
  const excess = backups.slice(maxBackups);

  for (const backup of excess) {
    await unlink(backup.path);
  }
  if (excess.length > 0) {
    logger.info(`Removed ${excess.length} old backups`);
  }
  return excess.map((backup) => backup.path);
}

/**
 * Copy the database file into `backupDir` and prune old copies.
 */
export async function backupDatabase(
  sourcePath: string,
  backupDir: string,
  maxBackups: number,
  clock: Clock = systemClock
): Promise<string> {
  if (!existsSync(sourcePath)) {
    throw new NotFoundError(`Database file not found: ${sourcePath}`);
  }

  await mkdir(backupDir, { recursive: true });
  const target = join(backupDir, backupFileName(clock.now()));
  await copyFile(sourcePath, target);
  logger.info(`Database backed up to: ${target}`);

  await pruneBackups(backupDir, maxBackups);
  return target;
}

/**
 * Copy a backup over the database file, creating its directory if needed.
 */
export async function restoreDatabase(backupPath: string, targetPath: string): Promise<void> {
  if (!existsSync(backupPath)) {
    throw new NotFoundError(`Backup not found: ${backupPath}`);
  }

  await mkdir(dirname(targetPath), { recursive: true });
  await copyFile(backupPath, targetPath);
  logger.info(`Database restored from: ${backupPath}`);
}
