import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { collectDiagnostics } from '../src/cli/diagnostics.js';
import { parseConfig } from '../src/config.js';
import { closeDb, createSchema, openDatabase } from '../src/services/database.js';

describe('collectDiagnostics', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'warehouse-doctor-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('flags a fresh checkout', async () => {
    const cfg = parseConfig({ DATABASE_PATH: join(dir, 'data', 'warehouse.db') });

    const checks = await collectDiagnostics(cfg, dir);

    expect(checks.map((check) => [check.name, check.passed])).toEqual([
      ['Environment File', false],
      ['SQLite File', false],
      ['OpenAI API Key', false],
      ['Node.js Version', true],
    ]);
    expect(checks[1].fix).toBe('Run: warehouse init-db');
  });

  it('passes an initialized installation', async () => {
    const databasePath = join(dir, 'data', 'warehouse.db');
    const db = openDatabase(databasePath);
    await createSchema(db);
    await closeDb(db);
    await writeFile(join(dir, '.env'), 'OPENAI_API_KEY=test-key\n');

    const checks = await collectDiagnostics(
      parseConfig({ DATABASE_PATH: databasePath, OPENAI_API_KEY: 'test-key' }),
      dir
    );

    expect(checks.every((check) => check.passed)).toBe(true);
    expect(checks.map((check) => check.name)).toContain('Tables');
  });
});
