/**
 * Health diagnostics for a local installation.
 */

import { existsSync } from 'fs';
import { join } from 'path';
import * as logger from './logger.js';
import type { Config } from '../config.js';
import { TABLES, closeDb, openDatabase } from '../services/database.js';

export interface DiagnosticCheck {
  name: string;
  passed: boolean;
  message: string;
  fix?: string;
}

/**
 * Run every check against `cfg` without printing anything.
 */
export async function collectDiagnostics(
  cfg: Config,
  cwd: string = process.cwd()
): Promise<DiagnosticCheck[]> {
  const checks: DiagnosticCheck[] = [];

  const envExists = existsSync(join(cwd, '.env'));
  checks.push({
    name: 'Environment File',
    passed: envExists,
    message: envExists ? '.env file found' : '.env file not found (using defaults)',
    fix: envExists ? undefined : 'Copy .env.example to .env',
  });

  const dbExists = existsSync(cfg.DATABASE_PATH);
  checks.push({
    name: 'SQLite File',
    passed: dbExists,
    message: dbExists ? `Database file: ${cfg.DATABASE_PATH}` : `Database file not found: ${cfg.DATABASE_PATH}`,
    fix: dbExists ? undefined : 'Run: warehouse init-db',
  });

  if (dbExists) {
    const db = openDatabase(cfg.DATABASE_PATH);
    try {
      const missing: string[] = [];
      for (const table of Object.values(TABLES)) {
        if (!(await db.schema.hasTable(table))) {
          missing.push(table);
        }
      }
      checks.push({
        name: 'Tables',
        passed: missing.length === 0,
        message: missing.length === 0 ? 'All tables present' : `Missing: ${missing.join(', ')}`,
        fix: missing.length === 0 ? undefined : 'Run: warehouse init-db',
      });
    } finally {
      await closeDb(db);
    }
  }

  const hasKey = cfg.OPENAI_API_KEY !== undefined;
  checks.push({
    name: 'OpenAI API Key',
    passed: hasKey,
    message: hasKey ? 'API key configured' : 'No key configured; NL queries need POST /openai/set-key',
    fix: hasKey ? undefined : 'Add OPENAI_API_KEY=... to .env',
  });

  const majorVersion = Number.parseInt(process.version.slice(1).split('.')[0], 10);
  const validNodeVersion = majorVersion >= 20;
  checks.push({
    name: 'Node.js Version',
    passed: validNodeVersion,
    message: `Node ${process.version}`,
    fix: validNodeVersion ? undefined : 'Upgrade to Node.js 20 or higher',
  });

  return checks;
}

/**
 * Run diagnostics and print a report. Returns true when every check passed.
 */
export async function runDiagnostics(cfg: Config): Promise<boolean> {
  logger.banner('doctor');

  const checks = await collectDiagnostics(cfg);
  logger.table(
    ['Check', 'Result', 'Details'],
    checks.map((check) => [check.name, check.passed ? 'pass' : 'FAIL', check.message])
  );

  const failed = checks.filter((check) => !check.passed);
  if (failed.length > 0) {
    logger.heading('To fix');
    for (const check of failed) {
      logger.status('fail', check.name, check.fix);
    }
  }

  logger.summary(checks.length - failed.length, checks.length);
  return failed.length === 0;
}
