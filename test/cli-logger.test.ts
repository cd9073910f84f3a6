import { afterEach, describe, expect, it, vi } from 'vitest';
import { errorMessage, status, summary, table } from '../src/cli/logger.js';

const ANSI = /\u001b\[[0-9;]*m/g;

describe('CLI output', () => {
  const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

  afterEach(() => {
    log.mockClear();
  });

  function printed(): string[] {
    return log.mock.calls.map((call) => String(call[0]).replace(ANSI, ''));
  }

  it('prints a status line with its hint underneath', () => {
    status('fail', 'Backup failed', 'Database file not found: ./data/x.db');

    expect(printed()).toEqual(['✖ Backup failed', '  Database file not found: ./data/x.db']);
  });

  it('omits an empty hint', () => {
    status('ok', 'Database restored');

    expect(printed()).toEqual(['✔ Database restored']);
  });

  it('summarizes doctor results', () => {
    summary(3, 5);

    expect(printed()[0]).toContain('2 of 5 checks failed');
  });

  it('renders table rows', () => {
    table(['Entity', 'Created'], [['Users', 10]]);

    expect(printed()[0]).toMatch(/Users\s+│\s+10/);
  });

  it('reads messages from errors and other values', () => {
    expect(errorMessage(new Error('disk full'))).toBe('disk full');
    expect(errorMessage('plain')).toBe('plain');
  });
});
