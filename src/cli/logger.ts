/**
 * Terminal output for the warehouse CLI.
 */

import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import Table from 'cli-table3';

const brand = gradient(['#1e90ff', '#20b2aa']);

export type Status = 'ok' | 'fail' | 'warn' | 'note';

const MARKS: Record<Status, string> = {
  ok: chalk.green('✔'),
  fail: chalk.red('✖'),
  warn: chalk.yellow('!'),
  note: chalk.blue('·'),
};

/**
 * One status line, with an optional dimmed hint underneath.
 */
export function status(kind: Status, message: string, hint?: string): void {
  console.log(`${MARKS[kind]} ${message}`);
  if (hint) {
    console.log(`  ${chalk.dim(hint)}`);
  }
}

export function banner(subtitle: string): void {
  console.log(`\n${brand('Policy Warehouse')} ${chalk.gray(`· ${subtitle}`)}\n`);
}

export function heading(title: string): void {
  console.log(`\n${chalk.bold(title)}`);
}

export function spinner(text: string): ReturnType<typeof ora> {
  return ora({ text, color: 'blue' }).start();
}

/**
 * Boxed pass/fail summary, green when every check passed.
 */
export function summary(passed: number, total: number): void {
  const healthy = passed === total;
  const text = healthy
    ? `${passed}/${total} checks passed`
    : `${total - passed} of ${total} checks failed`;

  console.log(
    boxen(healthy ? chalk.green(text) : chalk.red(text), {
      padding: { left: 2, right: 2 },
      borderStyle: 'round',
      borderColor: healthy ? 'green' : 'red',
    })
  );
}

/**
 * Print rows under a colored header.
 */
export function table(head: string[], rows: Array<Array<string | number>>): void {
  const output = new Table({
    head: head.map((cell) => chalk.cyan(cell)),
    style: { head: [], border: ['gray'] },
  });
  output.push(...rows);
  console.log(output.toString());
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
