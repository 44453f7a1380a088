/**
 * chalk-based console output for the CLI commands.
 */

import chalk from 'chalk';
import type { TaskStats } from '@todo-list/core';

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function info(message: string): void {
  console.log(message);
}

function count(n: number, label: string, color: (s: string) => string): string {
  return n > 0 ? color(`${n} ${label}`) : chalk.dim(`0 ${label}`);
}

export function formatStats(stats: TaskStats): string[] {
  return [
    chalk.bold.underline('Tasks'),
    '',
    `  Total: ${chalk.bold(String(stats.total))}`,
    `  ${count(stats.completed, 'completed', chalk.green)}, ${count(stats.pending, 'pending', chalk.yellow)}`,
  ];
}
