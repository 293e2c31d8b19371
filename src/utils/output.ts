/**
 * Terminal output for commands
 *
 * Human output goes to stdout, except errors and verbose lines, which go
 * to stderr so `--json` output stays parseable.
 */

import chalk from 'chalk';
import type { CommandResult } from '../types.js';
import type { TagPatch } from '../reconcilers/tags/types.js';

/**
 * Print a command result as JSON (--json). In human mode each command
 * prints its own output as it goes.
 */
export function printResult<T>(result: CommandResult<T>): void {
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Print the tag changes of a plan
 */
export function printTagSteps(steps: readonly TagPatch[]): void {
  if (steps.length === 0) {
    console.log(chalk.gray('No tag changes needed'));
    return;
  }

  console.log(chalk.bold(`\n${steps.length} tag change(s):\n`));

  for (const step of steps) {
    const { icon, color } = STEP_STYLES[step.kind];
    console.log(color(`  ${icon} ${step.version}`), chalk.gray(step.fromTag || '(none)'), '->', color(step.toTag));
  }
}

/**
 * Print a key/value table
 */
export function printTable(rows: Record<string, unknown>): void {
  for (const [key, value] of Object.entries(rows)) {
    console.log(`  ${chalk.gray(formatLabel(key) + ':')} ${formatValue(value)}`);
  }
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/** Only printed with --verbose */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    console.error(chalk.gray('[verbose]'), message);
  }
}

export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

const STEP_STYLES: Record<TagPatch['kind'], { icon: string; color: typeof chalk.green }> = {
  'assign-latest': { icon: '↑', color: chalk.green },
  'restore-tag': { icon: '↓', color: chalk.yellow },
  quarantine: { icon: '⊘', color: chalk.red },
};

function formatValue(value: unknown): string {
  if (value === undefined || value === null) return chalk.gray('(none)');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** camelCase key to "Camel Case" */
function formatLabel(key: string): string {
  return key.replace(/([A-Z])/g, ' $1').replace(/^./, (first) => first.toUpperCase());
}
