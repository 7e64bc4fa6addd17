/**
 * CLI output utilities
 * Handles formatted output, spinners, and progress display
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import { describeError } from '../errors.js';
import type { BuildJobOutcome } from '../release/build-job.js';
import type { BuildStepResult, ReleasePlan } from '../types/release.js';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/** Set from output.verbose once a command has loaded its config */
let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

/**
 * Start a spinner with a message
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

/**
 * Stop spinner with success
 */
export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

/**
 * Stop spinner with failure
 */
export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

/**
 * Print a header
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

export function printWarning(message: string): void {
  console.log(theme.warning(`[WARN] ${message}`));
}

/**
 * Errors go to stderr so `--json` output stays parseable
 */
export function printError(message: string): void {
  console.error(theme.error(`[ERROR] ${message}`));
}

/**
 * Print an error thrown by a command, with its details when verbose
 */
export function printFailure(error: unknown): void {
  printError(describeError(error, verbose));
}

export function printDebug(message: string): void {
  if (verbose) {
    console.log(theme.dim(`[DEBUG] ${message}`));
  }
}

export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

/**
 * Print a key-value pair
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Print a list item
 */
export function printListItem(item: string, indent: number = 0): void {
  const prefix = '  '.repeat(indent) + '- ';
  console.log(theme.secondary(prefix) + item);
}

/**
 * Print a table
 */
export function printTable(headers: string[], rows: string[][]): void {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
    return Math.max(h.length, maxRow);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));

  for (const row of rows) {
    const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
    console.log(rowLine);
  }
}

/**
 * Print a JSON document on stdout
 */
export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// ─── Domain views ────────────────────────────────────────

function getStepIcon(status: BuildStepResult['status']): string {
  switch (status) {
    case 'pass':
      return theme.success('[OK]');
    case 'fail':
      return theme.error('[X]');
    default:
      return theme.dim('[ ]');
  }
}

/**
 * Print the steps and artifacts of one build job
 */
export function printBuildOutcome(outcome: BuildJobOutcome): void {
  const { report } = outcome;

  printSection(`Build ${report.target}`);
  for (const step of report.steps) {
    const timing = step.status === 'skip' ? '' : theme.dim(` (${step.duration_ms}ms)`);
    console.log(`  ${getStepIcon(step.status)} ${step.name}${timing}`);
  }

  if (report.status === 'success') {
    console.log();
    for (const artifact of report.artifacts) {
      printKeyValue(artifact.name, `${artifact.size} bytes, sha256 ${artifact.sha256.slice(0, 12)}`);
    }
  } else if (report.error) {
    console.log();
    printError(report.error);
  }

  printKeyValue('Report', outcome.reportPath);
}

/**
 * Print what a release would publish
 */
export function printReleasePlan(plan: ReleasePlan): void {
  printSection(plan.name);
  printKeyValue('Tag', plan.tag);
  printKeyValue('Pre-release', plan.prerelease);

  console.log();
  console.log(theme.highlight('  Assets:'));
  for (const asset of plan.assets) {
    printListItem(`${asset.name} (${asset.size} bytes)`, 2);
  }
}
