/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';

import {
  createAssembleCommand,
  createBuildCommand,
  createClassifyCommand,
  createConfigCommand,
  createFetchModelCommand,
  createGateCommand,
  createReleaseCommand,
  createRenameCommand,
  createTargetsCommand,
} from './commands/index.js';
import { printFailure } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

export const VERSION: string = readVersion();

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('freescribe-release')
    .description('Build, gate and publish FreeScribe installer releases')
    .version(VERSION)
    .option('--no-color', 'Disable colored output');

  program.addCommand(createClassifyCommand());
  program.addCommand(createTargetsCommand());
  program.addCommand(createBuildCommand());
  program.addCommand(createRenameCommand());
  program.addCommand(createAssembleCommand());
  program.addCommand(createReleaseCommand());
  program.addCommand(createGateCommand());
  program.addCommand(createFetchModelCommand());
  program.addCommand(createConfigCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printFailure(error);
    process.exit(1);
  }
}
