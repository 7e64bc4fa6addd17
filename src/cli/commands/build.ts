/**
 * Build and rename commands
 * Run one target's build job on this host, or only its rename step
 */

import { Command } from 'commander';
import path from 'node:path';

import { loadConfig } from '../../config/index.js';
import { getBuildDefinition, runBuildJob } from '../../release/build-job.js';
import { canonicalizeArtifact } from '../../release/canonicalize.js';
import { createCommandRunner } from '../../release/command-runner.js';
import { getBuildTarget } from '../../release/targets.js';
import {
  failSpinner,
  printBuildOutcome,
  printDebug,
  printFailure,
  printInfo,
  printJson,
  printSuccess,
  setVerbose,
  startSpinner,
  succeedSpinner,
} from '../output.js';
import { parseTargetArgument } from './context.js';

interface BuildOptions {
  tag: string;
  cwd: string;
  outputDir?: string;
  json?: boolean;
}

/**
 * Create the build command
 */
export function createBuildCommand(): Command {
  return new Command('build')
    .description('Run the build job for one target and write its build report')
    .argument('<target>', 'windows, macos-x86_64 or macos-arm64')
    .requiredOption('-t, --tag <tag>', 'Release tag being built')
    .option('--cwd <dir>', 'Source checkout to build in', process.cwd())
    .option('-o, --output-dir <dir>', 'Directory for the installer and build report')
    .option('--json', 'Output the build report as JSON')
    .action(async (targetArg: string, options: BuildOptions) => {
      try {
        const target = parseTargetArgument(targetArg);
        const cwd = path.resolve(options.cwd);
        const config = await loadConfig(cwd);
        setVerbose(config.output.verbose);
        const definition = getBuildDefinition(target, config.build.steps[target]);
        const outputDir = options.outputDir ?? path.join(config.build.output_dir, target);

        const outcome = await runBuildJob(definition, {
          cwd,
          tag: options.tag,
          runner: createCommandRunner(),
          outputDir,
          onStepStart: (step, index) => {
            if (!options.json) startSpinner(`[${index + 1}/${definition.steps.length}] ${step.name}`);
          },
          onStepComplete: (result) => {
            if (options.json) return;
            if (result.status === 'pass') {
              succeedSpinner(result.name);
            } else {
              failSpinner(`${result.name} (exit ${result.exit_code})`);
            }
            printDebug(`$ ${result.command} (${result.duration_ms}ms)`);
            if (result.stderr_summary) printDebug(result.stderr_summary);
          },
        });

        if (options.json) {
          printJson(outcome.report);
        } else {
          printBuildOutcome(outcome);
        }

        if (outcome.result.status === 'failed') {
          process.exit(1);
        }
      } catch (error) {
        failSpinner();
        printFailure(error);
        process.exit(1);
      }
    });
}

/**
 * Create the rename command
 */
export function createRenameCommand(): Command {
  return new Command('rename')
    .description("Rename a target's installer to its published name")
    .argument('<dir>', 'Directory holding the installer')
    .argument('<target>', 'windows, macos-x86_64 or macos-arm64')
    .action(async (dir: string, targetArg: string) => {
      try {
        const info = getBuildTarget(parseTargetArgument(targetArg));
        const result = await canonicalizeArtifact(dir, info.installerName, info.canonicalName);

        if (result.outcome === 'renamed') {
          printSuccess(`Renamed ${info.installerName} to ${info.canonicalName}`);
        } else {
          printInfo(`${info.canonicalName} already in place`);
        }
      } catch (error) {
        printFailure(error);
        process.exit(1);
      }
    });
}
