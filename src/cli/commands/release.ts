/**
 * Release command
 * Local rehearsal of the whole release: every build job side by side, then
 * the barrier, then (optionally) publishing
 */

import { Command } from 'commander';
import path from 'node:path';

import { loadConfig } from '../../config/index.js';
import { errorMessage } from '../../errors.js';
import { assembleRelease } from '../../release/assembler.js';
import { getBuildDefinition, runBuildJob } from '../../release/build-job.js';
import { createCommandRunner } from '../../release/command-runner.js';
import { runReleasePipeline } from '../../release/pipeline.js';
import { createReleaseLogger } from '../../release/release-logger.js';
import {
  printDebug,
  printError,
  printFailure,
  printHeader,
  printInfo,
  printJson,
  printReleasePlan,
  printSuccess,
  printWarning,
  setVerbose,
} from '../output.js';
import { publishWithLog } from './assemble.js';
import { composeReleaseBody, resolveReleaseTargets } from './context.js';

interface ReleaseRunOptions {
  tag: string;
  targets?: string[];
  changelogFile?: string;
  publish?: boolean;
  json?: boolean;
}

/**
 * Create the release command
 */
export function createReleaseCommand(): Command {
  const release = new Command('release').description('Run the release pipeline');

  release
    .command('run')
    .description('Build every target in parallel on this host, then assemble the release')
    .requiredOption('-t, --tag <tag>', 'Release tag')
    .option('--targets <targets...>', 'Subset of targets to build (not with --publish)')
    .option('--changelog-file <file>', 'Markdown to place under "What\'s Changed"')
    .option('--publish', 'Create the GitHub release when every job succeeded')
    .option('--json', 'Output the pipeline result as JSON')
    .action(async (options: ReleaseRunOptions) => {
      const cwd = process.cwd();

      try {
        const config = await loadConfig(cwd);
        setVerbose(config.output.verbose);
        const logger = createReleaseLogger(cwd, { verbose: config.output.verbose });
        const targets = resolveReleaseTargets(config, options);
        const runner = createCommandRunner();
        const body = await composeReleaseBody({
          config,
          tag: options.tag,
          cwd,
          changelogFile: options.changelogFile,
        });

        if (!options.json) {
          printHeader(`Release ${options.tag}`);
        }
        await logger.info('pipeline', `Starting release pipeline for ${options.tag}`, { targets });

        // Journal writes are chained so entries keep their order
        let journal = Promise.resolve();
        const result = await runReleasePipeline({
          tag: options.tag,
          targets,
          runJob: async (target) => {
            const outcome = await runBuildJob(getBuildDefinition(target, config.build.steps[target]), {
              cwd,
              tag: options.tag,
              runner,
              outputDir: path.join(config.build.output_dir, target),
              onStepComplete: (step) => {
                if (!options.json) printDebug(`${target}: ${step.name} exited ${step.exit_code}`);
                journal = journal.then(() =>
                  logger.debug('build', `${target}: ${step.name}`, {
                    command: step.command,
                    exit_code: step.exit_code,
                    stderr: step.stderr_summary,
                  }),
                );
              },
            });
            return outcome.result;
          },
          assemble: (results) =>
            assembleRelease({ tag: options.tag, results, body, expectedTargets: targets }),
          onJobStart: (target) => {
            if (!options.json) printInfo(`Building ${target}`);
          },
          onJobComplete: (job) => {
            if (options.json) return;
            if (job.status === 'success') {
              printSuccess(`${job.target} built`);
            } else {
              printWarning(`${job.target} failed: ${job.error}`);
            }
          },
        });

        await journal;
        for (const job of result.jobs) {
          if (job.status === 'success') {
            await logger.success('build', `${job.target} built`, {
              artifacts: job.artifacts.map((artifact) => artifact.name),
            });
          } else {
            await logger.error('build', `${job.target} failed: ${job.error}`);
          }
        }

        if (!result.plan) {
          const reason = result.error ? errorMessage(result.error) : 'Release pipeline failed';
          await logger.error('pipeline', reason);
          if (options.json) {
            printJson({ success: false, jobs: result.jobs, error: reason });
          } else {
            printError(reason);
          }
          process.exit(1);
        }

        await logger.success('assemble', `Planned ${result.plan.name}`);
        const published = options.publish
          ? await publishWithLog(result.plan, config, logger, options.json)
          : null;

        if (options.json) {
          printJson({ success: true, jobs: result.jobs, plan: result.plan, release: published });
          return;
        }

        printReleasePlan(result.plan);
        printInfo(`Journal written to ${logger.filePath}`);
      } catch (error) {
        printFailure(error);
        process.exit(1);
      }
    });

  return release;
}
