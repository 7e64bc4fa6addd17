/**
 * Assemble command
 * Gathers every job's build report for a tag and, with --publish, releases them
 */

import { Command } from 'commander';
import path from 'node:path';

import { loadConfig, type Config } from '../../config/index.js';
import { errorMessage } from '../../errors.js';
import { assembleRelease, collectBuildResults, publishRelease } from '../../release/assembler.js';
import type { RemoteRelease } from '../../release/publisher.js';
import { createReleaseLogger, type ReleaseLogger } from '../../release/release-logger.js';
import type { ReleasePlan } from '../../types/release.js';
import {
  failSpinner,
  printFailure,
  printJson,
  printReleasePlan,
  printSuccess,
  setVerbose,
  startSpinner,
  succeedSpinner,
  updateSpinner,
} from '../output.js';
import { composeReleaseBody, createPublisherFromEnv, resolveReleaseTargets } from './context.js';

interface AssembleOptions {
  tag: string;
  artifactsDir?: string;
  changelogFile?: string;
  publish?: boolean;
  json?: boolean;
}

/**
 * Publish a plan, journalling each stage
 */
export async function publishWithLog(
  plan: ReleasePlan,
  config: Config,
  logger: ReleaseLogger,
  quiet = false,
): Promise<RemoteRelease> {
  const publisher = createPublisherFromEnv(config);
  if (!quiet) startSpinner(`Publishing ${plan.name}`);

  // Journal writes are chained so entries keep their order
  let journal = Promise.resolve();
  try {
    const release = await publishRelease(plan, publisher, {
      onExisting: config.release.on_existing,
      onProgress: (message) => {
        if (!quiet) updateSpinner(message);
        journal = journal.then(() => logger.info('publish', message));
      },
    });
    await journal;
    await logger.success('publish', `Published ${plan.name}`, { url: release.url });
    if (!quiet) succeedSpinner(`Published ${release.url}`);
    return release;
  } catch (error) {
    if (!quiet) failSpinner('Publishing failed');
    await journal;
    await logger.error('publish', errorMessage(error));
    throw error;
  }
}

/**
 * Create the assemble command
 */
export function createAssembleCommand(): Command {
  return new Command('assemble')
    .description('Check every build job for a tag and plan (or publish) the release')
    .requiredOption('-t, --tag <tag>', 'Release tag')
    .option('-a, --artifacts-dir <dir>', 'Directory holding the downloaded job artifacts')
    .option('--changelog-file <file>', 'Markdown to place under "What\'s Changed"')
    .option('--publish', 'Create the GitHub release')
    .option('--json', 'Output the release plan as JSON')
    .action(async (options: AssembleOptions) => {
      const cwd = process.cwd();

      try {
        const config = await loadConfig(cwd);
        setVerbose(config.output.verbose);
        const logger = createReleaseLogger(cwd, { verbose: config.output.verbose });
        const artifactsDir = path.resolve(cwd, options.artifactsDir ?? config.release.artifacts_dir);

        const results = await collectBuildResults(artifactsDir, options.tag);
        await logger.info('collect', `Found ${results.length} build report(s) in ${artifactsDir}`);

        const body = await composeReleaseBody({
          config,
          tag: options.tag,
          cwd,
          changelogFile: options.changelogFile,
        });

        let plan: ReleasePlan;
        try {
          plan = await assembleRelease({
            tag: options.tag,
            results,
            body,
            expectedTargets: resolveReleaseTargets(config, { publish: options.publish }),
          });
        } catch (error) {
          await logger.error('assemble', errorMessage(error));
          throw error;
        }
        await logger.success('assemble', `Planned ${plan.name} with ${plan.assets.length} asset(s)`, {
          prerelease: plan.prerelease,
        });

        const release = options.publish ? await publishWithLog(plan, config, logger, options.json) : null;

        if (options.json) {
          printJson({ plan, release });
          return;
        }

        printReleasePlan(plan);
        if (!release) {
          printSuccess('Release plan is complete. Run again with --publish to release it');
        }
      } catch (error) {
        printFailure(error);
        process.exit(1);
      }
    });
}
