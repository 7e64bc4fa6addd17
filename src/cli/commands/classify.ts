/**
 * Classify and targets commands
 * Tag classification for the release trigger, and the build target table
 */

import { Command } from 'commander';

import { ENV_VARS } from '../../config/defaults.js';
import { ReleaseError } from '../../errors.js';
import { classifyTag, matchesTriggerPattern, parseTag } from '../../release/tag.js';
import { listBuildTargets } from '../../release/targets.js';
import { appendGithubOutput } from '../../utils/github-output.js';
import {
  printFailure,
  printHeader,
  printJson,
  printKeyValue,
  printSuccess,
  printTable,
  printWarning,
} from '../output.js';

interface ClassifyOptions {
  json?: boolean;
  githubOutput?: boolean;
}

/**
 * Create the classify command
 */
export function createClassifyCommand(): Command {
  return new Command('classify')
    .description('Classify a release tag as stable or pre-release')
    .argument('<tag>', 'Release tag, e.g. v1.2.3, v1.2.3.alpha or v1.2.3-RC1')
    .option('--json', 'Output as JSON')
    .option('--github-output', 'Append prerelease= and kind= to $GITHUB_OUTPUT')
    .action(async (tag: string, options: ClassifyOptions) => {
      try {
        const parsed = parseTag(tag);
        const releaseClass = classifyTag(parsed.raw);
        const summary = {
          tag: parsed.raw,
          kind: parsed.kind,
          class: releaseClass,
          prerelease: releaseClass === 'prerelease',
          version: `${parsed.major}.${parsed.minor}.${parsed.patch}`,
          triggers: matchesTriggerPattern(parsed.raw),
        };

        if (options.githubOutput) {
          const outputFile = process.env[ENV_VARS.OUTPUT];
          if (!outputFile) {
            throw new ReleaseError(`${ENV_VARS.OUTPUT} is not set`, { operation: 'classify' });
          }
          await appendGithubOutput(outputFile, { prerelease: summary.prerelease, kind: summary.kind });
        }

        if (options.json) {
          printJson(summary);
          return;
        }

        printHeader(`Tag ${summary.tag}`);
        printKeyValue('Kind', summary.kind);
        printKeyValue('Version', summary.version);
        printKeyValue('Pre-release', summary.prerelease);
        if (!summary.triggers) {
          printWarning('Tag does not match any release trigger pattern');
        }
        if (options.githubOutput) {
          printSuccess('Wrote step outputs');
        }
      } catch (error) {
        printFailure(error);
        process.exit(1);
      }
    });
}

/**
 * Create the targets command
 */
export function createTargetsCommand(): Command {
  return new Command('targets')
    .description('List build targets and their published installer names')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const targets = listBuildTargets();

      if (options.json) {
        printJson(targets);
        return;
      }

      printHeader('Build Targets');
      printTable(
        ['Target', 'Installer', 'Published as', 'Variants'],
        targets.map((info) => [
          info.target,
          info.installerName,
          info.canonicalName,
          info.accelerators.join(', ') || '-',
        ]),
      );
    });
}
