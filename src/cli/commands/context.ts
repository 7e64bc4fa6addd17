/**
 * Helpers shared by the commands that build, assemble and publish releases
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import { ENV_VARS, type Config } from '../../config/index.js';
import { ReleaseError } from '../../errors.js';
import { renderReleaseBody, type RepositoryRef } from '../../release/body.js';
import { createGitClient, type GitClient } from '../../release/git.js';
import { createGitHubPublisher, type ReleasePublisher } from '../../release/publisher.js';
import { findPreviousTag, normalizeTag } from '../../release/tag.js';
import { REQUIRED_TARGETS } from '../../release/targets.js';
import { BuildTargetSchema, type BuildTarget } from '../../types/release.js';

/**
 * Validate a target name given on the command line
 */
export function parseTargetArgument(value: string): BuildTarget {
  const result = BuildTargetSchema.safeParse(value);
  if (!result.success) {
    throw new ReleaseError(
      `Unknown target "${value}". Expected one of: ${BuildTargetSchema.options.join(', ')}`,
      { operation: 'parseTarget' },
    );
  }
  return result.data;
}

/**
 * Targets a run waits for. Subsets are for dry runs: a published release
 * always carries every required target.
 */
export function resolveReleaseTargets(
  config: Config,
  options: { targets?: string[]; publish?: boolean },
): BuildTarget[] {
  if (options.publish) {
    if (options.targets) {
      throw new ReleaseError('--targets cannot be combined with --publish', { operation: 'resolveTargets' });
    }
    return [...REQUIRED_TARGETS];
  }
  return options.targets ? options.targets.map(parseTargetArgument) : config.release.targets;
}

export function requireRepository(config: Config): RepositoryRef {
  const { owner, repo } = config.repository;
  if (!owner || !repo) {
    throw new ReleaseError(
      `Repository is not configured. Set repository.owner/repo or ${ENV_VARS.REPOSITORY}`,
      { operation: 'resolveRepository' },
    );
  }
  return { owner, repo };
}

export interface ReleaseBodyOptions {
  config: Config;
  tag: string;
  cwd: string;
  changelogFile?: string;
  git?: GitClient;
}

/**
 * Fill the release body template for a tag, looking up the previous tag in git
 */
export async function composeReleaseBody(options: ReleaseBodyOptions): Promise<string> {
  const repository = requireRepository(options.config);
  const tag = normalizeTag(options.tag);

  const changelog = options.changelogFile
    ? await fs.readFile(path.resolve(options.cwd, options.changelogFile), 'utf-8')
    : undefined;

  const git = options.git ?? createGitClient(options.cwd);
  const previousTag = findPreviousTag(tag, await git.listTags());

  return renderReleaseBody({ repository, currentRef: tag, previousTag, changelog });
}

/**
 * GitHub publisher authenticated from GITHUB_TOKEN
 */
export function createPublisherFromEnv(config: Config): ReleasePublisher {
  const token = process.env[ENV_VARS.TOKEN];
  if (!token) {
    throw new ReleaseError(`${ENV_VARS.TOKEN} is required to publish a release`, {
      operation: 'publishRelease',
    });
  }
  return createGitHubPublisher({ repository: requireRepository(config), token });
}
