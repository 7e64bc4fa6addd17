/**
 * Release body template.
 * The changelog text comes from outside; this only fills the template slot.
 */

import { ReleaseError } from '../errors.js';

export interface RepositoryRef {
  owner: string;
  repo: string;
}

export interface ReleaseBodyInput {
  repository: RepositoryRef;
  currentRef: string;
  previousTag: string | null;
  changelog?: string;
}

export const EMPTY_CHANGELOG = '_No changelog provided._';

/**
 * Link comparing the previous tag with the current ref, or the commit list
 * when there is no earlier release
 */
export function comparisonLink({ owner, repo }: RepositoryRef, previousTag: string | null, currentRef: string): string {
  const base = `https://github.com/${owner}/${repo}`;
  return previousTag ? `${base}/compare/${previousTag}...${currentRef}` : `${base}/commits/${currentRef}`;
}

export function renderReleaseBody(input: ReleaseBodyInput): string {
  const changelog = input.changelog?.trim() || EMPTY_CHANGELOG;
  const link = comparisonLink(input.repository, input.previousTag, input.currentRef);

  return ["## What's Changed", changelog, '', `**Full Changelog**: ${link}`, ''].join('\n');
}

/**
 * Parse "owner/repo" as found in GITHUB_REPOSITORY
 */
export function parseRepository(value: string): RepositoryRef {
  const [owner, repo, ...rest] = value.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new ReleaseError(`Invalid repository "${value}". Expected owner/repo`, {
      operation: 'parseRepository',
    });
  }
  return { owner, repo };
}
