/**
 * Release Assembler: joins the build jobs for one tag into a single release.
 *
 * assembleRelease is the barrier: it returns a plan only when every expected
 * target succeeded and every reported file is on disk with the reported
 * checksum. publishRelease then creates a draft, uploads every asset and
 * un-drafts it; a failed upload removes the draft so no partial release
 * is ever visible.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  ArtifactIntegrityError,
  BuildFailureError,
  DuplicateArtifactError,
  errorMessage,
  MissingArtifactError,
  ReleaseError,
  ReleaseExistsError,
} from '../errors.js';
import type { BuildArtifact, BuildJobResult, BuildTarget, ReleasePlan } from '../types/release.js';
import { BUILD_REPORT_FILE, BuildReportSchema } from '../types/release.js';
import { fileExists, isNotFoundError, sha256File } from '../utils/fs.js';
import type { ReleasePublisher, RemoteRelease } from './publisher.js';
import { isPrerelease, normalizeTag, parseTag } from './tag.js';
import { REQUIRED_TARGETS } from './targets.js';

// ─── Types ───────────────────────────────────────────────

export type ExistingReleasePolicy = 'fail' | 'replace';

export interface AssembleInput {
  tag: string;
  results: BuildJobResult[];
  body: string;
  expectedTargets?: readonly BuildTarget[];
  /** Re-hash every file before planning (default true) */
  verifyChecksums?: boolean;
}

export interface PublishOptions {
  onExisting: ExistingReleasePolicy;
  onProgress?: (message: string) => void;
}

// ─── Collection ──────────────────────────────────────────

/**
 * Find build-report.json files in a directory and its immediate children,
 * the layout produced by downloading each job's artifact into its own folder
 */
async function findReportFiles(artifactsDir: string): Promise<string[]> {
  const found: string[] = [];
  const rootReport = path.join(artifactsDir, BUILD_REPORT_FILE);
  if (await fileExists(rootReport)) {
    found.push(rootReport);
  }

  let entries;
  try {
    entries = await fs.readdir(artifactsDir, { withFileTypes: true });
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new MissingArtifactError(`Artifacts directory not found: ${artifactsDir}`, {
        operation: 'collectBuildResults',
        filePath: artifactsDir,
      });
    }
    throw error;
  }

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (!entry.isDirectory()) continue;
    const candidate = path.join(artifactsDir, entry.name, BUILD_REPORT_FILE);
    if (await fileExists(candidate)) {
      found.push(candidate);
    }
  }

  return found;
}

/**
 * Read every build report under artifactsDir into job results.
 * A report for another tag is turned into a failed result for its target.
 */
export async function collectBuildResults(artifactsDir: string, tag: string): Promise<BuildJobResult[]> {
  const currentTag = normalizeTag(tag);
  const results: BuildJobResult[] = [];
  const seen = new Map<BuildTarget, string>();

  for (const reportPath of await findReportFiles(path.resolve(artifactsDir))) {
    const raw = await fs.readFile(reportPath, 'utf-8');
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ReleaseError(`Build report is not valid JSON: ${reportPath}`, {
        operation: 'collectBuildResults',
        filePath: reportPath,
        cause: error,
      });
    }

    const parsed = BuildReportSchema.safeParse(json);
    if (!parsed.success) {
      throw new ReleaseError(`Build report has an invalid shape: ${reportPath}`, {
        operation: 'collectBuildResults',
        filePath: reportPath,
        context: { issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
      });
    }

    const report = parsed.data;
    const previous = seen.get(report.target);
    if (previous) {
      throw new ReleaseError(`Two build reports for target ${report.target}: ${previous} and ${reportPath}`, {
        operation: 'collectBuildResults',
        filePath: reportPath,
      });
    }
    seen.set(report.target, reportPath);

    if (report.tag !== currentTag) {
      results.push({
        target: report.target,
        status: 'failed',
        error: `Report was produced for ${report.tag}, not ${currentTag}`,
      });
      continue;
    }

    if (report.status === 'failed') {
      results.push({ target: report.target, status: 'failed', error: report.error ?? 'Build failed' });
      continue;
    }

    const reportDir = path.dirname(reportPath);
    results.push({
      target: report.target,
      status: 'success',
      artifacts: report.artifacts.map((artifact) => ({
        target: report.target,
        name: artifact.name,
        path: path.resolve(reportDir, artifact.file),
        size: artifact.size,
        sha256: artifact.sha256,
      })),
    });
  }

  return results;
}

// ─── Barrier ─────────────────────────────────────────────

async function verifyArtifact(artifact: BuildArtifact): Promise<void> {
  if (!(await fileExists(artifact.path))) {
    throw new MissingArtifactError(`Artifact ${artifact.name} is missing at ${artifact.path}`, {
      operation: 'assembleRelease',
      filePath: artifact.path,
      target: artifact.target,
    });
  }
  const actual = await sha256File(artifact.path);
  if (actual !== artifact.sha256) {
    throw new ArtifactIntegrityError(artifact.path, artifact.sha256, actual);
  }
}

/**
 * Check that every expected build job succeeded and build the release plan
 *
 * @throws MissingArtifactError when a target has no result or no artifact
 * @throws BuildFailureError when a target's job failed
 */
export async function assembleRelease(input: AssembleInput): Promise<ReleasePlan> {
  const tag = parseTag(input.tag).raw;
  const expectedTargets = input.expectedTargets ?? REQUIRED_TARGETS;
  const verifyChecksums = input.verifyChecksums ?? true;

  const byTarget = new Map<BuildTarget, BuildJobResult>();
  for (const result of input.results) {
    byTarget.set(result.target, result);
  }

  const missing = expectedTargets.filter((target) => !byTarget.has(target));
  if (missing.length > 0) {
    throw new MissingArtifactError(`No build output for: ${missing.join(', ')}`, {
      operation: 'assembleRelease',
      target: missing.join(','),
    });
  }

  const failures: string[] = [];
  const failedTargets: BuildTarget[] = [];
  const assets: BuildArtifact[] = [];
  for (const target of expectedTargets) {
    const result = byTarget.get(target);
    if (!result) continue;
    if (result.status === 'failed') {
      failures.push(`${target}: ${result.error}`);
      failedTargets.push(target);
      continue;
    }
    if (result.artifacts.length === 0) {
      throw new MissingArtifactError(`Build for ${target} reported no artifacts`, {
        operation: 'assembleRelease',
        target,
      });
    }
    assets.push(...result.artifacts);
  }

  if (failures.length > 0) {
    throw new BuildFailureError(
      `Build jobs failed, refusing to publish:\n  ${failures.join('\n  ')}`,
      failedTargets,
    );
  }

  const owners = new Map<string, BuildTarget[]>();
  for (const asset of assets) {
    owners.set(asset.name, [...(owners.get(asset.name) ?? []), asset.target]);
  }
  for (const [name, targets] of owners) {
    if (targets.length > 1) {
      throw new DuplicateArtifactError(name, targets);
    }
  }

  if (verifyChecksums) {
    for (const asset of assets) {
      await verifyArtifact(asset);
    }
  }

  return {
    tag,
    name: `Release ${tag}`,
    body: input.body,
    prerelease: isPrerelease(tag),
    assets,
  };
}

// ─── Publishing ──────────────────────────────────────────

/**
 * Publish a release plan. Nothing becomes visible unless every asset
 * uploaded.
 *
 * @throws MissingArtifactError when the plan lacks a required target, even
 * if it was assembled for fewer targets
 */
export async function publishRelease(
  plan: ReleasePlan,
  publisher: ReleasePublisher,
  options: PublishOptions,
): Promise<RemoteRelease> {
  const { onProgress } = options;

  const planned = new Set(plan.assets.map((asset) => asset.target));
  const missing = REQUIRED_TARGETS.filter((target) => !planned.has(target));
  if (missing.length > 0) {
    throw new MissingArtifactError(`Cannot publish ${plan.tag} without: ${missing.join(', ')}`, {
      operation: 'publishRelease',
      target: missing.join(','),
    });
  }

  const existing = await publisher.findByTag(plan.tag);
  if (existing) {
    if (options.onExisting === 'fail') {
      throw new ReleaseExistsError(plan.tag);
    }
    onProgress?.(`Removing existing release ${existing.id} for ${plan.tag}`);
    await publisher.delete(existing.id);
  }

  const draft = await publisher.createDraft({
    tag: plan.tag,
    name: plan.name,
    body: plan.body,
    prerelease: plan.prerelease,
  });
  onProgress?.(`Created draft release ${draft.id}`);

  try {
    for (const asset of plan.assets) {
      onProgress?.(`Uploading ${asset.name}`);
      await publisher.uploadAsset(draft.id, asset);
    }
    return await publisher.publish(draft.id);
  } catch (error) {
    try {
      await publisher.delete(draft.id);
    } catch (cleanupError) {
      throw new ReleaseError(`Publishing ${plan.tag} failed and draft ${draft.id} could not be removed`, {
        operation: 'publishRelease',
        context: { cleanupError: errorMessage(cleanupError) },
        cause: error,
      });
    }
    throw error;
  }
}
