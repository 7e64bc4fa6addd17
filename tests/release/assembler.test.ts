/**
 * Release assembler tests: the all-or-nothing barrier and fail-closed publishing
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  ArtifactIntegrityError,
  BuildFailureError,
  DuplicateArtifactError,
  MissingArtifactError,
  ReleaseError,
  ReleaseExistsError,
} from '../../src/errors.js';
import { assembleRelease, collectBuildResults, publishRelease } from '../../src/release/assembler.js';
import { writeBuildReport } from '../../src/release/build-job.js';
import { canonicalArtifactName } from '../../src/release/targets.js';
import type { BuildArtifact, BuildJobResult, BuildReport, BuildTarget, ReleasePlan } from '../../src/types/release.js';
import { sha256Text } from '../../src/utils/fs.js';
import { FakePublisher } from './fake-publisher.js';

const TEST_DIR = join(process.cwd(), '.test-assembler');

function makeArtifact(target: BuildTarget, dir: string = TEST_DIR): BuildArtifact {
  mkdirSync(dir, { recursive: true });
  const name = canonicalArtifactName(target);
  const content = `${target} installer`;
  const filePath = join(dir, name);
  writeFileSync(filePath, content);
  return { target, name, path: filePath, size: content.length, sha256: sha256Text(content) };
}

function success(target: BuildTarget): BuildJobResult {
  return { target, status: 'success', artifacts: [makeArtifact(target)] };
}

function allSucceeded(): BuildJobResult[] {
  return [success('windows'), success('macos-x86_64'), success('macos-arm64')];
}

function reportFor(target: BuildTarget, dir: string, tag: string, status: 'success' | 'failed' = 'success'): BuildReport {
  const artifact = makeArtifact(target, dir);
  return {
    target,
    tag,
    status,
    artifacts:
      status === 'success'
        ? [{ name: artifact.name, file: artifact.name, size: artifact.size, sha256: artifact.sha256 }]
        : [],
    steps: [],
    started_at: '2026-01-01T00:00:00.000Z',
    finished_at: '2026-01-01T00:01:00.000Z',
    error: status === 'failed' ? 'Step "Build installer" failed with exit code 1' : undefined,
  };
}

describe('Release assembler', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true });
    }
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true });
    }
  });

  describe('assembleRelease', () => {
    it('should plan a stable release with all three installers', async () => {
      const plan = await assembleRelease({ tag: 'v1.2.3', results: allSucceeded(), body: 'notes' });

      expect(plan.name).toBe('Release v1.2.3');
      expect(plan.prerelease).toBe(false);
      expect(plan.body).toBe('notes');
      expect(plan.assets.map((asset) => asset.name)).toEqual([
        'FreeScribeInstaller_windows.exe',
        'FreeScribeInstaller_x86_64.pkg',
        'FreeScribeInstaller_arm64.pkg',
      ]);
    });

    it('should mark release candidates and alphas as prerelease', async () => {
      expect((await assembleRelease({ tag: 'v1.2.3-RC1', results: allSucceeded(), body: '' })).prerelease).toBe(true);
      expect((await assembleRelease({ tag: 'v1.2.3.alpha', results: allSucceeded(), body: '' })).prerelease).toBe(true);
    });

    it('should publish nothing when one of three installers is missing', async () => {
      const publisher = new FakePublisher();
      const results = [success('windows'), success('macos-x86_64')];

      const attempt = async () => {
        const plan = await assembleRelease({ tag: 'v1.2.3', results, body: '' });
        await publishRelease(plan, publisher, { onExisting: 'fail' });
      };

      await expect(attempt()).rejects.toThrow('No build output for: macos-arm64');
      await expect(attempt()).rejects.toBeInstanceOf(MissingArtifactError);
      expect(publisher.calls).toEqual([]);
    });

    it('should refuse to plan when a build job failed', async () => {
      const results: BuildJobResult[] = [
        { target: 'windows', status: 'failed', error: 'makensis exited 1' },
        success('macos-x86_64'),
        success('macos-arm64'),
      ];

      const error = await assembleRelease({ tag: 'v1.2.3', results, body: '' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BuildFailureError);
      expect(error instanceof BuildFailureError && error.targets).toEqual(['windows']);
    });

    it('should detect an installer that changed after its build', async () => {
      const results = allSucceeded();
      writeFileSync(join(TEST_DIR, 'FreeScribeInstaller_arm64.pkg'), 'tampered');

      await expect(assembleRelease({ tag: 'v1.2.3', results, body: '' })).rejects.toThrow(ArtifactIntegrityError);
    });

    it('should detect an installer that is no longer on disk', async () => {
      const results = allSucceeded();
      rmSync(join(TEST_DIR, 'FreeScribeInstaller_windows.exe'));

      await expect(assembleRelease({ tag: 'v1.2.3', results, body: '' })).rejects.toThrow(MissingArtifactError);
    });

    it('should reject two targets publishing the same file name', async () => {
      const windows = makeArtifact('windows');
      const results: BuildJobResult[] = [
        { target: 'windows', status: 'success', artifacts: [windows] },
        { target: 'macos-x86_64', status: 'success', artifacts: [{ ...windows, target: 'macos-x86_64' }] },
        success('macos-arm64'),
      ];

      await expect(assembleRelease({ tag: 'v1.2.3', results, body: '' })).rejects.toThrow(DuplicateArtifactError);
    });

    it('should only require the configured targets', async () => {
      const plan = await assembleRelease({
        tag: 'v1.2.3',
        results: [success('windows')],
        body: '',
        expectedTargets: ['windows'],
      });
      expect(plan.assets).toHaveLength(1);
    });
  });

  describe('collectBuildResults', () => {
    const artifactsDir = () => join(TEST_DIR, 'artifacts');

    it('should read one report per job directory', async () => {
      for (const target of ['windows', 'macos-x86_64', 'macos-arm64'] as const) {
        const dir = join(artifactsDir(), `build-${target}`);
        await writeBuildReport(dir, reportFor(target, dir, 'v1.2.3'));
      }

      const results = await collectBuildResults(artifactsDir(), 'refs/tags/v1.2.3');

      expect(results.map((result) => result.status)).toEqual(['success', 'success', 'success']);
      const plan = await assembleRelease({ tag: 'v1.2.3', results, body: '' });
      expect(plan.assets.find((asset) => asset.target === 'windows')?.path).toBe(
        join(artifactsDir(), 'build-windows', 'FreeScribeInstaller_windows.exe'),
      );
    });

    it('should turn failed and stale reports into failed results', async () => {
      const windowsDir = join(artifactsDir(), 'build-windows');
      await writeBuildReport(windowsDir, reportFor('windows', windowsDir, 'v1.2.3', 'failed'));
      const macDir = join(artifactsDir(), 'build-macos-arm64');
      await writeBuildReport(macDir, reportFor('macos-arm64', macDir, 'v1.2.2'));

      const results = await collectBuildResults(artifactsDir(), 'v1.2.3');

      expect(results).toEqual([
        { target: 'macos-arm64', status: 'failed', error: 'Report was produced for v1.2.2, not v1.2.3' },
        { target: 'windows', status: 'failed', error: 'Step "Build installer" failed with exit code 1' },
      ]);
    });

    it('should fail when the artifacts directory does not exist', async () => {
      await expect(collectBuildResults(join(TEST_DIR, 'missing'), 'v1.2.3')).rejects.toThrow(MissingArtifactError);
    });

    it('should reject a report that is not JSON', async () => {
      mkdirSync(join(artifactsDir(), 'job'), { recursive: true });
      writeFileSync(join(artifactsDir(), 'job', 'build-report.json'), '{not json');

      await expect(collectBuildResults(artifactsDir(), 'v1.2.3')).rejects.toThrow(ReleaseError);
    });
  });

  describe('publishRelease', () => {
    async function plan(tag = 'v1.2.3'): Promise<ReleasePlan> {
      return assembleRelease({ tag, results: allSucceeded(), body: 'notes' });
    }

    it('should create a draft, upload every asset and then publish', async () => {
      const publisher = new FakePublisher();

      const release = await publishRelease(await plan(), publisher, { onExisting: 'fail' });

      expect(publisher.calls).toEqual([
        'find v1.2.3',
        'create v1.2.3',
        'upload FreeScribeInstaller_windows.exe',
        'upload FreeScribeInstaller_x86_64.pkg',
        'upload FreeScribeInstaller_arm64.pkg',
        'publish 1',
      ]);
      expect(release.draft).toBe(false);
      expect(release.assets).toHaveLength(3);
    });

    it('should delete the draft when an upload fails', async () => {
      const publisher = new FakePublisher();
      publisher.failUploadOf = 'FreeScribeInstaller_x86_64.pkg';

      await expect(publishRelease(await plan(), publisher, { onExisting: 'fail' })).rejects.toThrow(
        'upload of FreeScribeInstaller_x86_64.pkg failed',
      );

      expect(publisher.calls).toEqual([
        'find v1.2.3',
        'create v1.2.3',
        'upload FreeScribeInstaller_windows.exe',
        'upload FreeScribeInstaller_x86_64.pkg',
        'delete 1',
      ]);
      expect(publisher.releases.size).toBe(0);
    });

    it('should report a draft that could not be removed', async () => {
      const publisher = new FakePublisher();
      publisher.failUploadOf = 'FreeScribeInstaller_windows.exe';
      publisher.failDelete = true;

      await expect(publishRelease(await plan(), publisher, { onExisting: 'fail' })).rejects.toThrow(
        'Publishing v1.2.3 failed and draft 1 could not be removed',
      );
    });

    it('should refuse to publish a plan assembled for fewer targets', async () => {
      const publisher = new FakePublisher();
      const partial = await assembleRelease({
        tag: 'v1.2.3',
        results: [success('windows')],
        body: '',
        expectedTargets: ['windows'],
      });

      const error = await publishRelease(partial, publisher, { onExisting: 'fail' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MissingArtifactError);
      expect(error instanceof Error && error.message).toBe('Cannot publish v1.2.3 without: macos-x86_64, macos-arm64');
      expect(publisher.calls).toEqual([]);
    });

    it('should refuse to touch an existing release by default', async () => {
      const publisher = new FakePublisher();
      publisher.seed({ tag: 'v1.2.3', name: 'Release v1.2.3', url: '', draft: false, prerelease: false, assets: [] });

      await expect(publishRelease(await plan(), publisher, { onExisting: 'fail' })).rejects.toThrow(
        ReleaseExistsError,
      );
      expect(publisher.calls).toEqual(['find v1.2.3']);
    });

    it('should replace an existing release when asked to', async () => {
      const publisher = new FakePublisher();
      publisher.seed({ tag: 'v1.2.3', name: 'Release v1.2.3', url: '', draft: true, prerelease: false, assets: [] });

      const release = await publishRelease(await plan(), publisher, { onExisting: 'replace' });

      expect(publisher.calls.slice(0, 3)).toEqual(['find v1.2.3', 'delete 1', 'create v1.2.3']);
      expect(release.id).toBe(2);
      expect(publisher.releases.size).toBe(1);
    });
  });
});
