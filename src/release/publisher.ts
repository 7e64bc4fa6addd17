/**
 * Release publishers.
 *
 * The assembler only talks to ReleasePublisher. GitHubReleasePublisher is the
 * production implementation on @octokit/rest.
 */

import { promises as fs } from 'node:fs';
import { Octokit } from '@octokit/rest';

import { ReleaseError } from '../errors.js';
import type { BuildArtifact } from '../types/release.js';
import type { RepositoryRef } from './body.js';

// ─── Types ───────────────────────────────────────────────

export interface ReleaseDraftInput {
  tag: string;
  name: string;
  body: string;
  prerelease: boolean;
}

export interface RemoteRelease {
  id: number;
  tag: string;
  name: string;
  url: string;
  draft: boolean;
  prerelease: boolean;
  assets: string[];
}

export interface ReleasePublisher {
  /** Existing release for the tag, drafts included, or null */
  findByTag(tag: string): Promise<RemoteRelease | null>;
  createDraft(input: ReleaseDraftInput): Promise<RemoteRelease>;
  uploadAsset(releaseId: number, asset: BuildArtifact): Promise<void>;
  /** Make a draft visible */
  publish(releaseId: number): Promise<RemoteRelease>;
  delete(releaseId: number): Promise<void>;
}

// ─── GitHub ──────────────────────────────────────────────

interface GitHubReleaseData {
  id: number;
  tag_name: string;
  name: string | null;
  html_url: string;
  upload_url: string;
  draft: boolean;
  prerelease: boolean;
  assets: Array<{ name: string }>;
}

function toRemoteRelease(data: GitHubReleaseData): RemoteRelease {
  return {
    id: data.id,
    tag: data.tag_name,
    name: data.name ?? data.tag_name,
    url: data.html_url,
    draft: data.draft,
    prerelease: data.prerelease,
    assets: data.assets.map((asset) => asset.name),
  };
}

export interface GitHubPublisherOptions {
  repository: RepositoryRef;
  token?: string;
  octokit?: Octokit;
}

export class GitHubReleasePublisher implements ReleasePublisher {
  private readonly octokit: Octokit;
  private readonly owner: string;
  private readonly repo: string;
  private readonly uploadUrls = new Map<number, string>();

  constructor(options: GitHubPublisherOptions) {
    this.owner = options.repository.owner;
    this.repo = options.repository.repo;
    this.octokit = options.octokit ?? new Octokit({ auth: options.token ?? process.env.GITHUB_TOKEN });
  }

  async findByTag(tag: string): Promise<RemoteRelease | null> {
    // getReleaseByTag skips drafts, so list instead
    const releases = await this.octokit.paginate(this.octokit.rest.repos.listReleases, {
      owner: this.owner,
      repo: this.repo,
      per_page: 100,
    });
    const match = releases.find((release) => release.tag_name === tag);
    if (!match) return null;
    this.uploadUrls.set(match.id, match.upload_url);
    return toRemoteRelease(match);
  }

  async createDraft(input: ReleaseDraftInput): Promise<RemoteRelease> {
    const { data } = await this.octokit.rest.repos.createRelease({
      owner: this.owner,
      repo: this.repo,
      tag_name: input.tag,
      name: input.name,
      body: input.body,
      prerelease: input.prerelease,
      draft: true,
    });
    this.uploadUrls.set(data.id, data.upload_url);
    return toRemoteRelease(data);
  }

  async uploadAsset(releaseId: number, asset: BuildArtifact): Promise<void> {
    const uploadUrl = this.uploadUrls.get(releaseId);
    if (!uploadUrl) {
      throw new ReleaseError(`No upload URL known for release ${releaseId}`, {
        operation: 'uploadAsset',
        context: { releaseId, asset: asset.name },
      });
    }

    const data = await fs.readFile(asset.path);
    await this.octokit.request(`POST ${uploadUrl}`, {
      name: asset.name,
      data,
      headers: {
        'content-type': 'application/octet-stream',
        'content-length': asset.size,
      },
    });
  }

  async publish(releaseId: number): Promise<RemoteRelease> {
    const { data } = await this.octokit.rest.repos.updateRelease({
      owner: this.owner,
      repo: this.repo,
      release_id: releaseId,
      draft: false,
    });
    return toRemoteRelease(data);
  }

  async delete(releaseId: number): Promise<void> {
    await this.octokit.rest.repos.deleteRelease({
      owner: this.owner,
      repo: this.repo,
      release_id: releaseId,
    });
    this.uploadUrls.delete(releaseId);
  }
}

export function createGitHubPublisher(options: GitHubPublisherOptions): ReleasePublisher {
  return new GitHubReleasePublisher(options);
}
