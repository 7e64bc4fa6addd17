/**
 * Idempotent download of the speech-recognition model bundled with the
 * installers.
 *
 * A model already in place is never fetched again. Downloads land in a
 * `.partial` file and are renamed into place only once complete.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import { ArtifactIntegrityError, ModelDownloadError, ReleaseError } from '../errors.js';
import { fileSize, sha256File } from '../utils/fs.js';

// ─── Types ───────────────────────────────────────────────

export type FetchLike = (url: string) => Promise<Response>;

export interface FetchModelOptions {
  url: string;
  destination: string;
  /** Expected sha256 of the model file, checked before skipping and after download */
  sha256?: string;
  /** Additional attempts after the first one */
  retries?: number;
  fetchImpl?: FetchLike;
  /** Base delay for exponential backoff */
  retryDelayMs?: number;
  onAttemptFailed?: (attempt: number, error: unknown, delayMs: number) => void;
}

export interface FetchModelResult {
  status: 'skipped' | 'downloaded';
  path: string;
  size: number;
  attempts: number;
}

export const DEFAULT_MODEL_RETRIES = 2;
export const DEFAULT_RETRY_DELAY_MS = 1000;
const MAX_RETRY_DELAY_MS = 30_000;

export const PARTIAL_SUFFIX = '.partial';

// ─── Helpers ─────────────────────────────────────────────

/**
 * Where the model goes when no explicit path is configured
 */
export function resolveModelDestination(url: string, configuredPath?: string): string {
  if (configuredPath) {
    return configuredPath;
  }

  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch (error) {
    throw new ReleaseError(`Invalid model URL: ${url}`, {
      operation: 'resolveModelDestination',
      cause: error,
    });
  }

  const name = path.posix.basename(pathname);
  if (!name) {
    throw new ReleaseError(`Cannot derive a file name from model URL: ${url}`, {
      operation: 'resolveModelDestination',
    });
  }
  return path.join('models', decodeURIComponent(name));
}

/**
 * Exponential backoff: base * 2^(attempt-1), capped
 */
export function calculateRetryDelay(attempt: number, baseDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), MAX_RETRY_DELAY_MS);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function isModelPresent(destination: string, sha256?: string): Promise<number | null> {
  const size = await fileSize(destination);
  if (size === null || size === 0) {
    return null;
  }
  if (sha256 && (await sha256File(destination)) !== sha256.toLowerCase()) {
    return null;
  }
  return size;
}

async function downloadOnce(
  fetchImpl: FetchLike,
  url: string,
  partialPath: string,
  sha256?: string,
): Promise<void> {
  const response = await fetchImpl(url);
  if (!response.ok) {
    throw new ReleaseError(`HTTP ${response.status} ${response.statusText}`.trim(), {
      operation: 'fetchModel',
      context: { url },
    });
  }

  const data = Buffer.from(await response.arrayBuffer());
  if (data.length === 0) {
    throw new ReleaseError('Downloaded model is empty', { operation: 'fetchModel', context: { url } });
  }

  await fs.writeFile(partialPath, data);

  if (sha256) {
    const actual = await sha256File(partialPath);
    if (actual !== sha256.toLowerCase()) {
      throw new ArtifactIntegrityError(partialPath, sha256, actual);
    }
  }
}

// ─── Fetch ───────────────────────────────────────────────

/**
 * Make sure the model file is present, downloading it at most once per run
 */
export async function fetchModel(options: FetchModelOptions): Promise<FetchModelResult> {
  const {
    url,
    destination,
    sha256,
    retries = DEFAULT_MODEL_RETRIES,
    fetchImpl = fetch,
    retryDelayMs = DEFAULT_RETRY_DELAY_MS,
    onAttemptFailed,
  } = options;

  const existing = await isModelPresent(destination, sha256);
  if (existing !== null) {
    return { status: 'skipped', path: destination, size: existing, attempts: 0 };
  }

  await fs.mkdir(path.dirname(destination), { recursive: true });
  const partialPath = `${destination}${PARTIAL_SUFFIX}`;
  const maxAttempts = Math.max(0, retries) + 1;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      await downloadOnce(fetchImpl, url, partialPath, sha256);
      await fs.rename(partialPath, destination);
      const size = (await fileSize(destination)) ?? 0;
      return { status: 'downloaded', path: destination, size, attempts: attempt };
    } catch (error) {
      lastError = error;
      await fs.rm(partialPath, { force: true });

      if (attempt < maxAttempts) {
        const delay = calculateRetryDelay(attempt, retryDelayMs);
        onAttemptFailed?.(attempt, error, delay);
        await sleep(delay);
      }
    }
  }

  throw new ModelDownloadError(url, maxAttempts, lastError);
}

export function describeFetchResult(result: FetchModelResult): string {
  return result.status === 'skipped'
    ? `Model already present at ${result.path}`
    : `Downloaded model to ${result.path} (${result.size} bytes, ${result.attempts} attempt(s))`;
}
