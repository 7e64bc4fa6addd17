/**
 * Installer rename step.
 * Moves the packaging tool's output to its public name. Safe to repeat: the
 * target name comes from the target table, never from the current file name.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import { ArtifactConflictError, MissingArtifactError } from '../errors.js';
import { fileExists } from '../utils/fs.js';

export type CanonicalizeOutcome = 'renamed' | 'already-canonical';

export interface CanonicalizeResult {
  outcome: CanonicalizeOutcome;
  /** Absolute path of the canonical file */
  path: string;
}

/**
 * Rename `source` to `canonical` inside `dir`
 *
 * @throws ArtifactConflictError when both files exist
 * @throws MissingArtifactError when neither exists
 */
export async function canonicalizeArtifact(
  dir: string,
  source: string,
  canonical: string,
): Promise<CanonicalizeResult> {
  const sourcePath = path.resolve(dir, source);
  const canonicalPath = path.resolve(dir, canonical);

  const [hasSource, hasCanonical] = await Promise.all([
    fileExists(sourcePath),
    sourcePath === canonicalPath ? Promise.resolve(false) : fileExists(canonicalPath),
  ]);

  if (sourcePath === canonicalPath) {
    if (hasSource) return { outcome: 'already-canonical', path: canonicalPath };
    throw new MissingArtifactError(`Installer not found: ${canonicalPath}`, {
      operation: 'canonicalizeArtifact',
      filePath: canonicalPath,
    });
  }

  if (hasSource && hasCanonical) {
    throw new ArtifactConflictError(sourcePath, canonicalPath);
  }

  if (hasSource) {
    await fs.rename(sourcePath, canonicalPath);
    return { outcome: 'renamed', path: canonicalPath };
  }

  if (hasCanonical) {
    return { outcome: 'already-canonical', path: canonicalPath };
  }

  throw new MissingArtifactError(`Installer not found: neither ${source} nor ${canonical} exists in ${dir}`, {
    operation: 'canonicalizeArtifact',
    filePath: sourcePath,
  });
}
