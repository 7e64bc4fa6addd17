/**
 * Release error types
 *
 * Every failure raised by the release tooling carries the operation that was
 * running and enough context to read it from a CI log.
 */

/**
 * Base class for all release-related errors
 */
export class ReleaseError extends Error {
  /** The operation that was being performed */
  public readonly operation: string;
  /** File path involved in the failure, if any */
  public readonly filePath?: string;
  /** Additional context for debugging */
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      operation: string;
      filePath?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = 'ReleaseError';
    this.operation = options.operation;
    this.filePath = options.filePath;
    this.context = options.context;
  }

  /**
   * Get a formatted error message with context
   */
  toDetailedString(): string {
    const parts = [this.message];
    if (this.filePath) {
      parts.push(`  File: ${this.filePath}`);
    }
    parts.push(`  Operation: ${this.operation}`);
    if (this.context) {
      parts.push(`  Context: ${JSON.stringify(this.context)}`);
    }
    if (this.cause) {
      parts.push(`  Cause: ${this.cause instanceof Error ? this.cause.message : String(this.cause)}`);
    }
    return parts.join('\n');
  }
}

/**
 * Tag does not match any release tag shape
 */
export class TagFormatError extends ReleaseError {
  public readonly tag: string;

  constructor(tag: string) {
    super(
      `Invalid release tag "${tag}": expected vMAJOR.MINOR.PATCH, vMAJOR.MINOR.PATCH.alpha or vMAJOR.MINOR.PATCH-RC<n>`,
      { operation: 'parseTag', context: { tag } },
    );
    this.name = 'TagFormatError';
    this.tag = tag;
  }
}

/**
 * An expected build artifact (or its report) is not present
 */
export class MissingArtifactError extends ReleaseError {
  constructor(message: string, options: { operation: string; filePath?: string; target?: string }) {
    super(message, {
      operation: options.operation,
      filePath: options.filePath,
      context: options.target ? { target: options.target } : undefined,
    });
    this.name = 'MissingArtifactError';
  }
}

/**
 * Both the internal and canonical artifact names exist, so a rename would
 * overwrite one of them
 */
export class ArtifactConflictError extends ReleaseError {
  constructor(source: string, canonical: string) {
    super(`Refusing to rename ${source}: ${canonical} already exists`, {
      operation: 'canonicalizeArtifact',
      filePath: canonical,
      context: { source },
    });
    this.name = 'ArtifactConflictError';
  }
}

/**
 * An artifact on disk does not match the checksum its build report recorded
 */
export class ArtifactIntegrityError extends ReleaseError {
  constructor(filePath: string, expected: string, actual: string) {
    super(`Checksum mismatch for ${filePath}`, {
      operation: 'verifyArtifact',
      filePath,
      context: { expected, actual },
    });
    this.name = 'ArtifactIntegrityError';
  }
}

/**
 * Two build jobs reported assets with the same public name
 */
export class DuplicateArtifactError extends ReleaseError {
  constructor(name: string, targets: string[]) {
    super(`Artifact name "${name}" is produced by more than one target: ${targets.join(', ')}`, {
      operation: 'assembleRelease',
      context: { name, targets },
    });
    this.name = 'DuplicateArtifactError';
  }
}

/**
 * One or more build jobs did not complete successfully
 */
export class BuildFailureError extends ReleaseError {
  public readonly targets: string[];

  constructor(message: string, targets: string[], cause?: unknown) {
    super(message, { operation: 'buildJob', context: { targets }, cause });
    this.name = 'BuildFailureError';
    this.targets = targets;
  }
}

/**
 * A release for the tag already exists and the policy forbids replacing it
 */
export class ReleaseExistsError extends ReleaseError {
  constructor(tag: string) {
    super(`A release for ${tag} already exists`, {
      operation: 'publishRelease',
      context: { tag },
    });
    this.name = 'ReleaseExistsError';
  }
}

/**
 * The model artifact could not be downloaded
 */
export class ModelDownloadError extends ReleaseError {
  public readonly attempts: number;

  constructor(url: string, attempts: number, cause?: unknown) {
    super(`Failed to download model from ${url} after ${attempts} attempt(s)`, {
      operation: 'fetchModel',
      context: { url, attempts },
      cause,
    });
    this.name = 'ModelDownloadError';
    this.attempts = attempts;
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Message for a CLI error line; verbose output adds operation, file and context
 */
export function describeError(error: unknown, verbose = false): string {
  if (verbose && error instanceof ReleaseError) {
    return error.toDetailedString();
  }
  return errorMessage(error);
}
