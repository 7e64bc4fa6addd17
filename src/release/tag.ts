/**
 * Release tag parsing and classification.
 *
 * classifyTag is the only place the stable/prerelease decision is made;
 * every other module asks it.
 */

import { TagFormatError } from '../errors.js';
import type { ParsedTag, ReleaseClass, TagKind } from '../types/release.js';

// ─── Constants ───────────────────────────────────────────

/** Tag globs that trigger the release workflow on push */
export const TRIGGER_PATTERNS = ['v*.*.*', 'v*.*.*.alpha', 'v*.*.*-RC*'] as const;

const REF_PREFIX = 'refs/tags/';

const TAG_SHAPES: Array<{ kind: TagKind; pattern: RegExp }> = [
  { kind: 'stable', pattern: /^v(\d+)\.(\d+)\.(\d+)$/ },
  { kind: 'alpha', pattern: /^v(\d+)\.(\d+)\.(\d+)\.alpha$/ },
  { kind: 'release-candidate', pattern: /^v(\d+)\.(\d+)\.(\d+)-RC(\d+)$/ },
];

/** Ordering of kinds within the same MAJOR.MINOR.PATCH */
const KIND_RANK: Record<TagKind, number> = {
  alpha: 0,
  'release-candidate': 1,
  stable: 2,
};

// ─── Parsing ─────────────────────────────────────────────

/**
 * Strip a refs/tags/ prefix, as found in a CI ref
 */
export function normalizeTag(value: string): string {
  const trimmed = value.trim();
  return trimmed.startsWith(REF_PREFIX) ? trimmed.slice(REF_PREFIX.length) : trimmed;
}

/**
 * Parse a release tag into its kind and version numbers
 *
 * @throws TagFormatError when the tag matches none of the release shapes
 */
export function parseTag(value: string): ParsedTag {
  const raw = normalizeTag(value);

  for (const { kind, pattern } of TAG_SHAPES) {
    const match = pattern.exec(raw);
    if (!match) continue;

    const parsed: ParsedTag = {
      raw,
      kind,
      major: Number(match[1]),
      minor: Number(match[2]),
      patch: Number(match[3]),
    };
    if (kind === 'release-candidate') {
      parsed.rc = Number(match[4]);
    }
    return parsed;
  }

  throw new TagFormatError(raw);
}

/**
 * Parse a tag, returning null instead of throwing
 */
export function tryParseTag(value: string): ParsedTag | null {
  try {
    return parseTag(value);
  } catch (error) {
    if (error instanceof TagFormatError) return null;
    throw error;
  }
}

// ─── Classification ──────────────────────────────────────

/**
 * Classify a tag as stable or prerelease.
 * Prerelease iff the tag ends with ".alpha" or contains "-RC". The decision
 * is made on the string alone, so it also covers tags parseTag rejects.
 */
export function classifyTag(value: string): ReleaseClass {
  const tag = normalizeTag(value);
  return tag.endsWith('.alpha') || tag.includes('-RC') ? 'prerelease' : 'stable';
}

export function isPrerelease(value: string): boolean {
  return classifyTag(value) === 'prerelease';
}

/**
 * Check whether a tag push would start the release workflow
 */
export function matchesTriggerPattern(value: string): boolean {
  const tag = normalizeTag(value);
  return TRIGGER_PATTERNS.some((glob) => globToRegExp(glob).test(tag));
}

function globToRegExp(glob: string): RegExp {
  const source = glob
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('[^/]*');
  return new RegExp(`^${source}$`);
}

// ─── Ordering ────────────────────────────────────────────

/**
 * Compare two parsed tags. Negative when a sorts before b.
 */
export function compareTags(a: ParsedTag, b: ParsedTag): number {
  if (a.major !== b.major) return a.major - b.major;
  if (a.minor !== b.minor) return a.minor - b.minor;
  if (a.patch !== b.patch) return a.patch - b.patch;
  if (a.kind !== b.kind) return KIND_RANK[a.kind] - KIND_RANK[b.kind];
  return (a.rc ?? 0) - (b.rc ?? 0);
}

/**
 * Find the greatest tag strictly lower than the current one.
 * Tags that are not release tags are ignored.
 *
 * @returns The previous tag as written, or null for the first release
 */
export function findPreviousTag(current: string, tags: string[]): string | null {
  const currentTag = parseTag(current);
  let previous: ParsedTag | null = null;

  for (const candidate of tags) {
    const parsed = tryParseTag(candidate);
    if (!parsed || compareTags(parsed, currentTag) >= 0) continue;
    if (!previous || compareTags(parsed, previous) > 0) {
      previous = parsed;
    }
  }

  return previous?.raw ?? null;
}
