/**
 * Tests for release tag parsing and classification
 */

import { describe, it, expect } from 'vitest';
import { TagFormatError } from '../../src/errors.js';
import {
  classifyTag,
  compareTags,
  findPreviousTag,
  isPrerelease,
  matchesTriggerPattern,
  normalizeTag,
  parseTag,
  tryParseTag,
} from '../../src/release/tag.js';

describe('classifyTag', () => {
  it('should classify a plain version as stable', () => {
    expect(classifyTag('v2.0.0')).toBe('stable');
    expect(isPrerelease('v2.0.0')).toBe(false);
  });

  it('should classify release candidates as prerelease', () => {
    expect(classifyTag('v1.2.3-RC1')).toBe('prerelease');
  });

  it('should classify alpha tags as prerelease', () => {
    expect(classifyTag('v1.2.3.alpha')).toBe('prerelease');
    expect(isPrerelease('v1.2.3.alpha')).toBe(true);
  });

  it('should strip a refs/tags/ prefix before classifying', () => {
    expect(classifyTag('refs/tags/v0.9.0-RC2')).toBe('prerelease');
  });
});

describe('parseTag', () => {
  it('should parse a stable tag', () => {
    expect(parseTag('v1.10.2')).toEqual({ raw: 'v1.10.2', kind: 'stable', major: 1, minor: 10, patch: 2 });
  });

  it('should parse a release candidate number', () => {
    const parsed = parseTag('v1.2.3-RC12');
    expect(parsed.kind).toBe('release-candidate');
    expect(parsed.rc).toBe(12);
  });

  it('should parse an alpha tag', () => {
    expect(parseTag('v0.1.0.alpha').kind).toBe('alpha');
  });

  it('should reject tags that are not release tags', () => {
    expect(() => parseTag('1.2.3')).toThrow(TagFormatError);
    expect(() => parseTag('v1.2')).toThrow(TagFormatError);
    expect(() => parseTag('v1.2.3-beta')).toThrow(TagFormatError);
  });

  it('should return null from tryParseTag for invalid tags', () => {
    expect(tryParseTag('nightly')).toBeNull();
    expect(tryParseTag('v3.0.0')?.major).toBe(3);
  });

  it('should normalize whitespace and ref prefixes', () => {
    expect(normalizeTag('  refs/tags/v1.0.0 ')).toBe('v1.0.0');
  });
});

describe('matchesTriggerPattern', () => {
  it('should match every release tag shape', () => {
    expect(matchesTriggerPattern('v1.2.3')).toBe(true);
    expect(matchesTriggerPattern('v1.2.3.alpha')).toBe(true);
    expect(matchesTriggerPattern('v1.2.3-RC4')).toBe(true);
  });

  it('should not match tags without the v prefix', () => {
    expect(matchesTriggerPattern('release-1')).toBe(false);
    expect(matchesTriggerPattern('1.2.3')).toBe(false);
  });
});

describe('compareTags', () => {
  it('should order alpha before release candidates before stable', () => {
    const tags = ['v1.0.0', 'v1.0.0-RC2', 'v1.0.0.alpha', 'v1.0.0-RC1'].map((tag) => parseTag(tag));
    const sorted = [...tags].sort(compareTags).map((tag) => tag.raw);
    expect(sorted).toEqual(['v1.0.0.alpha', 'v1.0.0-RC1', 'v1.0.0-RC2', 'v1.0.0']);
  });

  it('should compare version numbers numerically', () => {
    expect(compareTags(parseTag('v1.10.0'), parseTag('v1.9.0'))).toBeGreaterThan(0);
  });
});

describe('findPreviousTag', () => {
  const tags = ['v0.9.0', 'v1.0.0-RC1', 'v1.0.0', 'v1.1.0.alpha', 'nightly', 'v2.0.0'];

  it('should return the greatest tag lower than the current one', () => {
    expect(findPreviousTag('v1.1.0', tags)).toBe('v1.1.0.alpha');
    expect(findPreviousTag('v1.0.0', tags)).toBe('v1.0.0-RC1');
  });

  it('should return null for the first release', () => {
    expect(findPreviousTag('v0.9.0', tags)).toBeNull();
  });
});
