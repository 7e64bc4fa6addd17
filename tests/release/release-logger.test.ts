/**
 * Release journal tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { createReleaseLogger, formatEntry, RELEASE_LOG_FILE } from '../../src/release/release-logger.js';

const TEST_DIR = join(process.cwd(), '.test-release-logger');

describe('ReleaseLogger', () => {
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

  it('should create the journal with a header and append entries', async () => {
    const logger = createReleaseLogger(TEST_DIR);

    await logger.info('collect', 'Found 3 build report(s)');
    await logger.error('assemble', 'No build output for: macos-arm64');

    const content = readFileSync(join(TEST_DIR, RELEASE_LOG_FILE), 'utf-8');
    expect(content.startsWith('# Release Log\n')).toBe(true);
    expect(content).toContain('[INFO] **collect** - Found 3 build report(s)');
    expect(content).toContain('[ERROR] **assemble** - No build output for: macos-arm64');
    expect(content.indexOf('**collect**')).toBeLessThan(content.indexOf('**assemble**'));
  });

  it('should only keep debug entries when verbose', async () => {
    const quiet = createReleaseLogger(join(TEST_DIR, 'quiet'));
    await quiet.debug('build', 'windows: Build installer');
    expect(quiet.getEntries()).toEqual([]);
    expect(existsSync(join(TEST_DIR, 'quiet', RELEASE_LOG_FILE))).toBe(false);

    const verbose = createReleaseLogger(join(TEST_DIR, 'verbose'), { verbose: true });
    await verbose.debug('build', 'windows: Build installer', { exit_code: 0 });
    expect(verbose.getEntries().map((entry) => entry.level)).toEqual(['debug']);
    expect(readFileSync(join(TEST_DIR, 'verbose', RELEASE_LOG_FILE), 'utf-8')).toContain(
      '[DEBUG] **build** - windows: Build installer',
    );
  });

  it('should keep the existing journal when reopened', async () => {
    await createReleaseLogger(TEST_DIR).success('publish', 'first run');
    await createReleaseLogger(TEST_DIR).success('publish', 'second run');

    const content = readFileSync(join(TEST_DIR, RELEASE_LOG_FILE), 'utf-8');
    expect(content.match(/# Release Log/g)).toHaveLength(1);
    expect(content).toContain('first run');
    expect(content).toContain('second run');
  });

  it('should track entries and errors in memory', async () => {
    const logger = createReleaseLogger(TEST_DIR);
    await logger.warn('build', 'slow step');
    await logger.error('build', 'failed');

    expect(logger.getEntries()).toHaveLength(2);
    expect(logger.getErrors().map((entry) => entry.message)).toEqual(['failed']);
  });
});

describe('formatEntry', () => {
  it('should render details as a JSON block', () => {
    const text = formatEntry({
      timestamp: '2026-01-01T00:00:00.000Z',
      stage: 'publish',
      level: 'success',
      message: 'Published',
      data: { url: 'https://example.test' },
    });

    expect(text).toBe(
      [
        '### [2026-01-01T00:00:00.000Z] [OK] **publish** - Published',
        '',
        '<details>',
        '<summary>Details</summary>',
        '',
        '```json',
        '{\n  "url": "https://example.test"\n}',
        '```',
        '</details>',
        '',
        '',
      ].join('\n'),
    );
  });
});
