/**
 * Release Logger
 * Appends a Markdown journal of each release run to release-log.md so the
 * CI log and the artifact bundle tell the same story.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import { isNotFoundError } from '../utils/fs.js';

export const RELEASE_LOG_FILE = 'release-log.md';

export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug';

export type ReleaseStage = 'build' | 'collect' | 'assemble' | 'publish' | 'pipeline';

export interface LogEntry {
  timestamp: string;
  stage: ReleaseStage;
  message: string;
  data?: Record<string, unknown>;
  level: LogLevel;
}

const LOG_HEADER = [
  '# Release Log',
  '',
  'Entries are appended by each build, assemble and publish run.',
  '',
  '---',
  '',
].join('\n');

export interface ReleaseLoggerOptions {
  /** Keep debug entries; they are dropped otherwise */
  verbose?: boolean;
}

export class ReleaseLogger {
  private readonly logFile: string;
  private readonly verbose: boolean;
  private entries: LogEntry[] = [];

  constructor(workDir: string, options: ReleaseLoggerOptions = {}) {
    this.logFile = path.join(workDir, RELEASE_LOG_FILE);
    this.verbose = options.verbose ?? false;
  }

  get filePath(): string {
    return this.logFile;
  }

  /**
   * Append an entry to the journal
   */
  async log(
    stage: ReleaseStage,
    message: string,
    data?: Record<string, unknown>,
    level: LogLevel = 'info',
  ): Promise<void> {
    if (level === 'debug' && !this.verbose) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      stage,
      message,
      data,
      level,
    };
    this.entries.push(entry);

    await this.ensureFile();
    await fs.appendFile(this.logFile, formatEntry(entry), 'utf-8');
  }

  async info(stage: ReleaseStage, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, message, data, 'info');
  }

  async warn(stage: ReleaseStage, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, message, data, 'warn');
  }

  async error(stage: ReleaseStage, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, message, data, 'error');
  }

  async success(stage: ReleaseStage, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, message, data, 'success');
  }

  async debug(stage: ReleaseStage, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, message, data, 'debug');
  }

  /**
   * Entries written by this instance
   */
  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getErrors(): LogEntry[] {
    return this.entries.filter((e) => e.level === 'error');
  }

  private async ensureFile(): Promise<void> {
    try {
      await fs.stat(this.logFile);
    } catch (error) {
      if (!isNotFoundError(error)) throw error;
      await fs.mkdir(path.dirname(this.logFile), { recursive: true });
      await fs.writeFile(this.logFile, LOG_HEADER, 'utf-8');
    }
  }
}

function levelIcon(level: LogLevel): string {
  switch (level) {
    case 'error':
      return '[ERROR]';
    case 'warn':
      return '[WARN]';
    case 'success':
      return '[OK]';
    case 'debug':
      return '[DEBUG]';
    default:
      return '[INFO]';
  }
}

/**
 * Render one entry as a Markdown block
 */
export function formatEntry(entry: LogEntry): string {
  const lines = [`### [${entry.timestamp}] ${levelIcon(entry.level)} **${entry.stage}** - ${entry.message}`];

  if (entry.data && Object.keys(entry.data).length > 0) {
    lines.push('', '<details>', '<summary>Details</summary>', '', '```json');
    lines.push(JSON.stringify(entry.data, null, 2));
    lines.push('```', '</details>');
  }

  lines.push('', '');
  return lines.join('\n');
}

export function createReleaseLogger(workDir: string, options?: ReleaseLoggerOptions): ReleaseLogger {
  return new ReleaseLogger(path.resolve(workDir), options);
}
