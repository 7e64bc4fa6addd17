/**
 * Diagnostic log sinks for the platform gate.
 * The file sink only ever appends: no truncation, no rotation.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

export const DEFAULT_GATE_LOG_PATH = '/tmp/freescribe_arch_check.log';

export interface LogSink {
  append(line: string): Promise<void>;
}

export class FileLogSink implements LogSink {
  constructor(readonly filePath: string) {}

  async append(line: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, line.endsWith('\n') ? line : `${line}\n`, 'utf-8');
  }
}

export class MemoryLogSink implements LogSink {
  readonly lines: string[] = [];

  async append(line: string): Promise<void> {
    this.lines.push(line.replace(/\n$/, ''));
  }
}
