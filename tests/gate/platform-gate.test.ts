/**
 * Platform gate tests: architecture decision, diagnostic log and alerts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { normalizeArchitecture, resolveEffectiveArchitecture } from '../../src/gate/architecture.js';
import { FileLogSink, MemoryLogSink } from '../../src/gate/log-sink.js';
import { buildDialogScript, type Notifier } from '../../src/gate/notifier.js';
import {
  evaluatePlatformGate,
  formatDiagnosticLine,
  GATE_DIALOG_TITLE,
  runPlatformGate,
} from '../../src/gate/platform-gate.js';

const TEST_DIR = join(process.cwd(), '.test-platform-gate');

class RecordingNotifier implements Notifier {
  readonly alerts: Array<{ title: string; message: string }> = [];

  async alert(title: string, message: string): Promise<void> {
    this.alerts.push({ title, message });
  }
}

describe('architecture helpers', () => {
  it('should normalize common spellings', () => {
    expect(normalizeArchitecture('amd64')).toBe('x86_64');
    expect(normalizeArchitecture('AARCH64')).toBe('arm64');
    expect(normalizeArchitecture('arm64e')).toBe('arm64');
    expect(normalizeArchitecture('ppc')).toBe('unknown');
  });

  it('should see through translation only for an Intel report', () => {
    expect(resolveEffectiveArchitecture('x86_64', true)).toBe('arm64');
    expect(resolveEffectiveArchitecture('x86_64', false)).toBe('x86_64');
    expect(resolveEffectiveArchitecture('arm64', true)).toBe('arm64');
  });
});

describe('evaluatePlatformGate', () => {
  it('should abort an ARM installer on a native Intel Mac', () => {
    const result = evaluatePlatformGate({ reportedArchitecture: 'x86_64', translated: false, expected: 'arm64' });

    expect(result.decision).toBe('abort');
    expect(result.exitCode).toBe(1);
    expect(result.message).toBe(
      'This installer is for Apple Silicon (arm64) Macs, but this Mac is Intel (x86_64). ' +
        'Please download FreeScribeInstaller_x86_64.pkg instead.',
    );
  });

  it('should let an ARM installer proceed under translation', () => {
    const result = evaluatePlatformGate({ reportedArchitecture: 'x86_64', translated: true, expected: 'arm64' });

    expect(result.decision).toBe('proceed');
    expect(result.exitCode).toBe(0);
    expect(result.effectiveArchitecture).toBe('arm64');
  });

  it('should abort an Intel installer on Apple Silicon, translated or not', () => {
    expect(evaluatePlatformGate({ reportedArchitecture: 'arm64', translated: false, expected: 'x86_64' }).exitCode).toBe(1);
    expect(evaluatePlatformGate({ reportedArchitecture: 'x86_64', translated: true, expected: 'x86_64' }).exitCode).toBe(1);
  });

  it('should abort on an unrecognised architecture without suggesting a download', () => {
    const result = evaluatePlatformGate({ reportedArchitecture: 'riscv64', translated: false, expected: 'arm64' });

    expect(result.exitCode).toBe(1);
    expect(result.message).toBe('This installer is for Apple Silicon (arm64) Macs, but this Mac is an unrecognised architecture.');
  });
});

describe('runPlatformGate', () => {
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

  it('should log one diagnostic line and stay silent when proceeding', async () => {
    const sink = new MemoryLogSink();
    const notifier = new RecordingNotifier();

    const result = await runPlatformGate(
      { reportedArchitecture: 'x86_64', translated: true, expected: 'arm64' },
      { sink, notifier },
    );

    expect(result.exitCode).toBe(0);
    expect(sink.lines).toEqual(['Detected architecture: x86_64, translated: 1, expected: arm64']);
    expect(notifier.alerts).toEqual([]);
  });

  it('should log the error and alert the user when aborting', async () => {
    const sink = new MemoryLogSink();
    const notifier = new RecordingNotifier();

    const result = await runPlatformGate(
      { reportedArchitecture: 'x86_64', translated: false, expected: 'arm64' },
      { sink, notifier },
    );

    expect(result.exitCode).toBe(1);
    expect(sink.lines).toEqual([
      'Detected architecture: x86_64, translated: 0, expected: arm64',
      `ERROR: ${result.message}`,
    ]);
    expect(notifier.alerts).toEqual([{ title: GATE_DIALOG_TITLE, message: result.message }]);
  });

  it('should keep the abort when the dialog cannot be shown', async () => {
    const sink = new MemoryLogSink();
    const notifier: Notifier = {
      alert: async () => {
        throw new Error('osascript not found');
      },
    };

    const result = await runPlatformGate(
      { reportedArchitecture: 'arm64', translated: false, expected: 'x86_64' },
      { sink, notifier },
    );

    expect(result.exitCode).toBe(1);
    expect(sink.lines[2]).toBe('Dialog failed: osascript not found');
  });

  it('should append to the log file across runs', async () => {
    const logPath = join(TEST_DIR, 'nested', 'arch_check.log');
    const sink = new FileLogSink(logPath);

    await runPlatformGate({ reportedArchitecture: 'arm64', translated: false, expected: 'arm64' }, { sink });
    await runPlatformGate({ reportedArchitecture: 'arm64', translated: false, expected: 'arm64' }, { sink });

    const line = formatDiagnosticLine({ reportedArchitecture: 'arm64', translated: false, expected: 'arm64' });
    expect(readFileSync(logPath, 'utf-8')).toBe(`${line}\n${line}\n`);
  });
});

describe('buildDialogScript', () => {
  it('should escape quotes in the message', () => {
    expect(buildDialogScript('Installer', 'Use the "Intel" build')).toBe(
      'display dialog "Use the \\"Intel\\" build" with title "Installer" buttons {"OK"} default button "OK" with icon stop',
    );
  });
});
