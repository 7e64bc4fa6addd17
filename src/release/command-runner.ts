/**
 * Command Runner: executes build step commands in a shell and captures
 * their exit status. Build jobs talk to it through the CommandRunner
 * interface so tests can script outcomes.
 */

import { exec } from 'node:child_process';

// ─── Constants ───────────────────────────────────────────

/** Max stdout/stderr capture in bytes */
const MAX_OUTPUT_SIZE = 16 * 1024 * 1024;

/** Default per-command timeout: packaging steps can be slow */
export const DEFAULT_STEP_TIMEOUT_MS = 60 * 60 * 1000;

/** Characters of stderr kept in step summaries */
const STDERR_SUMMARY_LENGTH = 2000;

// ─── Types ───────────────────────────────────────────────

export interface CommandOptions {
  cwd: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface CommandRunner {
  run(command: string, options: CommandOptions): Promise<CommandResult>;
}

// ─── Shell Runner ────────────────────────────────────────

function exitCodeOf(error: Error | null): number {
  if (!error) return 0;
  if ('code' in error && typeof error.code === 'number') return error.code;
  return 1;
}

export class ShellCommandRunner implements CommandRunner {
  run(command: string, options: CommandOptions): Promise<CommandResult> {
    const startTime = Date.now();

    return new Promise<CommandResult>((resolve) => {
      exec(
        command,
        {
          cwd: options.cwd,
          timeout: options.timeoutMs ?? DEFAULT_STEP_TIMEOUT_MS,
          maxBuffer: MAX_OUTPUT_SIZE,
          env: { ...process.env, CI: 'true', ...options.env },
        },
        (error, stdout, stderr) => {
          resolve({
            exitCode: exitCodeOf(error),
            stdout,
            stderr,
            durationMs: Date.now() - startTime,
          });
        },
      );
    });
  }
}

export function createCommandRunner(): CommandRunner {
  return new ShellCommandRunner();
}

/**
 * Trim stderr for storage in a report
 */
export function summarizeStderr(stderr: string): string | undefined {
  if (!stderr) return undefined;
  return stderr.length > STDERR_SUMMARY_LENGTH
    ? stderr.slice(0, STDERR_SUMMARY_LENGTH) + '\n... (truncated)'
    : stderr;
}
