/**
 * Platform Gate: install-time check that an installer built for one CPU
 * architecture is not completed on another.
 *
 * One procedure serves both macOS installers; they differ only in the
 * expected architecture they pass in.
 */

import { errorMessage } from '../errors.js';
import { canonicalArtifactName } from '../release/targets.js';
import type { Architecture, BuildTarget } from '../types/release.js';
import {
  describeArchitecture,
  normalizeArchitecture,
  resolveEffectiveArchitecture,
  type DetectedArchitecture,
} from './architecture.js';
import type { LogSink } from './log-sink.js';
import type { Notifier } from './notifier.js';

// ─── Types ───────────────────────────────────────────────

export interface PlatformGateInput {
  /** Architecture string as reported by the machine */
  reportedArchitecture: string;
  /** Whether the installer runs under a binary translation layer */
  translated: boolean;
  /** The single architecture this installer variant was built for */
  expected: Architecture;
}

export type GateDecision = 'proceed' | 'abort';

export interface PlatformGateResult {
  decision: GateDecision;
  exitCode: 0 | 1;
  effectiveArchitecture: DetectedArchitecture;
  message: string;
}

export interface PlatformGateDeps {
  sink: LogSink;
  notifier?: Notifier;
}

export const GATE_DIALOG_TITLE = 'FreeScribe Installer';

const MACOS_TARGETS: Record<Architecture, BuildTarget> = {
  x86_64: 'macos-x86_64',
  arm64: 'macos-arm64',
};

// ─── Evaluation ──────────────────────────────────────────

/**
 * Decide whether installation may proceed. Pure.
 */
export function evaluatePlatformGate(input: PlatformGateInput): PlatformGateResult {
  const reported = normalizeArchitecture(input.reportedArchitecture);
  const effective = resolveEffectiveArchitecture(reported, input.translated);

  if (effective === input.expected) {
    return {
      decision: 'proceed',
      exitCode: 0,
      effectiveArchitecture: effective,
      message: `Architecture check passed: ${effective}`,
    };
  }

  let message =
    `This installer is for ${describeArchitecture(input.expected)} Macs, ` +
    `but this Mac is ${describeArchitecture(effective)}.`;
  if (effective !== 'unknown') {
    message += ` Please download ${canonicalArtifactName(MACOS_TARGETS[effective])} instead.`;
  }

  return {
    decision: 'abort',
    exitCode: 1,
    effectiveArchitecture: effective,
    message,
  };
}

/**
 * The line appended to the diagnostic log on every run
 */
export function formatDiagnosticLine(input: PlatformGateInput): string {
  return (
    `Detected architecture: ${input.reportedArchitecture}, ` +
    `translated: ${input.translated ? 1 : 0}, expected: ${input.expected}`
  );
}

/**
 * Evaluate the gate, record it in the diagnostic log and alert the user on
 * abort
 */
export async function runPlatformGate(
  input: PlatformGateInput,
  deps: PlatformGateDeps,
): Promise<PlatformGateResult> {
  await deps.sink.append(formatDiagnosticLine(input));

  const result = evaluatePlatformGate(input);
  if (result.decision === 'proceed') {
    return result;
  }

  await deps.sink.append(`ERROR: ${result.message}`);
  if (deps.notifier) {
    try {
      await deps.notifier.alert(GATE_DIALOG_TITLE, result.message);
    } catch (error) {
      // The install is aborted either way; keep the reason in the log
      await deps.sink.append(`Dialog failed: ${errorMessage(error)}`);
    }
  }

  return result;
}
