/**
 * Machine architecture detection and normalisation.
 */

import { execFile } from 'node:child_process';
import { machine } from 'node:os';
import { promisify } from 'node:util';

import type { Architecture } from '../types/release.js';

const execFileAsync = promisify(execFile);

export type DetectedArchitecture = Architecture | 'unknown';

const ARCHITECTURE_ALIASES: Record<string, Architecture> = {
  x86_64: 'x86_64',
  amd64: 'x86_64',
  x64: 'x86_64',
  i386: 'x86_64',
  i686: 'x86_64',
  arm64: 'arm64',
  arm64e: 'arm64',
  aarch64: 'arm64',
};

/**
 * Map the many spellings of a CPU architecture to one of ours
 */
export function normalizeArchitecture(raw: string): DetectedArchitecture {
  return ARCHITECTURE_ALIASES[raw.trim().toLowerCase()] ?? 'unknown';
}

/**
 * Correct the reported architecture for a binary translation layer.
 * Under translation an ARM host reports itself as Intel.
 */
export function resolveEffectiveArchitecture(
  reported: DetectedArchitecture,
  translated: boolean,
): DetectedArchitecture {
  if (translated && reported === 'x86_64') {
    return 'arm64';
  }
  return reported;
}

export function describeArchitecture(architecture: DetectedArchitecture): string {
  switch (architecture) {
    case 'arm64':
      return 'Apple Silicon (arm64)';
    case 'x86_64':
      return 'Intel (x86_64)';
    default:
      return 'an unrecognised architecture';
  }
}

// ─── Probe ───────────────────────────────────────────────

export interface MachineArchitecture {
  /** Architecture string as the machine reports it */
  raw: string;
  translated: boolean;
}

export interface ArchitectureProbe {
  detect(): Promise<MachineArchitecture>;
}

/**
 * Reads the machine architecture and, on macOS, the Rosetta translation flag
 */
export class SystemArchitectureProbe implements ArchitectureProbe {
  async detect(): Promise<MachineArchitecture> {
    return {
      raw: machine(),
      translated: process.platform === 'darwin' ? await readTranslationFlag() : false,
    };
  }
}

/**
 * sysctl.proc_translated is 1 for a translated process, 0 for native, and
 * does not exist on Intel Macs. A missing key therefore reads as native.
 */
async function readTranslationFlag(): Promise<boolean> {
  try {
    const { stdout } = await execFileAsync('sysctl', ['-in', 'sysctl.proc_translated']);
    return stdout.trim() === '1';
  } catch (error) {
    if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
      return false;
    }
    throw error;
  }
}

export function createArchitectureProbe(): ArchitectureProbe {
  return new SystemArchitectureProbe();
}
