/**
 * Build target table and artifact naming.
 * Public names are consumed by download pages and must not change.
 */

import type { BuildTarget, BuildTargetInfo } from '../types/release.js';

/** Product prefix shared by every installer */
export const PRODUCT_NAME = 'FreeScribe';

/** Client payload names per Windows accelerator variant */
export const WINDOWS_PAYLOADS = {
  nvidia: 'freescribe-client-nvidia',
  cpu: 'freescribe-client-cpu',
} as const;

const BUILD_TARGETS: Record<BuildTarget, BuildTargetInfo> = {
  windows: {
    target: 'windows',
    platform: 'windows',
    architecture: null,
    installerName: `${PRODUCT_NAME}Installer.exe`,
    canonicalName: `${PRODUCT_NAME}Installer_windows.exe`,
    accelerators: ['nvidia', 'cpu'],
  },
  'macos-x86_64': {
    target: 'macos-x86_64',
    platform: 'macos',
    architecture: 'x86_64',
    installerName: `${PRODUCT_NAME}Installer.pkg`,
    canonicalName: `${PRODUCT_NAME}Installer_x86_64.pkg`,
    accelerators: [],
  },
  'macos-arm64': {
    target: 'macos-arm64',
    platform: 'macos',
    architecture: 'arm64',
    installerName: `${PRODUCT_NAME}Installer.pkg`,
    canonicalName: `${PRODUCT_NAME}Installer_arm64.pkg`,
    accelerators: [],
  },
};

/** Targets every release must carry, in publishing order */
export const REQUIRED_TARGETS: readonly BuildTarget[] = ['windows', 'macos-x86_64', 'macos-arm64'];

export function getBuildTarget(target: BuildTarget): BuildTargetInfo {
  return BUILD_TARGETS[target];
}

export function listBuildTargets(): BuildTargetInfo[] {
  return REQUIRED_TARGETS.map((target) => BUILD_TARGETS[target]);
}

/**
 * Public-facing file name for a target's installer
 */
export function canonicalArtifactName(target: BuildTarget): string {
  return BUILD_TARGETS[target].canonicalName;
}

/**
 * Map a public file name back to its target, if it is one of ours
 */
export function targetForArtifactName(name: string): BuildTarget | null {
  for (const info of Object.values(BUILD_TARGETS)) {
    if (info.canonicalName === name) return info.target;
  }
  return null;
}
