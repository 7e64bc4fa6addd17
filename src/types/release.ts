/**
 * Release domain types: tags, build targets, artifacts, reports.
 */

import { z } from 'zod';

// ─── Tags ────────────────────────────────────────────────

export const TagKindSchema = z.enum(['stable', 'alpha', 'release-candidate']);
export type TagKind = z.infer<typeof TagKindSchema>;

export const ReleaseClassSchema = z.enum(['stable', 'prerelease']);
export type ReleaseClass = z.infer<typeof ReleaseClassSchema>;

export interface ParsedTag {
  /** Tag as written, without any refs/tags/ prefix */
  raw: string;
  kind: TagKind;
  major: number;
  minor: number;
  patch: number;
  /** Release candidate number, only for release-candidate tags */
  rc?: number;
}

// ─── Targets ─────────────────────────────────────────────

export const BuildTargetSchema = z.enum(['windows', 'macos-x86_64', 'macos-arm64']);
export type BuildTarget = z.infer<typeof BuildTargetSchema>;

export const PlatformSchema = z.enum(['windows', 'macos']);
export type Platform = z.infer<typeof PlatformSchema>;

export const ArchitectureSchema = z.enum(['x86_64', 'arm64']);
export type Architecture = z.infer<typeof ArchitectureSchema>;

export const AcceleratorSchema = z.enum(['nvidia', 'cpu']);
export type Accelerator = z.infer<typeof AcceleratorSchema>;

export interface BuildTargetInfo {
  target: BuildTarget;
  platform: Platform;
  /** null where the target ships a single architecture by convention */
  architecture: Architecture | null;
  /** Installer file name as the packaging tool writes it */
  installerName: string;
  /** Public name the installer is published under */
  canonicalName: string;
  /** Accelerator variants bundled into the installer */
  accelerators: Accelerator[];
}

// ─── Build Steps ─────────────────────────────────────────

export const BuildStepSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
});
export type BuildStep = z.infer<typeof BuildStepSchema>;

export const BuildStepResultSchema = z.object({
  name: z.string(),
  command: z.string(),
  status: z.enum(['pass', 'fail', 'skip']),
  exit_code: z.number().int(),
  stderr_summary: z.string().optional(),
  duration_ms: z.number(),
});
export type BuildStepResult = z.infer<typeof BuildStepResultSchema>;

// ─── Artifacts ───────────────────────────────────────────

export const BuildArtifactSchema = z.object({
  target: BuildTargetSchema,
  /** Canonical public-facing name; unique within a release */
  name: z.string().min(1),
  /** Absolute path on the machine holding the file */
  path: z.string(),
  size: z.number().int().nonnegative(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
});
export type BuildArtifact = z.infer<typeof BuildArtifactSchema>;

// ─── Build Report ────────────────────────────────────────

export const BUILD_REPORT_FILE = 'build-report.json';

export const BuildReportSchema = z.object({
  target: BuildTargetSchema,
  tag: z.string(),
  status: z.enum(['success', 'failed']),
  /** Artifact paths are stored relative to the report's directory */
  artifacts: z.array(
    z.object({
      name: z.string().min(1),
      file: z.string().min(1),
      size: z.number().int().nonnegative(),
      sha256: z.string().regex(/^[0-9a-f]{64}$/),
    }),
  ),
  steps: z.array(BuildStepResultSchema),
  started_at: z.string(),
  finished_at: z.string(),
  error: z.string().optional(),
});
export type BuildReport = z.infer<typeof BuildReportSchema>;

/**
 * Outcome of one build job as seen by the assembler
 */
export type BuildJobResult =
  | { target: BuildTarget; status: 'success'; artifacts: BuildArtifact[] }
  | { target: BuildTarget; status: 'failed'; error: string };

// ─── Release ─────────────────────────────────────────────

export interface ReleasePlan {
  tag: string;
  name: string;
  body: string;
  prerelease: boolean;
  assets: BuildArtifact[];
}
