/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';

import { DEFAULT_GATE_LOG_PATH } from '../gate/log-sink.js';

import { BuildStepSchema, BuildTargetSchema } from '../types/release.js';

/**
 * Repository the release is published to
 */
export const RepositorySettingsSchema = z.object({
  owner: z.string().min(1).optional(),
  repo: z.string().min(1).optional(),
});

/**
 * Release assembly settings schema
 */
export const ReleaseSettingsSchema = z.object({
  on_existing: z.enum(['fail', 'replace']).default('fail'),
  targets: z
    .array(BuildTargetSchema)
    .min(1)
    .default(['windows', 'macos-x86_64', 'macos-arm64']),
  artifacts_dir: z.string().default('artifacts'),
});

/**
 * Per-target build step overrides
 */
export const BuildStepOverridesSchema = z.object({
  windows: z.array(BuildStepSchema).min(1).optional(),
  'macos-x86_64': z.array(BuildStepSchema).min(1).optional(),
  'macos-arm64': z.array(BuildStepSchema).min(1).optional(),
});

export const BuildSettingsSchema = z.object({
  steps: BuildStepOverridesSchema.default({}),
  output_dir: z.string().default('dist-release'),
});

/**
 * Installer platform gate settings
 */
export const GateSettingsSchema = z.object({
  log_path: z.string().default(DEFAULT_GATE_LOG_PATH),
  dialog: z.boolean().default(true),
});

/**
 * Model artifact settings schema
 */
export const ModelSettingsSchema = z.object({
  url: z.string().url().optional(),
  path: z.string().optional(),
  sha256: z
    .string()
    .regex(/^[a-fA-F0-9]{64}$/, 'must be a 64 character hex digest')
    .optional(),
  retries: z.number().int().min(0).max(10).default(2),
});

/**
 * Output settings schema
 */
export const OutputSettingsSchema = z.object({
  verbose: z.boolean().default(false),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  repository: RepositorySettingsSchema.default({}),
  release: ReleaseSettingsSchema.default({}),
  build: BuildSettingsSchema.default({}),
  gate: GateSettingsSchema.default({}),
  model: ModelSettingsSchema.default({}),
  output: OutputSettingsSchema.default({}),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type RepositorySettings = z.infer<typeof RepositorySettingsSchema>;
export type ReleaseSettings = z.infer<typeof ReleaseSettingsSchema>;
export type BuildSettings = z.infer<typeof BuildSettingsSchema>;
export type BuildStepOverrides = z.infer<typeof BuildStepOverridesSchema>;
export type GateSettings = z.infer<typeof GateSettingsSchema>;
export type ModelSettings = z.infer<typeof ModelSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
