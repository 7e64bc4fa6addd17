/**
 * Build Job: runs one target's packaging steps in order, renames the
 * installer to its public name and writes build-report.json.
 *
 * A failing step ends the job: later steps are skipped and no artifact is
 * reported. Retries belong to the CI system, not here.
 *
 * The two macOS jobs package the same sources under the same installer file
 * name, so each stages its PyInstaller output and installer under
 * build/<target>. Jobs for different targets can then share a checkout.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import { errorMessage } from '../errors.js';
import type {
  BuildArtifact,
  BuildJobResult,
  BuildReport,
  BuildStep,
  BuildStepResult,
  BuildTarget,
} from '../types/release.js';
import { BUILD_REPORT_FILE } from '../types/release.js';
import { moveFile, sha256File } from '../utils/fs.js';
import { canonicalizeArtifact } from './canonicalize.js';
import { summarizeStderr, type CommandRunner } from './command-runner.js';
import { parseTag } from './tag.js';
import { getBuildTarget, WINDOWS_PAYLOADS } from './targets.js';

// ─── Types ───────────────────────────────────────────────

export interface BuildOutput {
  /** File name written by the packaging step */
  source: string;
  /** Public file name */
  canonical: string;
}

export interface BuildJobDefinition {
  target: BuildTarget;
  steps: BuildStep[];
  /** Directory the installer lands in, relative to the job's cwd */
  artifactDir: string;
  outputs: BuildOutput[];
}

export interface BuildJobOptions {
  cwd: string;
  tag: string;
  runner: CommandRunner;
  /** Where the renamed installer and report go; defaults to artifactDir */
  outputDir?: string;
  env?: Record<string, string>;
  onStepStart?: (step: BuildStep, index: number) => void;
  onStepComplete?: (result: BuildStepResult, index: number) => void;
}

export interface BuildJobOutcome {
  result: BuildJobResult;
  report: BuildReport;
  reportPath: string;
}

// ─── Default Definitions ─────────────────────────────────

const PYTHON_REQUIREMENTS = 'pip install -r cl_requirements.txt';

/** Per-target staging root, relative to the checkout */
export const STAGING_DIR = 'build';

function windowsDefinition(): BuildJobDefinition {
  const info = getBuildTarget('windows');
  return {
    target: 'windows',
    artifactDir: '.',
    steps: [
      { name: 'Install requirements', command: PYTHON_REQUIREMENTS },
      ...info.accelerators.map((accelerator) => ({
        name: `Build ${accelerator} client`,
        command: `pyinstaller --onefile --add-data ".\\whisper-assets:whisper\\assets" --name ${WINDOWS_PAYLOADS[accelerator]} client.py`,
      })),
      { name: 'Build installer', command: 'makensis /DVERSION={version} installer.nsi' },
    ],
    outputs: [{ source: info.installerName, canonical: info.canonicalName }],
  };
}

function macosDefinition(target: 'macos-x86_64' | 'macos-arm64'): BuildJobDefinition {
  const info = getBuildTarget(target);
  const staging = `${STAGING_DIR}/${target}`;
  return {
    target,
    artifactDir: staging,
    steps: [
      { name: 'Install requirements', command: PYTHON_REQUIREMENTS },
      {
        name: 'Build client',
        command:
          `pyinstaller --windowed --distpath ${staging}/dist --workpath ${staging}/work ` +
          '--add-data "./whisper-assets:whisper/assets" --name freescribe-client client.py',
      },
      {
        name: 'Build installer',
        command:
          `pkgbuild --root ${staging}/dist --identifier io.github.clinicianfocus.FreeScribe --version {version} ` +
          `--scripts mac/scripts/{arch} --install-location /Applications ${staging}/${info.installerName}`,
      },
    ],
    outputs: [{ source: info.installerName, canonical: info.canonicalName }],
  };
}

/**
 * Build definition for a target, with optional step overrides from config
 */
export function getBuildDefinition(target: BuildTarget, stepOverrides?: BuildStep[]): BuildJobDefinition {
  const definition = target === 'windows' ? windowsDefinition() : macosDefinition(target);
  if (stepOverrides && stepOverrides.length > 0) {
    return { ...definition, steps: stepOverrides };
  }
  return definition;
}

// ─── Template Expansion ──────────────────────────────────

/**
 * Replace {tag}, {version} and {arch} placeholders in a step command
 */
export function expandCommand(command: string, target: BuildTarget, tag: string): string {
  const parsed = parseTag(tag);
  const vars: Record<string, string> = {
    tag: parsed.raw,
    version: `${parsed.major}.${parsed.minor}.${parsed.patch}`,
    arch: getBuildTarget(target).architecture ?? 'x86_64',
    target,
  };
  return command.replace(/\{(\w+)\}/g, (match, key: string) => vars[key] ?? match);
}

// ─── Job Execution ───────────────────────────────────────

/**
 * Run a build job to completion and write its report
 */
export async function runBuildJob(
  definition: BuildJobDefinition,
  options: BuildJobOptions,
): Promise<BuildJobOutcome> {
  const tag = parseTag(options.tag).raw;
  const startedAt = new Date().toISOString();
  const artifactDir = path.resolve(options.cwd, definition.artifactDir);
  const outputDir = options.outputDir ? path.resolve(options.cwd, options.outputDir) : artifactDir;

  await clearStaleOutputs(definition, artifactDir, outputDir);

  const stepResults: BuildStepResult[] = [];
  let error: string | undefined;

  for (const [index, step] of definition.steps.entries()) {
    if (error) {
      stepResults.push({
        name: step.name,
        command: step.command,
        status: 'skip',
        exit_code: -1,
        duration_ms: 0,
      });
      continue;
    }

    options.onStepStart?.(step, index);
    const command = expandCommand(step.command, definition.target, tag);
    const outcome = await options.runner.run(command, { cwd: options.cwd, env: options.env });

    const stepResult: BuildStepResult = {
      name: step.name,
      command,
      status: outcome.exitCode === 0 ? 'pass' : 'fail',
      exit_code: outcome.exitCode,
      stderr_summary: summarizeStderr(outcome.stderr),
      duration_ms: outcome.durationMs,
    };
    stepResults.push(stepResult);
    options.onStepComplete?.(stepResult, index);

    if (stepResult.status === 'fail') {
      error = `Step "${step.name}" failed with exit code ${outcome.exitCode}`;
    }
  }

  let artifacts: BuildArtifact[] = [];
  if (!error) {
    try {
      artifacts = await collectOutputs(definition, artifactDir, outputDir);
    } catch (collectError) {
      error = errorMessage(collectError);
    }
  }

  const report: BuildReport = {
    target: definition.target,
    tag,
    status: error ? 'failed' : 'success',
    artifacts: error
      ? []
      : artifacts.map((a) => ({
          name: a.name,
          file: path.relative(outputDir, a.path),
          size: a.size,
          sha256: a.sha256,
        })),
    steps: stepResults,
    started_at: startedAt,
    finished_at: new Date().toISOString(),
    error,
  };

  const reportPath = await writeBuildReport(outputDir, report);

  const result: BuildJobResult = error
    ? { target: definition.target, status: 'failed', error }
    : { target: definition.target, status: 'success', artifacts };

  return { result, report, reportPath };
}

/**
 * Remove installers left by an earlier run so they cannot be reported as
 * this run's output
 */
async function clearStaleOutputs(
  definition: BuildJobDefinition,
  artifactDir: string,
  outputDir: string,
): Promise<void> {
  await fs.mkdir(artifactDir, { recursive: true });
  for (const output of definition.outputs) {
    await Promise.all([
      fs.rm(path.join(artifactDir, output.source), { force: true }),
      fs.rm(path.join(artifactDir, output.canonical), { force: true }),
      fs.rm(path.join(outputDir, output.canonical), { force: true }),
    ]);
  }
}

async function collectOutputs(
  definition: BuildJobDefinition,
  artifactDir: string,
  outputDir: string,
): Promise<BuildArtifact[]> {
  await fs.mkdir(outputDir, { recursive: true });
  const artifacts: BuildArtifact[] = [];

  for (const output of definition.outputs) {
    const { path: canonicalPath } = await canonicalizeArtifact(artifactDir, output.source, output.canonical);

    const finalPath = path.join(outputDir, output.canonical);
    if (canonicalPath !== finalPath) {
      await moveFile(canonicalPath, finalPath);
    }

    const stats = await fs.stat(finalPath);
    artifacts.push({
      target: definition.target,
      name: output.canonical,
      path: finalPath,
      size: stats.size,
      sha256: await sha256File(finalPath),
    });
  }

  return artifacts;
}

/**
 * Write a build report into a directory
 *
 * @returns Path of the written report
 */
export async function writeBuildReport(dir: string, report: BuildReport): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const reportPath = path.join(dir, BUILD_REPORT_FILE);
  await fs.writeFile(reportPath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
  return reportPath;
}
