/**
 * Release Pipeline: runs the build jobs for one tag side by side, waits for
 * all of them, and hands the results to the assembler only when every job
 * succeeded.
 *
 * Jobs share nothing: one failing does not cancel its siblings, but it does
 * keep the barrier closed.
 */

import { BuildFailureError, errorMessage } from '../errors.js';
import type { BuildJobResult, BuildTarget, ReleasePlan } from '../types/release.js';
import { parseTag } from './tag.js';
import { REQUIRED_TARGETS } from './targets.js';

// ─── Types ───────────────────────────────────────────────

export interface ReleasePipelineOptions {
  tag: string;
  targets?: readonly BuildTarget[];
  runJob: (target: BuildTarget) => Promise<BuildJobResult>;
  assemble: (results: BuildJobResult[]) => Promise<ReleasePlan>;
  onJobStart?: (target: BuildTarget) => void;
  onJobComplete?: (result: BuildJobResult) => void;
}

export interface ReleasePipelineResult {
  success: boolean;
  jobs: BuildJobResult[];
  plan: ReleasePlan | null;
  error: Error | null;
}

// ─── Orchestrator ────────────────────────────────────────

/** Run every build job, then assemble if all of them succeeded */
export async function runReleasePipeline(options: ReleasePipelineOptions): Promise<ReleasePipelineResult> {
  parseTag(options.tag);
  const targets = options.targets ?? REQUIRED_TARGETS;

  const settled = await Promise.allSettled(
    targets.map(async (target) => {
      options.onJobStart?.(target);
      const result = await options.runJob(target);
      options.onJobComplete?.(result);
      return result;
    }),
  );

  const jobs: BuildJobResult[] = settled.map((outcome, index) => {
    if (outcome.status === 'fulfilled') return outcome.value;
    const failed: BuildJobResult = {
      target: targets[index],
      status: 'failed',
      error: errorMessage(outcome.reason),
    };
    options.onJobComplete?.(failed);
    return failed;
  });

  const failedTargets = jobs.filter((job) => job.status === 'failed').map((job) => job.target);
  if (failedTargets.length > 0) {
    return {
      success: false,
      jobs,
      plan: null,
      error: new BuildFailureError(`Build jobs failed: ${failedTargets.join(', ')}`, failedTargets),
    };
  }

  try {
    const plan = await options.assemble(jobs);
    return { success: true, jobs, plan, error: null };
  } catch (error) {
    return {
      success: false,
      jobs,
      plan: null,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
