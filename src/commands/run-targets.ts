/**
 * Sequential target execution for kube-image-builder.
 *
 * Runs already-expanded targets in order and applies the failure policy:
 *   fail-fast (default): stop launching after the first failure
 *   keep-going:          run every target, report every failure
 * A user interrupt (exit 130/143) stops the run under either policy.
 */

import { cleanOutputs } from "../cleanup.js";
import { EXIT_FAILURE } from "../constants.js";
import { CleanupError } from "../errors.js";
import { isUserTermination, logExitCode } from "../error-handler.js";
import { log, style } from "../logger.js";
import type { ProcessRunner } from "../packer/index.js";
import type { BuildTarget, CleanTarget, Target } from "../targets.js";

export type TargetStatus = "succeeded" | "failed" | "skipped";

export interface TargetOutcome {
  readonly id: string;
  readonly status: TargetStatus;
  readonly exitCode: number;
  /** Paths removed by a clean target. */
  readonly removed?: readonly string[];
}

export interface RunSummary {
  /** First non-zero exit code encountered, else 0. */
  readonly exitCode: number;
  readonly outcomes: readonly TargetOutcome[];
}

export interface RunTargetsOptions {
  runner: ProcessRunner;
  keepGoing?: boolean;
  /** Print removals instead of performing them. */
  dryRun?: boolean;
}

async function runBuild(target: BuildTarget, runner: ProcessRunner): Promise<TargetOutcome> {
  log.bold(`==> ${target.id}`);
  const { exitCode } = await runner.run(target.invocation);
  if (exitCode === 0) {
    log.success(`Built ${target.entry.name}`);
    return { id: target.id, status: "succeeded", exitCode };
  }
  logExitCode(exitCode, target.id);
  return { id: target.id, status: "failed", exitCode };
}

function runClean(target: CleanTarget, dryRun: boolean): TargetOutcome {
  if (dryRun) {
    log.raw(`rm -fr ${target.glob}`);
    return { id: target.id, status: "succeeded", exitCode: 0, removed: [] };
  }

  try {
    const removed = cleanOutputs(target);
    if (removed.length > 0) {
      log.dim(`${target.id}: removed ${removed.length} path(s) matching ${target.glob}`);
    }
    return { id: target.id, status: "succeeded", exitCode: 0, removed };
  } catch (error: unknown) {
    if (!(error instanceof CleanupError)) {
      throw error;
    }
    log.error(`${target.id}: ${error.message}`);
    return { id: target.id, status: "failed", exitCode: EXIT_FAILURE };
  }
}

/**
 * Run targets in the given order.
 *
 * A ToolNotFoundError from the runner propagates: no later target could
 * succeed either.
 */
export async function runTargets(targets: readonly Target[], options: RunTargetsOptions): Promise<RunSummary> {
  const outcomes: TargetOutcome[] = [];
  let exitCode = 0;
  let stopped = false;

  for (const target of targets) {
    if (stopped) {
      outcomes.push({ id: target.id, status: "skipped", exitCode: 0 });
      continue;
    }

    const outcome =
      target.type === "build"
        ? await runBuild(target, options.runner)
        : runClean(target, options.dryRun ?? false);
    outcomes.push(outcome);

    if (outcome.status === "failed") {
      if (exitCode === 0) {
        exitCode = outcome.exitCode;
      }
      if (!options.keepGoing || isUserTermination(outcome.exitCode)) {
        stopped = true;
      }
    }
  }

  return { exitCode, outcomes };
}

/**
 * Log a one-line summary (only for runs of more than one target).
 */
export function logSummary(summary: RunSummary): void {
  if (summary.outcomes.length <= 1) {
    return;
  }

  const count = (status: TargetStatus): number =>
    summary.outcomes.filter((outcome) => outcome.status === status).length;
  const failed = summary.outcomes.filter((outcome) => outcome.status === "failed");

  const parts = [style.green(`${count("succeeded")} succeeded`)];
  if (failed.length > 0) {
    parts.push(style.red(`${failed.length} failed`));
  }
  if (count("skipped") > 0) {
    parts.push(style.yellow(`${count("skipped")} skipped`));
  }

  log.newline();
  log.raw(`${style.bold("Summary:")} ${parts.join(", ")}`);
  if (failed.length > 0) {
    log.dim(`Failed: ${failed.map((outcome) => outcome.id).join(", ")}`);
  }
}
