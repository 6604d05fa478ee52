/**
 * Target command workflow for kube-image-builder.
 *
 * expand -> resolve requested ids -> refuse on configuration errors -> run.
 * Nothing is launched when any requested target has a configuration error.
 */

import { toExpandOptions, type ResolvedConfig } from "../config.js";
import { EXIT_CONFIG_ERROR } from "../constants.js";
import { log } from "../logger.js";
import type { ProcessRunner } from "../packer/index.js";
import { collectTargetErrors, expandTargets, resolveTargetIds, selectTargets } from "../targets.js";
import { logSummary, runTargets, type RunSummary } from "./run-targets.js";

/** Target run when none is named. */
export const DEFAULT_TARGET = "build";

/**
 * Expand, check and run the requested targets.
 *
 * @returns Summary of the run; exit code EXIT_CONFIG_ERROR and no outcomes
 *   when configuration errors prevented the run.
 * @throws ValidationError for an unknown target id.
 */
export async function runRequestedTargets(
  config: ResolvedConfig,
  requested: readonly string[],
  runner: ProcessRunner
): Promise<RunSummary> {
  const plan = expandTargets(toExpandOptions(config));
  const ids = resolveTargetIds(plan, requested.length > 0 ? requested : [DEFAULT_TARGET]);

  const errors = collectTargetErrors(plan, ids);
  if (errors.length > 0) {
    for (const error of errors) {
      log.error(error.message);
    }
    log.dim("Nothing was run.");
    return { exitCode: EXIT_CONFIG_ERROR, outcomes: [] };
  }

  log.debug(`Targets: ${ids.join(" ")}`);
  const summary = await runTargets(selectTargets(plan, ids), {
    runner,
    keepGoing: config.keepGoing,
    dryRun: config.dryRun,
  });
  logSummary(summary);
  return summary;
}

/** Build every registered image: OVA names, then AMI names. */
export function buildAll(config: ResolvedConfig, runner: ProcessRunner): Promise<RunSummary> {
  return runRequestedTargets(config, ["build"], runner);
}

/** Remove the output artifacts of every registered image. */
export function cleanAll(config: ResolvedConfig, runner: ProcessRunner): Promise<RunSummary> {
  return runRequestedTargets(config, ["clean"], runner);
}
