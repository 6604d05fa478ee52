/**
 * `targets` command: list every target the current configuration expands to.
 */

import { toExpandOptions, type ResolvedConfig } from "../config.js";
import { log, style } from "../logger.js";
import { BUILD_KIND_INFO, type BuildKind } from "../registry.js";
import { displayPath, expandTargets, type TargetPlan } from "../targets.js";

export interface TargetListing {
  readonly id: string;
  readonly kind: BuildKind | null;
  /** Config file for build targets, removal glob for clean targets. */
  readonly detail: string;
  readonly errors: readonly string[];
}

export function describeTargets(plan: TargetPlan, rootDir: string): TargetListing[] {
  return [...plan.buildIds, ...plan.cleanIds].map((id) => {
    const target = plan.targets.get(id);
    const errors = (plan.errors.get(id) ?? []).map((error) => error.message);
    if (!target) {
      return { id, kind: null, detail: "", errors };
    }
    const detail = target.type === "build" ? displayPath(rootDir, target.configFile) : target.glob;
    return { id, kind: target.entry.kind, detail, errors };
  });
}

/**
 * Print the target list.
 *
 * @returns Number of targets with configuration errors.
 */
export function listTargets(config: ResolvedConfig): number {
  const plan = expandTargets(toExpandOptions(config));
  const listings = describeTargets(plan, config.rootDir);
  const width = Math.max(0, ...listings.map((listing) => listing.id.length));

  log.bold("Targets");
  log.raw(`  ${style.cyan("build".padEnd(width))}  ${style.dim("every build-<name>, OVA first")}`);
  log.raw(`  ${style.cyan("clean".padEnd(width))}  ${style.dim("every clean-<name>")}`);
  log.newline();

  for (const listing of listings) {
    const kind = listing.kind ? BUILD_KIND_INFO[listing.kind].description : "";
    if (listing.errors.length > 0) {
      log.raw(`  ${style.red(listing.id.padEnd(width))}  ${style.red(listing.errors.join("; "))}`);
    } else {
      log.raw(`  ${style.cyan(listing.id.padEnd(width))}  ${kind.padEnd(11)} ${style.dim(listing.detail)}`);
    }
  }

  return listings.filter((listing) => listing.errors.length > 0).length;
}
