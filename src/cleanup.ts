/**
 * Output artifact cleanup for kube-image-builder.
 *
 * A clean target removes everything directly under the output directory
 * whose name starts with its build name (the `output/<name>*` glob).
 */

import { readdirSync, rmSync } from "node:fs";
import { join } from "node:path";

import { CleanupError, extractErrorDetails } from "./errors.js";
import { log } from "./logger.js";
import type { CleanTarget } from "./targets.js";

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Entries of outputDir matching `<prefix>*`, sorted.
 *
 * A missing output directory has no matches.
 */
export function findOutputs(outputDir: string, prefix: string): string[] {
  let names: string[];
  try {
    names = readdirSync(outputDir);
  } catch (error: unknown) {
    if (errorCode(error) === "ENOENT") {
      return [];
    }
    throw new CleanupError(`Cannot read ${outputDir}: ${extractErrorDetails(error)}`, outputDir);
  }
  return names
    .filter((name) => name.startsWith(prefix))
    .sort()
    .map((name) => join(outputDir, name));
}

/**
 * Remove a clean target's artifacts.
 *
 * Idempotent: nothing to remove is success. Stops at the first path that
 * cannot be removed.
 *
 * @returns Removed paths.
 * @throws CleanupError naming the path that could not be removed.
 */
export function cleanOutputs(target: CleanTarget): string[] {
  const matches = findOutputs(target.outputDir, target.entry.name);
  if (matches.length === 0) {
    log.debug(`${target.id}: nothing matches ${target.glob}`);
    return [];
  }

  for (const path of matches) {
    try {
      rmSync(path, { recursive: true, force: true });
      log.debug(`Removed ${path}`);
    } catch (error: unknown) {
      throw new CleanupError(`Failed to remove ${path}: ${extractErrorDetails(error)}`, path);
    }
  }
  return matches;
}
