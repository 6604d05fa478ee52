/**
 * Target expansion for kube-image-builder.
 *
 * Turns the build registry into `build-<name>` and `clean-<name>` targets.
 * Configuration problems are recorded against the affected target instead
 * of thrown, so one bad name never hides the rest of the matrix; callers
 * refuse to run a requested target that has errors.
 *
 * Dependency direction:
 *   This module imports from: registry.ts, packer/, errors.ts, validation.ts
 *   It should NOT import from: cli, commands
 */

import { existsSync } from "node:fs";
import { relative, resolve } from "node:path";

import { BUILD_PREFIX, CLEAN_PREFIX } from "./constants.js";
import { ConfigError, ValidationError } from "./errors.js";
import { PackerBuildCommandBuilder, assembleVarFileFlags, type Invocation } from "./packer/index.js";
import {
  configFilePath,
  registryEntries,
  templatePath,
  type BuildRegistry,
  type RegistryEntry,
} from "./registry.js";
import { isValidBuildName } from "./validation.js";

/** Everything expansion needs; no process-wide state is consulted. */
export interface ExpandOptions {
  /** Build root: packer's working directory, parent of templateDir and outputDir. */
  rootDir: string;
  registry: BuildRegistry;
  /** Shared var files, relative to rootDir or absolute. */
  varFiles: readonly string[];
  /** Extra flags appended after the shared var files. */
  packerFlags: readonly string[];
  packerBin: string;
  templateDir: string;
  outputDir: string;
  /** Require every shared var file to exist before anything runs. */
  strictVarFiles?: boolean;
}

export interface BuildTarget {
  readonly type: "build";
  readonly id: string;
  readonly entry: RegistryEntry;
  /** Absolute path of <templateDir>/<kind>/<name>.json */
  readonly configFile: string;
  readonly invocation: Invocation;
}

export interface CleanTarget {
  readonly type: "clean";
  readonly id: string;
  readonly entry: RegistryEntry;
  /** Absolute output directory. */
  readonly outputDir: string;
  /** Removal glob relative to the build root, e.g. output/ova-centos-7* */
  readonly glob: string;
}

export type Target = BuildTarget | CleanTarget;

export interface TargetPlan {
  /** Targets that expanded cleanly, by id. */
  readonly targets: ReadonlyMap<string, Target>;
  /** Every build target id in registry order, including ones with errors. */
  readonly buildIds: readonly string[];
  /** Every clean target id in registry order, including ones with errors. */
  readonly cleanIds: readonly string[];
  readonly errors: ReadonlyMap<string, readonly ConfigError[]>;
}

export function buildTargetId(entry: RegistryEntry): string {
  return `${BUILD_PREFIX}${entry.name}`;
}

export function cleanTargetId(entry: RegistryEntry): string {
  return `${CLEAN_PREFIX}${entry.name}`;
}

/** Display form of a clean glob; always forward slashes. */
function cleanGlob(rootDir: string, outputDir: string, name: string): string {
  const rel = relative(rootDir, outputDir).split("\\").join("/");
  return `${rel === "" ? "." : rel}/${name}*`;
}

/**
 * Expand the registry into targets.
 *
 * For each entry (OVA first, declared order):
 *   build-<name>: packer build <shared flags> -var-file=<abs config> <templateDir>/<kind>/packer.json
 *   clean-<name>: remove <outputDir>/<name>*
 */
export function expandTargets(options: ExpandOptions): TargetPlan {
  const rootDir = resolve(options.rootDir);
  const outputDir = resolve(rootDir, options.outputDir);
  const commonFlags = assembleVarFileFlags(options.varFiles, options.packerFlags, rootDir);

  const targets = new Map<string, Target>();
  const errors = new Map<string, ConfigError[]>();
  const buildIds: string[] = [];
  const cleanIds: string[] = [];
  const owners = new Map<string, RegistryEntry>();

  const addError = (id: string, error: ConfigError): void => {
    const list = errors.get(id);
    if (list) {
      list.push(error);
    } else {
      errors.set(id, [error]);
    }
  };

  const sharedErrors: ConfigError[] = [];
  if (options.strictVarFiles) {
    for (const file of options.varFiles) {
      const path = resolve(rootDir, file);
      if (!existsSync(path)) {
        sharedErrors.push(new ConfigError(`Missing var file: ${path}`));
      }
    }
  }

  for (const entry of registryEntries(options.registry)) {
    const buildId = buildTargetId(entry);
    const cleanId = cleanTargetId(entry);

    const owner = owners.get(buildId);
    if (owner) {
      // Both occurrences are dropped: the id no longer names one image.
      const error = new ConfigError(
        `Build name '${entry.name}' is declared more than once (${owner.kind}, ${entry.kind})`
      );
      targets.delete(buildId);
      targets.delete(cleanId);
      addError(buildId, error);
      addError(cleanId, error);
      continue;
    }
    owners.set(buildId, entry);
    buildIds.push(buildId);
    cleanIds.push(cleanId);

    if (!isValidBuildName(entry.name)) {
      const error = new ConfigError(`Invalid build name '${entry.name}' in ${entry.kind} build names`);
      addError(buildId, error);
      addError(cleanId, error);
      continue;
    }

    targets.set(cleanId, {
      type: "clean",
      id: cleanId,
      entry,
      outputDir,
      glob: cleanGlob(rootDir, outputDir, entry.name),
    });

    const configFile = configFilePath(rootDir, options.templateDir, entry);
    let buildOk = true;
    if (!existsSync(configFile)) {
      addError(buildId, new ConfigError(`Missing configuration for '${entry.name}': ${configFile}`));
      buildOk = false;
    }
    for (const error of sharedErrors) {
      addError(buildId, error);
      buildOk = false;
    }
    if (!buildOk) {
      continue;
    }

    const args = new PackerBuildCommandBuilder()
      .withFlags(commonFlags)
      .withVarFile(configFile)
      .withTemplate(templatePath(options.templateDir, entry.kind))
      .build();

    targets.set(buildId, {
      type: "build",
      id: buildId,
      entry,
      configFile,
      invocation: { command: options.packerBin, args, cwd: rootDir },
    });
  }

  return { targets, buildIds, cleanIds, errors };
}

/** Ids accepted by resolveTargetIds besides the per-name targets. */
export const AGGREGATE_TARGETS = ["all", "build", "clean"] as const;

/**
 * Resolve requested target ids to an ordered, de-duplicated id list.
 *
 *   all, build -> every build-<name>
 *   clean      -> every clean-<name>
 *
 * @throws ValidationError for an id the plan does not know.
 */
export function resolveTargetIds(plan: TargetPlan, requested: readonly string[]): string[] {
  const known = new Set([...plan.buildIds, ...plan.cleanIds]);
  const selected = new Set<string>();

  for (const id of requested) {
    if (id === "all" || id === "build") {
      plan.buildIds.forEach((buildId) => selected.add(buildId));
    } else if (id === "clean") {
      plan.cleanIds.forEach((cleanId) => selected.add(cleanId));
    } else if (known.has(id)) {
      selected.add(id);
    } else {
      throw new ValidationError(
        `Unknown target '${id}'. Valid targets: ${[...AGGREGATE_TARGETS, ...plan.buildIds, ...plan.cleanIds].join(", ")}`
      );
    }
  }

  return [...selected];
}

/** Configuration errors of the given targets, in target order. */
export function collectTargetErrors(plan: TargetPlan, ids: readonly string[]): ConfigError[] {
  const seen = new Set<ConfigError>();
  const result: ConfigError[] = [];
  for (const id of ids) {
    for (const error of plan.errors.get(id) ?? []) {
      if (!seen.has(error)) {
        seen.add(error);
        result.push(error);
      }
    }
  }
  return result;
}

/** Expanded targets for the given ids; ids with errors are skipped. */
export function selectTargets(plan: TargetPlan, ids: readonly string[]): Target[] {
  const result: Target[] = [];
  for (const id of ids) {
    const target = plan.targets.get(id);
    if (target) {
      result.push(target);
    }
  }
  return result;
}

/** Path relative to the build root, for listings. */
export function displayPath(rootDir: string, path: string): string {
  return relative(resolve(rootDir), path);
}
