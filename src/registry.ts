/**
 * Build name registry for kube-image-builder.
 *
 * Two ordered lists of build names, one per image kind, and the path
 * conventions that tie a name to its packer files.
 *
 * Dependency direction:
 *   This module imports from: constants.ts
 *   It should NOT import from: cli, commands, packer
 */

import { join, resolve } from "node:path";

import { TEMPLATE_FILE } from "./constants.js";

/**
 * Supported image kinds.
 *
 * The value is also the template subdirectory: packer/<kind>/packer.json.
 */
export enum BuildKind {
  OVA = "ova", // vSphere appliance (VMDK + OVF)
  AMI = "ami", // Amazon machine image
}

/** Declaration order: every aggregate visits OVA names before AMI names. */
export const BUILD_KIND_ORDER: readonly BuildKind[] = [BuildKind.OVA, BuildKind.AMI];

export const BUILD_KIND_INFO: Record<BuildKind, { description: string }> = {
  [BuildKind.OVA]: { description: "vSphere OVA" },
  [BuildKind.AMI]: { description: "Amazon AMI" },
};

/** The build matrix: ordered names per kind. */
export type BuildRegistry = Readonly<Record<BuildKind, readonly string[]>>;

/**
 * One build name with its kind.
 *
 * Everything derived from a name (targets, paths, globs) carries this
 * value instead of re-deriving the name from a target id.
 */
export interface RegistryEntry {
  readonly kind: BuildKind;
  readonly name: string;
}

export function createRegistry(ova: readonly string[], ami: readonly string[]): BuildRegistry {
  return {
    [BuildKind.OVA]: [...ova],
    [BuildKind.AMI]: [...ami],
  };
}

/**
 * Flatten the registry in declaration order (OVA first, each list as given).
 */
export function registryEntries(registry: BuildRegistry): RegistryEntry[] {
  const entries: RegistryEntry[] = [];
  for (const kind of BUILD_KIND_ORDER) {
    for (const name of registry[kind]) {
      entries.push({ kind, name });
    }
  }
  return entries;
}

/**
 * Absolute path of the per-name var file: <root>/<templateDir>/<kind>/<name>.json
 */
export function configFilePath(rootDir: string, templateDir: string, entry: RegistryEntry): string {
  return resolve(rootDir, templateDir, entry.kind, `${entry.name}.json`);
}

/**
 * Per-kind packer template, relative to the build root: <templateDir>/<kind>/packer.json
 */
export function templatePath(templateDir: string, kind: BuildKind): string {
  return join(templateDir, kind, TEMPLATE_FILE);
}
