/**
 * Packer command builder for kube-image-builder.
 *
 * Flag assembly for the shared var files, plus a fluent builder for the
 * `packer build` argument vector.
 *
 * Usage:
 *   const flags = assembleVarFileFlags(["packer/config/kubernetes.json"], "-force", root);
 *   const args = new PackerBuildCommandBuilder()
 *     .withFlags(flags)
 *     .withVarFile("/abs/packer/ova/ova-centos-7.json")
 *     .withTemplate("packer/ova/packer.json")
 *     .build();
 */

import { resolve } from "node:path";

import { parseFlagString } from "../validation.js";

/** Render one var file as a packer flag. */
export function varFileFlag(path: string): string {
  return `-var-file=${path}`;
}

/**
 * Assemble the flags shared by every build.
 *
 * Each var file is resolved against baseDir and emitted in input order,
 * followed by the pre-existing flags unchanged. Pre-existing flags come
 * last so they win ties inside packer. Paths are not checked here.
 *
 * @param varFiles - Shared var files, in override order.
 * @param existingFlags - Flags to append, as argv tokens or one shell-quoted string.
 * @param baseDir - Directory relative var-file paths are resolved against.
 */
export function assembleVarFileFlags(
  varFiles: readonly string[],
  existingFlags: readonly string[] | string = [],
  baseDir: string = process.cwd()
): string[] {
  const flags = varFiles.map((file) => varFileFlag(resolve(baseDir, file)));
  const extra = typeof existingFlags === "string" ? parseFlagString(existingFlags) : existingFlags;
  return [...flags, ...extra];
}

/**
 * Builder for `packer build` argument vectors.
 *
 * Produces a string[] without the binary name, ready for the executor.
 */
export class PackerBuildCommandBuilder {
  private readonly flags: string[] = [];
  private readonly varFiles: string[] = [];
  private template: string | null = null;

  /** Flags placed first (shared var files and user flags). */
  withFlags(flags: readonly string[]): this {
    this.flags.push(...flags);
    return this;
  }

  /** Var file placed after the shared flags. */
  withVarFile(path: string): this {
    this.varFiles.push(path);
    return this;
  }

  /** Template file, always the final argument. */
  withTemplate(path: string): this {
    this.template = path;
    return this;
  }

  build(): string[] {
    if (this.template === null) {
      throw new Error("PackerBuildCommandBuilder: template is required");
    }
    return ["build", ...this.flags, ...this.varFiles.map(varFileFlag), this.template];
  }
}
