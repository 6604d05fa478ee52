/**
 * Configuration resolution for kube-image-builder.
 *
 * Precedence (later wins): defaults < config file < environment < CLI flags.
 * Lists are replaced whole at each layer, never merged.
 *
 * Dependency direction:
 *   This module imports from: config-file.ts, constants.ts, registry.ts, validation.ts
 *   It should NOT import from: cli, commands
 */

import { resolve } from "node:path";

import { loadFileConfig, type ImageBuilderFileConfig } from "./config-file.js";
import {
  DEFAULT_AMI_BUILD_NAMES,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_OVA_BUILD_NAMES,
  DEFAULT_PACKER_BIN,
  DEFAULT_TEMPLATE_DIR,
  DEFAULT_VAR_FILES,
  ENV,
} from "./constants.js";
import { createRegistry, type BuildRegistry } from "./registry.js";
import type { ExpandOptions } from "./targets.js";
import { parseFlagString, parseNameList } from "./validation.js";

/** Values given on the command line. Undefined means "not given". */
export interface CliOverrides {
  ova?: string[];
  ami?: string[];
  varFiles?: string[];
  packerFlags?: string;
  packer?: string;
  templateDir?: string;
  outputDir?: string;
  keepGoing?: boolean;
  strict?: boolean;
  dryRun?: boolean;
}

export interface ResolvedConfig {
  /** Absolute build root. */
  rootDir: string;
  registry: BuildRegistry;
  varFiles: string[];
  /** Extra packer flags as argv tokens. */
  packerFlags: string[];
  packerBin: string;
  templateDir: string;
  outputDir: string;
  keepGoing: boolean;
  strictVarFiles: boolean;
  dryRun: boolean;
}

type Env = Readonly<Record<string, string | undefined>>;

function envList(env: Env, name: string): string[] | undefined {
  const value = env[name];
  return value === undefined ? undefined : parseNameList(value);
}

/**
 * Merge the layers into a resolved configuration.
 *
 * @throws ValidationError when a packer flag string cannot be tokenized.
 */
export function mergeConfig(
  rootDir: string,
  file: ImageBuilderFileConfig,
  env: Env,
  cli: CliOverrides
): ResolvedConfig {
  const ova = cli.ova ?? envList(env, ENV.OVA_BUILD_NAMES) ?? file.ovaBuildNames ?? DEFAULT_OVA_BUILD_NAMES;
  const ami = cli.ami ?? envList(env, ENV.AMI_BUILD_NAMES) ?? file.amiBuildNames ?? DEFAULT_AMI_BUILD_NAMES;
  const varFiles = cli.varFiles ?? envList(env, ENV.VAR_FILES) ?? file.varFiles ?? DEFAULT_VAR_FILES;
  const packerFlags = cli.packerFlags ?? env[ENV.PACKER_FLAGS] ?? file.packerFlags ?? "";

  return {
    rootDir: resolve(rootDir),
    registry: createRegistry(ova, ami),
    varFiles: [...varFiles],
    packerFlags: parseFlagString(packerFlags),
    packerBin: cli.packer ?? env[ENV.PACKER_BIN] ?? file.packer ?? DEFAULT_PACKER_BIN,
    templateDir: cli.templateDir ?? file.templateDir ?? DEFAULT_TEMPLATE_DIR,
    outputDir: cli.outputDir ?? file.outputDir ?? DEFAULT_OUTPUT_DIR,
    keepGoing: cli.keepGoing ?? file.keepGoing ?? false,
    strictVarFiles: cli.strict ?? file.strictVarFiles ?? false,
    dryRun: cli.dryRun ?? false,
  };
}

/**
 * Load the config file from rootDir and resolve every layer.
 */
export function resolveConfig(rootDir: string, cli: CliOverrides = {}, env: Env = process.env): ResolvedConfig {
  return mergeConfig(rootDir, loadFileConfig(rootDir), env, cli);
}

/** Target expansion input for a resolved configuration. */
export function toExpandOptions(config: ResolvedConfig): ExpandOptions {
  return {
    rootDir: config.rootDir,
    registry: config.registry,
    varFiles: config.varFiles,
    packerFlags: config.packerFlags,
    packerBin: config.packerBin,
    templateDir: config.templateDir,
    outputDir: config.outputDir,
    strictVarFiles: config.strictVarFiles,
  };
}
