#!/usr/bin/env node
/**
 * CLI entry point for kube-image-builder.
 *
 * Commander.js-based CLI. The root command takes target ids like make does:
 *
 *   kube-image-builder                     # same as `build`
 *   kube-image-builder build-ova-centos-7 clean-ami-default
 *   kube-image-builder -k build            # keep going after a failure
 *   kube-image-builder targets             # list targets
 *   kube-image-builder package-ova output/ova-centos-7
 */

import { resolve } from "node:path";

import { Command } from "commander";

import { resolveConfig, type CliOverrides, type ResolvedConfig } from "./config.js";
import { EXIT_CONFIG_ERROR, VERSION } from "./constants.js";
import { ValidationError } from "./errors.js";
import { exitCodeForError, reportError } from "./error-handler.js";
import { enableQuietMode, enableVerboseMode, log, setPrefix } from "./logger.js";
import { listTargets } from "./commands/list.js";
import { runRequestedTargets } from "./commands/run.js";
import { packageOva } from "./ova/index.js";
import { DryRunRunner, ProcessExecutor, type ProcessRunner } from "./packer/index.js";
import { parseNameList } from "./validation.js";

interface GlobalOptions {
  chdir?: string;
  ova?: string[];
  ami?: string[];
  varFile?: string[];
  packerFlags?: string;
  packer?: string;
  templateDir?: string;
  outputDir?: string;
  keepGoing?: boolean;
  dryRun?: boolean;
  strict?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  prefix?: boolean;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function collectNames(value: string, previous: string[] = []): string[] {
  return [...previous, ...parseNameList(value)];
}

function toOverrides(options: GlobalOptions): CliOverrides {
  return {
    ova: options.ova,
    ami: options.ami,
    varFiles: options.varFile,
    packerFlags: options.packerFlags,
    packer: options.packer,
    templateDir: options.templateDir,
    outputDir: options.outputDir,
    keepGoing: options.keepGoing,
    strict: options.strict,
    dryRun: options.dryRun,
  };
}

function loadConfig(options: GlobalOptions): ResolvedConfig {
  const config = resolveConfig(resolve(options.chdir ?? "."), toOverrides(options));
  log.debug(`Build root: ${config.rootDir}`);
  log.debug(`OVA builds: ${config.registry.ova.join(" ") || "(none)"}`);
  log.debug(`AMI builds: ${config.registry.ami.join(" ") || "(none)"}`);
  log.debug(`Var files: ${config.varFiles.join(" ") || "(none)"}`);
  return config;
}

function createRunner(dryRun: boolean): ProcessRunner {
  return dryRun ? new DryRunRunner() : new ProcessExecutor();
}

/** Run a command action, turning errors into a message and an exit code. */
async function guarded(action: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await action();
  } catch (error: unknown) {
    reportError(error);
    process.exitCode = exitCodeForError(error);
  }
}

// Build the CLI program
const program = new Command();

program
  .name("kube-image-builder")
  .description("Build Kubernetes node images (OVA, AMI) with packer")
  .version(VERSION)
  .argument("[targets...]", "Targets to run: build, clean, all, build-<name>, clean-<name>")
  .option("-C, --chdir <dir>", "Build root containing packer/ and output/ (like make -C)")
  .option("--ova <names>", "OVA build names, space or comma separated (repeatable)", collectNames)
  .option("--ami <names>", "AMI build names, space or comma separated (repeatable)", collectNames)
  .option("--var-file <path>", "Shared packer var file (repeatable, replaces the defaults)", collect)
  .option("--packer-flags <flags>", "Extra flags for packer build, shell-quoted")
  .option("--packer <path>", "packer executable")
  .option("--template-dir <dir>", "Template directory, relative to the build root")
  .option("--output-dir <dir>", "Output directory, relative to the build root")
  .option("-k, --keep-going", "Run every requested target even after a failure")
  .option("-n, --dry-run", "Print commands instead of running them")
  .option("--strict", "Check shared var files before running anything")
  .option("--prefix", "Prefix messages with [image-builder]")
  .option("-v, --verbose", "Show resolved configuration and full command lines")
  .option("-q, --quiet", "Suppress all output (exit code only)")
  .hook("preAction", (thisCommand) => {
    // Apply output modes before any command runs
    const opts = thisCommand.opts<GlobalOptions>();
    if (opts.quiet) {
      enableQuietMode();
    } else if (opts.verbose) {
      enableVerboseMode();
    }
    if (opts.prefix) {
      setPrefix(true);
    }
  })
  .action(async (targets: string[], options: GlobalOptions) => {
    await guarded(async () => {
      const config = loadConfig(options);
      const summary = await runRequestedTargets(config, targets, createRunner(config.dryRun));
      return summary.exitCode;
    });
  });

// Targets command
program
  .command("targets")
  .description("List every target the configuration expands to")
  .action(async (_options: unknown, command: Command) => {
    await guarded(async () => {
      const errors = listTargets(loadConfig(command.optsWithGlobals<GlobalOptions>()));
      return errors > 0 ? EXIT_CONFIG_ERROR : 0;
    });
  });

// OVA packaging command
program
  .command("package-ova")
  .description("Package a finished OVA build directory as <name>.ova")
  .argument("<buildDir>", "Directory holding packer-manifest.json and the VMDK")
  .action(async (buildDir: string, _options: unknown, command: Command) => {
    await guarded(async () => {
      const options = command.optsWithGlobals<GlobalOptions>();
      if (options.dryRun) {
        throw new ValidationError("package-ova does not support --dry-run");
      }
      const root = resolve(options.chdir ?? ".");
      const result = await packageOva(resolve(root, buildDir), new ProcessExecutor());
      log.dim(`sha256 ${result.sha256}`);
      return 0;
    });
  });

// Parse and run (async for proper error handling in async actions)
await program.parseAsync();
