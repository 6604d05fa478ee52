/**
 * Packer operations for kube-image-builder.
 *
 * Facade module that re-exports from specialized sub-modules:
 * - command-builder.ts: Flag assembly and `packer build` argument vectors
 * - executor.ts: Process runners (execa-backed, dry run)
 */

// Command builder
export {
  assembleVarFileFlags,
  varFileFlag,
  PackerBuildCommandBuilder,
} from "./command-builder.js";

// Executor
export {
  type Invocation,
  type ProcessRunner,
  type RunResult,
  ProcessExecutor,
  DryRunRunner,
  formatCommandLine,
  quoteArg,
  signalExitCode,
} from "./executor.js";
