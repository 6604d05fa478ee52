/**
 * kube-image-builder - Build Kubernetes node images with packer.
 *
 * This is the main entry point for the kube-image-builder npm package.
 */

// Re-export main types and functions
export { VERSION } from "./constants.js";
export { BuildKind, createRegistry, registryEntries, type BuildRegistry, type RegistryEntry } from "./registry.js";
export { resolveConfig, mergeConfig, type CliOverrides, type ResolvedConfig } from "./config.js";
export { loadFileConfig, type ImageBuilderFileConfig } from "./config-file.js";
export {
  ImageBuilderError,
  ConfigError,
  ValidationError,
  ToolNotFoundError,
  ExternalToolError,
  CleanupError,
  ArchiveError,
  ManifestError,
  TemplateError,
} from "./errors.js";
export {
  expandTargets,
  resolveTargetIds,
  type BuildTarget,
  type CleanTarget,
  type Target,
  type TargetPlan,
} from "./targets.js";
export {
  assembleVarFileFlags,
  PackerBuildCommandBuilder,
  ProcessExecutor,
  DryRunRunner,
  type Invocation,
  type ProcessRunner,
  type RunResult,
} from "./packer/index.js";
export { runRequestedTargets, buildAll, cleanAll } from "./commands/run.js";
export { runTargets, type RunSummary, type TargetOutcome } from "./commands/run-targets.js";
export { cleanOutputs } from "./cleanup.js";
export { packageOva, type OvaResult } from "./ova/index.js";
