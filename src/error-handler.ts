/**
 * Exit code diagnosis and error reporting for kube-image-builder.
 */

import { EXIT_CONFIG_ERROR, EXIT_FAILURE } from "./constants.js";
import { ConfigError, ImageBuilderError, ToolNotFoundError, ValidationError, extractErrorDetails } from "./errors.js";
import { log } from "./logger.js";

/** Known exit codes of external tools with their meanings and suggestions. */
export interface ExitCodeInfo {
  code: number;
  name: string;
  description: string;
  suggestion?: string;
  severity: "info" | "warn" | "error";
}

const EXIT_CODES: Record<number, ExitCodeInfo> = {
  0: {
    code: 0,
    name: "SUCCESS",
    description: "Exited successfully",
    severity: "info",
  },
  1: {
    code: 1,
    name: "GENERAL_ERROR",
    description: "Build failed",
    suggestion: "Scroll up for packer's error output; rerun with PACKER_LOG=1 for detail",
    severity: "error",
  },
  126: {
    code: 126,
    name: "NOT_EXECUTABLE",
    description: "Command not executable",
    suggestion: "Check file permissions (chmod +x)",
    severity: "error",
  },
  127: {
    code: 127,
    name: "NOT_FOUND",
    description: "Command not found",
    suggestion: "Install packer or point --packer / PACKER_BIN at it",
    severity: "error",
  },
  130: {
    code: 130,
    name: "SIGINT",
    description: "Interrupted by Ctrl+C",
    severity: "info",
  },
  137: {
    code: 137,
    name: "SIGKILL",
    description: "Killed (out of memory or manual stop)",
    severity: "warn",
  },
  143: {
    code: 143,
    name: "SIGTERM",
    description: "Terminated by signal",
    severity: "info",
  },
};

export function getExitCodeInfo(code: number): ExitCodeInfo {
  return (
    EXIT_CODES[code] ?? {
      code,
      name: "UNKNOWN",
      description: `Exited with code ${code}`,
      severity: "error" as const,
    }
  );
}

/**
 * Interrupted or terminated by the user (Ctrl+C, kill). Aggregates stop
 * launching targets after this, whatever the failure policy.
 */
export function isUserTermination(code: number): boolean {
  return code === 130 || code === 143;
}

export function isSuccess(code: number): boolean {
  return code === 0;
}

/**
 * Log a non-zero exit code with styling and a suggestion.
 */
export function logExitCode(code: number, context?: string): void {
  if (isSuccess(code)) {
    return;
  }

  const info = getExitCodeInfo(code);
  const contextStr = context ? `${context}: ` : "";

  if (isUserTermination(code)) {
    log.dim(`${contextStr}${info.description}`);
    return;
  }

  switch (info.severity) {
    case "error":
      log.error(`${contextStr}${info.description} (exit ${code})`);
      break;
    case "warn":
      log.warn(`${contextStr}${info.description} (exit ${code})`);
      break;
    default:
      log.dim(`${contextStr}${info.description}`);
  }

  if (info.suggestion) {
    log.dim(info.suggestion);
  }
}

/**
 * Report an error caught at the CLI boundary.
 *
 * Our own errors print their message only; anything else is unexpected
 * and gets its stack in verbose mode.
 */
export function reportError(error: unknown): void {
  if (error instanceof ImageBuilderError) {
    log.error(error.message);
    return;
  }

  const message = extractErrorDetails(error);
  log.error(`Unexpected error: ${message}`);
  if (error instanceof Error && error.stack) {
    log.debug(error.stack);
  }
}

/**
 * Process exit code for an error that ended a command.
 *
 *   ToolNotFoundError           -> 127 (like a shell)
 *   ConfigError/ValidationError -> 2
 *   anything else               -> 1
 */
export function exitCodeForError(error: unknown): number {
  if (error instanceof ToolNotFoundError) {
    return 127;
  }
  if (error instanceof ConfigError || error instanceof ValidationError) {
    return EXIT_CONFIG_ERROR;
  }
  return EXIT_FAILURE;
}
