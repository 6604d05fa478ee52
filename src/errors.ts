/**
 * Unified exception hierarchy for kube-image-builder.
 *
 * All custom exceptions inherit from ImageBuilderError for consistent error handling.
 * The CLI catches these and converts them to one-line messages.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other modules.
 *   It should NOT import from any other module.
 */

/**
 * Base exception for all kube-image-builder errors.
 */
export class ImageBuilderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ImageBuilderError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - A build name without its configuration file
 *   - Two build names colliding after target prefixing
 *   - A config file value of the wrong type
 */
export class ConfigError extends ImageBuilderError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - Unknown target id
 *   - Malformed packer flag string
 *   - Invalid build name
 */
export class ValidationError extends ImageBuilderError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Raised when an external tool (packer, vmware-vdiskmanager) is not
 * installed or not in PATH.
 */
export class ToolNotFoundError extends ImageBuilderError {
  readonly command: string;

  constructor(command: string) {
    super(`${command} not found in PATH`);
    this.name = "ToolNotFoundError";
    this.command = command;
  }
}

/** Raised when a helper tool (e.g. vmware-vdiskmanager) exits non-zero. */
export class ExternalToolError extends ImageBuilderError {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = "ExternalToolError";
    this.exitCode = exitCode;
  }
}

/** Raised when output artifacts cannot be removed. */
export class CleanupError extends ImageBuilderError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "CleanupError";
    this.path = path;
  }
}

/** Raised when the OVA archive cannot be written completely. */
export class ArchiveError extends ImageBuilderError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "ArchiveError";
    this.path = path;
  }
}

/** Raised when packer-manifest.json is missing, unreadable or incomplete. */
export class ManifestError extends ImageBuilderError {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

/** Raised when a template references a value that was not supplied. */
export class TemplateError extends ImageBuilderError {
  constructor(message: string) {
    super(message);
    this.name = "TemplateError";
  }
}

/**
 * Extract a human-readable message from an unknown error.
 *
 * Prefers execa's `shortMessage` over the full message, which repeats the
 * whole command line. Truncates to maxLength.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }

  if ("shortMessage" in error && typeof error.shortMessage === "string" && error.shortMessage) {
    return error.shortMessage.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}
