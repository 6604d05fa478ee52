/**
 * Console output for kube-image-builder.
 *
 * Every message this tool prints goes through `log`. Output of the external
 * tools it runs (packer, vmware-vdiskmanager) is inherited by the child
 * process and never passes through here.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LoggerConfig {
  level: LogLevel;
  /** Prefix messages with [image-builder] */
  prefix: boolean;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: false,
};

function canOutput(level: LogLevel): boolean {
  return config.level <= level;
}

function format(message: string): string {
  return config.prefix ? `[image-builder] ${message}` : message;
}

/** Silence everything; only the exit code reports the outcome. */
export function enableQuietMode(): void {
  config.level = LogLevel.SILENT;
}

/** Show debug messages (resolved config, full command lines, stack traces). */
export function enableVerboseMode(): void {
  config.level = LogLevel.DEBUG;
}

export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

export function getLogLevel(): LogLevel {
  return config.level;
}

/**
 * Enable or disable the [image-builder] prefix.
 *
 * Useful when our lines are interleaved with packer's own output in CI logs.
 */
export function setPrefix(enabled: boolean): void {
  config.prefix = enabled;
}

/**
 * Level-aware logger.
 *
 *   log.debug("resolved config")
 *   log.info("normal output")
 *   log.warn("warning")         (stderr)
 *   log.error("failure")        (stderr)
 *   log.success("done")
 */
export const log = {
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.log(pc.dim(format(message)));
    }
  },

  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(format(message));
    }
  },

  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(format(message)));
    }
  },

  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(format(message)));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.green(format(message)));
    }
  },

  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.dim(format(message)));
    }
  },

  bold(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.bold(format(message)));
    }
  },

  /** Unstyled and unprefixed, for pre-composed `style` strings. */
  raw(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },

  newline(): void {
    if (canOutput(LogLevel.INFO)) {
      console.log();
    }
  },
};

/**
 * Styled string builders for composed lines.
 *
 *   log.raw(`${style.cyan("build-ami-default")}  ${style.dim("ami")}`)
 */
export const style = {
  dim: (text: string) => pc.dim(text),
  bold: (text: string) => pc.bold(text),
  red: (text: string) => pc.red(text),
  green: (text: string) => pc.green(text),
  yellow: (text: string) => pc.yellow(text),
  cyan: (text: string) => pc.cyan(text),
};
