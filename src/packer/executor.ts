/**
 * External tool execution for kube-image-builder.
 *
 * Every packer and helper invocation flows through a ProcessRunner. The
 * default runner inherits stdio so the tool's own progress output reaches
 * the terminal untouched.
 */

import { constants } from "node:os";

import { execa, ExecaError } from "execa";

import { ToolNotFoundError } from "../errors.js";
import { log } from "../logger.js";

/** One external command, fully resolved. */
export interface Invocation {
  readonly command: string;
  readonly args: readonly string[];
  /** Working directory of the child. */
  readonly cwd: string;
  /** Extra environment, merged over process.env. */
  readonly env?: Readonly<Record<string, string>>;
}

export interface RunResult {
  exitCode: number;
  /** Set when the child was terminated by a signal. */
  signal?: string;
}

/**
 * Runs an invocation to completion. No retries: the first result is final.
 */
export interface ProcessRunner {
  run(invocation: Invocation): Promise<RunResult>;
}

const FORWARDED_SIGNALS = ["SIGINT", "SIGTERM"] as const;

/** Shell exit status for a signal: 128 + signal number. */
export function signalExitCode(signal: string): number {
  for (const [name, value] of Object.entries(constants.signals)) {
    if (name === signal) {
      return 128 + Number(value);
    }
  }
  return 128;
}

/** Single-quote an argument for display when the shell would split or expand it. */
export function quoteArg(arg: string): string {
  return arg === "" || /[\s'"\\$`*?]/.test(arg) ? `'${arg.replace(/'/g, "'\\''")}'` : arg;
}

/**
 * Render a command line for display (dry runs, debug logs).
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteArg).join(" ");
}

/**
 * Runner backed by execa.
 *
 * SIGINT/SIGTERM received while a child is running are forwarded to it.
 */
export class ProcessExecutor implements ProcessRunner {
  async run(invocation: Invocation): Promise<RunResult> {
    log.debug(`$ ${formatCommandLine(invocation.command, invocation.args)}  (cwd: ${invocation.cwd})`);

    const subprocess = execa(invocation.command, [...invocation.args], {
      cwd: invocation.cwd,
      env: invocation.env,
      stdio: "inherit",
      reject: false,
    });

    const handlers = FORWARDED_SIGNALS.map((signal) => {
      const forward = (): void => {
        log.debug(`Forwarding ${signal} to ${invocation.command}`);
        subprocess.kill(signal);
      };
      process.on(signal, forward);
      return { signal, forward };
    });

    try {
      const result = await subprocess;

      if (result instanceof ExecaError && result.code === "ENOENT") {
        throw new ToolNotFoundError(invocation.command);
      }
      if (result.signal !== undefined) {
        return { exitCode: signalExitCode(result.signal), signal: result.signal };
      }
      return { exitCode: result.exitCode ?? 1 };
    } finally {
      for (const { signal, forward } of handlers) {
        process.off(signal, forward);
      }
    }
  }
}

/**
 * Runner that prints what would run and reports success.
 */
export class DryRunRunner implements ProcessRunner {
  async run(invocation: Invocation): Promise<RunResult> {
    log.raw(`cd ${quoteArg(invocation.cwd)} && ${formatCommandLine(invocation.command, invocation.args)}`);
    return { exitCode: 0 };
  }
}
