import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ToolNotFoundError } from "../src/errors.js";
import { LogLevel, setLogLevel } from "../src/logger.js";
import {
  DryRunRunner,
  ProcessExecutor,
  formatCommandLine,
  quoteArg,
  signalExitCode,
} from "../src/packer/index.js";

beforeEach(() => {
  setLogLevel(LogLevel.SILENT);
});

afterEach(() => {
  setLogLevel(LogLevel.INFO);
});

describe("ProcessExecutor", () => {
  const executor = new ProcessExecutor();

  it("reports the child's exit code", async () => {
    const result = await executor.run({
      command: process.execPath,
      args: ["-e", "process.exit(3)"],
      cwd: process.cwd(),
    });

    expect(result).toEqual({ exitCode: 3 });
  });

  it("reports success", async () => {
    const result = await executor.run({ command: process.execPath, args: ["-e", ""], cwd: process.cwd() });

    expect(result.exitCode).toBe(0);
  });

  it("maps a signal to 128 + its number", async () => {
    const result = await executor.run({
      command: process.execPath,
      args: ["-e", "process.kill(process.pid, 'SIGTERM')"],
      cwd: process.cwd(),
    });

    expect(result).toEqual({ exitCode: 143, signal: "SIGTERM" });
  });

  it("throws ToolNotFoundError for a missing binary", async () => {
    await expect(
      executor.run({ command: "image-builder-no-such-tool", args: [], cwd: process.cwd() })
    ).rejects.toThrow(ToolNotFoundError);
  });

  it("forwards SIGINT to the running child", async () => {
    const run = executor.run({
      command: process.execPath,
      args: ["-e", "setTimeout(() => {}, 10000)"],
      cwd: process.cwd(),
    });
    await new Promise((resolve) => setTimeout(resolve, 200));

    process.emit("SIGINT", "SIGINT");

    await expect(run).resolves.toEqual({ exitCode: 130, signal: "SIGINT" });
  });

  it("does not leave signal handlers behind", async () => {
    const before = process.listenerCount("SIGINT");

    await executor.run({ command: process.execPath, args: ["-e", ""], cwd: process.cwd() });

    expect(process.listenerCount("SIGINT")).toBe(before);
  });
});

describe("DryRunRunner", () => {
  it("prints the command and reports success", async () => {
    setLogLevel(LogLevel.INFO);
    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const result = await new DryRunRunner().run({
      command: "packer",
      args: ["build", "-var", "a=b c", "packer/ova/packer.json"],
      cwd: "/build",
    });

    expect(result).toEqual({ exitCode: 0 });
    expect(out).toHaveBeenCalledWith("cd /build && packer build -var 'a=b c' packer/ova/packer.json");
  });
});

describe("command line formatting", () => {
  it("quotes only arguments that need it", () => {
    expect(quoteArg("-var-file=/a/b.json")).toBe("-var-file=/a/b.json");
    expect(quoteArg("it's")).toBe(`'it'\\''s'`);
    expect(quoteArg("")).toBe("''");
  });

  it("joins the command and its arguments", () => {
    expect(formatCommandLine("packer", ["build", "x y"])).toBe("packer build 'x y'");
  });

  it("maps signal names", () => {
    expect(signalExitCode("SIGINT")).toBe(130);
    expect(signalExitCode("SIGKILL")).toBe(137);
  });
});
