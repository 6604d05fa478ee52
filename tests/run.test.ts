import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buildAll, cleanAll, runRequestedTargets } from "../src/commands/run.js";
import { mergeConfig, type CliOverrides, type ResolvedConfig } from "../src/config.js";
import { ValidationError } from "../src/errors.js";
import { LogLevel, setLogLevel } from "../src/logger.js";
import { RecordingRunner, failingOn } from "./mocks/process-mock.js";
import { makeBuildRoot, removeTempDir, writeFile } from "./mocks/fixtures.js";

let root: string;

function config(cli: CliOverrides = {}): ResolvedConfig {
  return mergeConfig(root, {}, {}, cli);
}

beforeEach(() => {
  root = makeBuildRoot({ ova: ["ova-centos-7", "ova-ubuntu-1804"], ami: ["ami-default"] });
  setLogLevel(LogLevel.SILENT);
});

afterEach(() => {
  removeTempDir(root);
  setLogLevel(LogLevel.INFO);
});

describe("buildAll", () => {
  it("runs one packer build per name, OVA before AMI", async () => {
    const runner = new RecordingRunner();

    const summary = await buildAll(config(), runner);

    expect(summary.exitCode).toBe(0);
    expect(runner.calls).toHaveLength(3);
    expect(runner.templates()).toEqual([
      join("packer", "ova", "packer.json"),
      join("packer", "ova", "packer.json"),
      join("packer", "ami", "packer.json"),
    ]);
    expect(runner.calls.map((call) => call.args[call.args.length - 2])).toEqual([
      `-var-file=${join(root, "packer/ova/ova-centos-7.json")}`,
      `-var-file=${join(root, "packer/ova/ova-ubuntu-1804.json")}`,
      `-var-file=${join(root, "packer/ami/ami-default.json")}`,
    ]);
    expect(runner.calls.every((call) => call.cwd === root)).toBe(true);
  });

  it("passes the default shared var files to every build", async () => {
    const runner = new RecordingRunner();

    await buildAll(config(), runner);

    for (const call of runner.calls) {
      expect(call.args.slice(0, 4)).toEqual([
        "build",
        `-var-file=${join(root, "packer/config/kubernetes.json")}`,
        `-var-file=${join(root, "packer/config/cni.json")}`,
        `-var-file=${join(root, "packer/config/containerd.json")}`,
      ]);
    }
  });

  it("stops at the first failing build", async () => {
    const runner = failingOn("/ova-centos-7.json");

    const summary = await buildAll(config(), runner);

    expect(summary.exitCode).toBe(1);
    expect(runner.calls).toHaveLength(1);
  });

  it("builds the rest with keepGoing", async () => {
    const runner = failingOn("/ova-centos-7.json");

    const summary = await buildAll(config({ keepGoing: true }), runner);

    expect(summary.exitCode).toBe(1);
    expect(runner.calls).toHaveLength(3);
  });

  it("does nothing for empty name lists", async () => {
    const runner = new RecordingRunner();

    const summary = await buildAll(config({ ova: [], ami: [] }), runner);

    expect(summary).toEqual({ exitCode: 0, outcomes: [] });
    expect(runner.calls).toEqual([]);
  });
});

describe("cleanAll", () => {
  it("removes every name's outputs", async () => {
    writeFile(root, "output/ova-centos-7/disk.vmdk");
    writeFile(root, "output/ova-ubuntu-1804.ova", "x");
    writeFile(root, "output/ami-default-manifest.json");
    writeFile(root, "output/other/keep.txt");

    const summary = await cleanAll(config(), new RecordingRunner());

    expect(summary.exitCode).toBe(0);
    expect(summary.outcomes.map((outcome) => outcome.removed?.length)).toEqual([1, 1, 1]);
    expect(readdirSync(join(root, "output"))).toEqual(["other"]);
  });

  it("succeeds when there is no output directory", async () => {
    const summary = await cleanAll(config(), new RecordingRunner());

    expect(summary.exitCode).toBe(0);
    expect(existsSync(join(root, "output"))).toBe(false);
  });
});

describe("runRequestedTargets", () => {
  it("defaults to build", async () => {
    const runner = new RecordingRunner();

    await runRequestedTargets(config(), [], runner);

    expect(runner.calls).toHaveLength(3);
  });

  it("runs a single named target", async () => {
    const runner = new RecordingRunner();

    const summary = await runRequestedTargets(config(), ["build-ami-default"], runner);

    expect(summary.outcomes.map((outcome) => outcome.id)).toEqual(["build-ami-default"]);
    expect(runner.calls).toHaveLength(1);
  });

  it("refuses to run anything when a requested target has a configuration error", async () => {
    const runner = new RecordingRunner();

    const summary = await runRequestedTargets(config({ ova: ["ova-centos-7", "ova-photon-3"] }), ["build"], runner);

    expect(summary).toEqual({ exitCode: 2, outcomes: [] });
    expect(runner.calls).toEqual([]);
  });

  it("runs healthy targets when the broken one is not requested", async () => {
    const runner = new RecordingRunner();

    const summary = await runRequestedTargets(
      config({ ova: ["ova-centos-7", "ova-photon-3"] }),
      ["build-ova-centos-7", "clean-ova-photon-3"],
      runner
    );

    expect(summary.exitCode).toBe(0);
    expect(runner.calls).toHaveLength(1);
  });

  it("rejects an unknown target", async () => {
    await expect(runRequestedTargets(config(), ["build-nope"], new RecordingRunner())).rejects.toThrow(
      ValidationError
    );
  });
});
