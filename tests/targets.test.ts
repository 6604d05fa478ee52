import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { ValidationError } from "../src/errors.js";
import { createRegistry } from "../src/registry.js";
import {
  collectTargetErrors,
  expandTargets,
  resolveTargetIds,
  selectTargets,
  type BuildTarget,
  type ExpandOptions,
  type TargetPlan,
} from "../src/targets.js";
import { makeBuildRoot, removeTempDir, writeFile } from "./mocks/fixtures.js";

let root = "";

afterEach(() => {
  if (root) {
    removeTempDir(root);
    root = "";
  }
});

function options(overrides: Partial<ExpandOptions> = {}): ExpandOptions {
  return {
    rootDir: root,
    registry: createRegistry(["ova-centos-7", "ova-ubuntu-1804"], ["ami-default"]),
    varFiles: ["packer/config/kubernetes.json", "packer/config/cni.json"],
    packerFlags: [],
    packerBin: "packer",
    templateDir: "packer",
    outputDir: "output",
    ...overrides,
  };
}

function buildTarget(plan: TargetPlan, id: string): BuildTarget {
  const target = plan.targets.get(id);
  if (target?.type !== "build") {
    throw new Error(`no build target ${id}`);
  }
  return target;
}

describe("expandTargets", () => {
  it("creates a build and a clean target per name, OVA first", () => {
    root = makeBuildRoot({ ova: ["ova-centos-7", "ova-ubuntu-1804"], ami: ["ami-default"] });
    const plan = expandTargets(options());

    expect(plan.buildIds).toEqual(["build-ova-centos-7", "build-ova-ubuntu-1804", "build-ami-default"]);
    expect(plan.cleanIds).toEqual(["clean-ova-centos-7", "clean-ova-ubuntu-1804", "clean-ami-default"]);
    expect(plan.errors.size).toBe(0);
  });

  it("runs packer build with shared var files, extra flags, the name's config and the kind template", () => {
    root = makeBuildRoot({ ova: ["ova-centos-7"] });
    const plan = expandTargets(
      options({ registry: createRegistry(["ova-centos-7"], []), packerFlags: ["-force"] })
    );

    expect(buildTarget(plan, "build-ova-centos-7").invocation).toEqual({
      command: "packer",
      args: [
        "build",
        `-var-file=${join(root, "packer/config/kubernetes.json")}`,
        `-var-file=${join(root, "packer/config/cni.json")}`,
        "-force",
        `-var-file=${join(root, "packer/ova/ova-centos-7.json")}`,
        join("packer", "ova", "packer.json"),
      ],
      cwd: root,
    });
  });

  it("gives every build the same shared flags", () => {
    root = makeBuildRoot({ ova: ["ova-centos-7", "ova-ubuntu-1804"], ami: ["ami-default"] });
    const plan = expandTargets(options({ packerFlags: ["-on-error=abort"] }));

    const shared = plan.buildIds.map((id) => buildTarget(plan, id).invocation.args.slice(1, 4));
    expect(new Set(shared.map((args) => args.join(" "))).size).toBe(1);
  });

  it("uses the AMI template for AMI names", () => {
    root = makeBuildRoot({ ami: ["ami-default"] });
    const plan = expandTargets(options({ registry: createRegistry([], ["ami-default"]), varFiles: [] }));

    expect(buildTarget(plan, "build-ami-default").invocation.args).toEqual([
      "build",
      `-var-file=${join(root, "packer/ami/ami-default.json")}`,
      join("packer", "ami", "packer.json"),
    ]);
  });

  it("uses the configured packer binary", () => {
    root = makeBuildRoot({ ami: ["ami-default"] });
    const plan = expandTargets(
      options({ registry: createRegistry([], ["ami-default"]), packerBin: "/opt/packer/bin/packer" })
    );

    expect(buildTarget(plan, "build-ami-default").invocation.command).toBe("/opt/packer/bin/packer");
  });

  it("derives the clean glob from the name", () => {
    root = makeBuildRoot({ ova: ["ova-centos-7"] });
    const plan = expandTargets(options({ registry: createRegistry(["ova-centos-7"], []) }));
    const clean = plan.targets.get("clean-ova-centos-7");

    expect(clean?.type).toBe("clean");
    if (clean?.type === "clean") {
      expect(clean.glob).toBe("output/ova-centos-7*");
      expect(clean.outputDir).toBe(join(root, "output"));
    }
  });

  it("produces no targets for an empty registry", () => {
    root = makeBuildRoot();
    const plan = expandTargets(options({ registry: createRegistry([], []) }));

    expect(plan.targets.size).toBe(0);
    expect(plan.buildIds).toEqual([]);
    expect(plan.cleanIds).toEqual([]);
  });

  it("records a missing config file against the build target only", () => {
    root = makeBuildRoot({ ova: ["ova-centos-7"] });
    const plan = expandTargets(options({ registry: createRegistry(["ova-centos-7", "ova-photon-3"], []) }));

    expect(plan.errors.get("build-ova-photon-3")?.map((error) => error.message)).toEqual([
      `Missing configuration for 'ova-photon-3': ${join(root, "packer/ova/ova-photon-3.json")}`,
    ]);
    expect(plan.targets.has("build-ova-photon-3")).toBe(false);
    expect(plan.targets.has("clean-ova-photon-3")).toBe(true);
    expect(plan.targets.has("build-ova-centos-7")).toBe(true);
  });

  it("puts a name declared for both kinds in error", () => {
    root = makeBuildRoot({ ova: ["shared"], ami: ["shared"] });
    const plan = expandTargets(options({ registry: createRegistry(["shared"], ["shared"]) }));

    expect(plan.targets.has("build-shared")).toBe(false);
    expect(plan.targets.has("clean-shared")).toBe(false);
    expect(plan.buildIds).toEqual(["build-shared"]);
    expect(plan.errors.get("build-shared")?.[0]?.message).toBe(
      "Build name 'shared' is declared more than once (ova, ami)"
    );
  });

  it("rejects names that cannot be file names", () => {
    root = makeBuildRoot();
    const plan = expandTargets(options({ registry: createRegistry(["../up"], []) }));

    expect(plan.errors.get("build-../up")?.[0]?.message).toBe("Invalid build name '../up' in ova build names");
    expect(plan.errors.get("clean-../up")).toHaveLength(1);
    expect(plan.targets.size).toBe(0);
  });

  it("leaves missing shared var files to packer by default", () => {
    root = makeBuildRoot({ ami: ["ami-default"] });
    const plan = expandTargets(options({ registry: createRegistry([], ["ami-default"]) }));

    expect(plan.errors.size).toBe(0);
  });

  it("reports missing shared var files on every build in strict mode", () => {
    root = makeBuildRoot({ ova: ["ova-centos-7"], ami: ["ami-default"] });
    writeFile(root, "packer/config/kubernetes.json");
    const plan = expandTargets(
      options({ registry: createRegistry(["ova-centos-7"], ["ami-default"]), strictVarFiles: true })
    );

    const missing = `Missing var file: ${join(root, "packer/config/cni.json")}`;
    expect(plan.errors.get("build-ova-centos-7")?.map((error) => error.message)).toEqual([missing]);
    expect(plan.errors.get("build-ami-default")?.map((error) => error.message)).toEqual([missing]);
    expect(plan.errors.has("clean-ami-default")).toBe(false);
  });
});

describe("resolveTargetIds", () => {
  function plan(): TargetPlan {
    root = makeBuildRoot({ ova: ["ova-centos-7"], ami: ["ami-default"] });
    return expandTargets(options({ registry: createRegistry(["ova-centos-7"], ["ami-default"]) }));
  }

  it("expands build and all to every build target", () => {
    const p = plan();

    expect(resolveTargetIds(p, ["build"])).toEqual(["build-ova-centos-7", "build-ami-default"]);
    expect(resolveTargetIds(p, ["all"])).toEqual(["build-ova-centos-7", "build-ami-default"]);
  });

  it("expands clean to every clean target", () => {
    expect(resolveTargetIds(plan(), ["clean"])).toEqual(["clean-ova-centos-7", "clean-ami-default"]);
  });

  it("keeps request order and drops repeats", () => {
    const p = plan();

    expect(resolveTargetIds(p, ["clean-ami-default", "build", "build-ami-default"])).toEqual([
      "clean-ami-default",
      "build-ova-centos-7",
      "build-ami-default",
    ]);
  });

  it("rejects an unknown target and lists the valid ones", () => {
    const p = plan();

    expect(() => resolveTargetIds(p, ["build-ova-nope"])).toThrow(ValidationError);
    expect(() => resolveTargetIds(p, ["build-ova-nope"])).toThrow(
      "Unknown target 'build-ova-nope'. Valid targets: all, build, clean, build-ova-centos-7, build-ami-default, clean-ova-centos-7, clean-ami-default"
    );
  });

  it("resolves aggregates to nothing for an empty registry", () => {
    root = makeBuildRoot();
    const p = expandTargets(options({ registry: createRegistry([], []) }));

    expect(resolveTargetIds(p, ["build", "clean"])).toEqual([]);
  });
});

describe("collectTargetErrors and selectTargets", () => {
  it("reports a shared error once and selects only healthy targets", () => {
    root = makeBuildRoot({ ova: ["a"], ami: ["b"] });
    const p = expandTargets(
      options({ registry: createRegistry(["a"], ["b"]), varFiles: ["missing.json"], strictVarFiles: true })
    );
    const ids = resolveTargetIds(p, ["build", "clean"]);

    expect(collectTargetErrors(p, ids).map((error) => error.message)).toEqual([
      `Missing var file: ${join(root, "missing.json")}`,
    ]);
    expect(selectTargets(p, ids).map((target) => target.id)).toEqual(["clean-a", "clean-b"]);
  });
});
