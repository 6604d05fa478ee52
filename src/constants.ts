/**
 * Constants module for kube-image-builder.
 *
 * Default build matrix, directory layout and environment variable names (SSOT).
 */

import { readFileSync } from "node:fs";

// === Version (SSOT: package.json) ===
function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const VERSION: string = readVersion();

// === Build matrix defaults ===
// Each name must have a matching "<templateDir>/<kind>/<name>.json".
export const DEFAULT_OVA_BUILD_NAMES: readonly string[] = ["ova-centos-7", "ova-ubuntu-1804"];
export const DEFAULT_AMI_BUILD_NAMES: readonly string[] = ["ami-default"];

// Shared var files given to every build, in override order (later wins inside packer).
export const DEFAULT_VAR_FILES: readonly string[] = [
  "packer/config/kubernetes.json",
  "packer/config/cni.json",
  "packer/config/containerd.json",
];

// === Layout (relative to the build root) ===
export const DEFAULT_TEMPLATE_DIR = "packer";
export const DEFAULT_OUTPUT_DIR = "output";
export const TEMPLATE_FILE = "packer.json";

// === External tools ===
export const DEFAULT_PACKER_BIN = "packer";
export const VDISKMANAGER_BIN = "vmware-vdiskmanager";
// vmware-vdiskmanager -t 5: compressed, stream-optimized disk
export const VDISK_STREAM_OPTIMIZED = "5";

// === Target naming ===
export const BUILD_PREFIX = "build-";
export const CLEAN_PREFIX = "clean-";

// === OVA packaging ===
export const PACKER_MANIFEST_FILE = "packer-manifest.json";

// === Environment variables (SSOT for names) ===
export const ENV = {
  OVA_BUILD_NAMES: "OVA_BUILD_NAMES",
  AMI_BUILD_NAMES: "AMI_BUILD_NAMES",
  VAR_FILES: "KUBE_JSON",
  PACKER_FLAGS: "PACKER_FLAGS",
  PACKER_BIN: "PACKER_BIN",
} as const;

// === Exit codes ===
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;
