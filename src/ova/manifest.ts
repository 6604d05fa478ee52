/**
 * packer-manifest.json reading for OVA packaging.
 *
 * Packer's manifest post-processor writes one entry per build. Only the
 * first build is packaged; its custom_data carries the values rendered
 * into the OVF descriptor.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";

import { PACKER_MANIFEST_FILE } from "../constants.js";
import { ManifestError, extractErrorDetails } from "../errors.js";

export interface ManifestFile {
  readonly name: string;
  readonly size: number;
}

/** custom_data keys the OVF descriptor needs, as packer writes them. */
export const REQUIRED_CUSTOM_DATA = [
  "build_date",
  "build_timestamp",
  "capi_version",
  "kubernetes_cni_semver",
  "os_name",
  "iso_checksum",
  "iso_checksum_type",
  "iso_url",
  "kubernetes_semver",
  "kubernetes_source_type",
] as const;

export type CustomDataKey = (typeof REQUIRED_CUSTOM_DATA)[number];

export interface ManifestBuild {
  readonly name: string;
  readonly artifactId: string;
  readonly files: readonly ManifestFile[];
  readonly customData: Readonly<Record<CustomDataKey, string>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== "string" || value === "") {
    throw new ManifestError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function parseFile(value: unknown, index: number): ManifestFile {
  const where = `builds[0].files[${index}]`;
  if (!isRecord(value)) {
    throw new ManifestError(`${where} must be an object`);
  }
  const size = value.size;
  if (typeof size !== "number" || !Number.isFinite(size) || size < 0) {
    throw new ManifestError(`${where}.size must be a non-negative number`);
  }
  return { name: requireString(value, "name", where), size };
}

/**
 * Validate a parsed manifest and return its first build.
 *
 * @throws ManifestError naming the first missing or invalid field.
 */
export function parseManifest(data: unknown): ManifestBuild {
  if (!isRecord(data) || !Array.isArray(data.builds)) {
    throw new ManifestError("manifest must contain a 'builds' array");
  }
  const build: unknown = data.builds[0];
  if (!isRecord(build)) {
    throw new ManifestError("manifest has no builds");
  }

  const name = requireString(build, "name", "builds[0]");
  const artifactId = requireString(build, "artifact_id", "builds[0]");

  if (!Array.isArray(build.files)) {
    throw new ManifestError("builds[0].files must be an array");
  }
  const files = build.files.map((file: unknown, index: number) => parseFile(file, index));

  const rawCustomData = build.custom_data;
  if (!isRecord(rawCustomData)) {
    throw new ManifestError("builds[0].custom_data must be an object");
  }
  const field = (key: CustomDataKey): string => requireString(rawCustomData, key, "builds[0].custom_data");
  const customData: Record<CustomDataKey, string> = {
    build_date: field("build_date"),
    build_timestamp: field("build_timestamp"),
    capi_version: field("capi_version"),
    kubernetes_cni_semver: field("kubernetes_cni_semver"),
    os_name: field("os_name"),
    iso_checksum: field("iso_checksum"),
    iso_checksum_type: field("iso_checksum_type"),
    iso_url: field("iso_url"),
    kubernetes_semver: field("kubernetes_semver"),
    kubernetes_source_type: field("kubernetes_source_type"),
  };

  return { name, artifactId, files, customData };
}

/**
 * Read and validate <buildDir>/packer-manifest.json.
 */
export function loadManifest(buildDir: string): ManifestBuild {
  const path = join(buildDir, PACKER_MANIFEST_FILE);
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (e: unknown) {
    throw new ManifestError(`Cannot read ${path}: ${extractErrorDetails(e)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e: unknown) {
    throw new ManifestError(`Invalid JSON in ${path}: ${extractErrorDetails(e)}`);
  }
  return parseManifest(data);
}

/** Files of the build that are VMDK disks, in manifest order. */
export function vmdkFiles(build: ManifestBuild): ManifestFile[] {
  return build.files.filter((file) => file.name.endsWith(".vmdk"));
}
