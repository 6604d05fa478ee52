/**
 * OVF descriptor rendering.
 *
 * The descriptor lives in templates/ovf.xml with `${KEY}` placeholders.
 */

import { readFileSync, writeFileSync } from "node:fs";

import { TemplateError } from "../errors.js";
import { log } from "../logger.js";
import type { ManifestBuild } from "./manifest.js";

export const OVF_TEMPLATE_URL = new URL("../../templates/ovf.xml", import.meta.url);

const PLACEHOLDER = /\$(?:(\$)|\{([_A-Za-z][_A-Za-z0-9]*)\}|([_A-Za-z][_A-Za-z0-9]*))?/g;

/**
 * Substitute `${KEY}` and `$KEY` placeholders; `$$` renders a literal `$`.
 *
 * @throws TemplateError for a key without a value or a `$` that starts no placeholder.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  let out = "";
  let last = 0;

  for (const match of template.matchAll(PLACEHOLDER)) {
    const index = match.index ?? 0;
    out += template.slice(last, index);
    last = index + match[0].length;

    if (match[1] !== undefined) {
      out += "$";
      continue;
    }
    const key = match[2] ?? match[3];
    if (key === undefined) {
      throw new TemplateError(`Invalid placeholder at offset ${index}`);
    }
    const value = values[key];
    if (value === undefined) {
      throw new TemplateError(`No value for placeholder '${key}'`);
    }
    out += value;
  }

  return out + template.slice(last);
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** The packaged disk, measured after stream optimization. */
export interface PackagedDisk {
  /** Stream-optimized file name as stored in the OVA. */
  name: string;
  /** Size of the source VMDK as recorded in the manifest. */
  populated: number;
  /** Size of the stream-optimized VMDK on disk. */
  stream: number;
}

/** Placeholder values for a build, XML-escaped. */
export function ovfValues(build: ManifestBuild, disk: PackagedDisk): Record<string, string> {
  const data = build.customData;
  const values: Record<string, string> = {
    BUILD_DATE: data.build_date,
    BUILD_NAME: build.name,
    ARTIFACT_ID: build.artifactId,
    BUILD_TIMESTAMP: data.build_timestamp,
    CAPI_VERSION: data.capi_version,
    CNI_VERSION: data.kubernetes_cni_semver,
    OS_NAME: data.os_name,
    ISO_CHECKSUM: data.iso_checksum,
    ISO_CHECKSUM_TYPE: data.iso_checksum_type,
    ISO_URL: data.iso_url,
    KUBERNETES_SEMVER: data.kubernetes_semver,
    KUBERNETES_SOURCE_TYPE: data.kubernetes_source_type,
    POPULATED_DISK_SIZE: String(disk.populated),
    STREAM_DISK_NAME: disk.name,
    STREAM_DISK_SIZE: String(disk.stream),
  };
  return Object.fromEntries(Object.entries(values).map(([key, value]) => [key, escapeXml(value)]));
}

export function loadOvfTemplate(): string {
  return readFileSync(OVF_TEMPLATE_URL, "utf-8");
}

/**
 * Render and write the OVF descriptor.
 */
export function createOvf(path: string, values: Readonly<Record<string, string>>, template = loadOvfTemplate()): void {
  log.info(`create ovf ${path}`);
  writeFileSync(path, renderTemplate(template, values), "utf-8");
}
