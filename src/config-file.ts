/**
 * Configuration file support for kube-image-builder.
 *
 * Loads settings from the build root:
 *   1. ./image-builder.yaml
 *   2. ./image-builder.yml
 *   3. ./.imagebuilderrc
 * The first file found wins; files are not merged.
 *
 * Format (YAML subset):
 *   ovaBuildNames: ova-centos-7 ova-ubuntu-1804
 *   amiBuildNames:
 *     - ami-default
 *   varFiles: [packer/config/kubernetes.json, packer/config/cni.json]
 *   packerFlags: -force -var 'region=us-east-1'
 *   keepGoing: true
 *
 * Dependency direction:
 *   This module imports from: errors.ts, logger.ts, validation.ts
 *   It should NOT import from: cli, commands, packer
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { ConfigError, extractErrorDetails } from "./errors.js";
import { log } from "./logger.js";
import { parseNameList } from "./validation.js";

/**
 * Settings a config file may carry.
 * All fields are optional; environment and CLI flags take precedence.
 */
export interface ImageBuilderFileConfig {
  // Build matrix
  ovaBuildNames?: string[];
  amiBuildNames?: string[];

  // Packer
  varFiles?: string[];
  packerFlags?: string;
  packer?: string;

  // Layout
  templateDir?: string;
  outputDir?: string;

  // Behavior
  keepGoing?: boolean;
  strictVarFiles?: boolean;
}

export const CONFIG_FILES = ["image-builder.yaml", "image-builder.yml", ".imagebuilderrc"];

type ConfigValue = string | boolean | string[];

const LIST_KEYS = new Set(["ovaBuildNames", "amiBuildNames", "varFiles"]);
const STRING_KEYS = new Set(["packerFlags", "packer", "templateDir", "outputDir"]);
const BOOLEAN_KEYS = new Set(["keepGoing", "strictVarFiles"]);

function unquote(value: string): string {
  const trimmed = value.trim();
  const first = trimmed.charAt(0);
  if (trimmed.length >= 2 && (first === '"' || first === "'") && trimmed.endsWith(first)) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/** Drop a trailing ` # comment` outside quotes. */
function stripComment(line: string): string {
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (quote) {
      if (ch === quote) {quote = null;}
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "#" && (i === 0 || /\s/.test(line.charAt(i - 1)))) {
      return line.slice(0, i).trimEnd();
    }
  }
  return line;
}

/**
 * Parse the YAML subset above into raw values.
 *
 * Scalars stay strings except `true`/`false`. A key with an empty value
 * followed by `- item` lines is a list; `[a, b]` is an inline list.
 *
 * @throws ConfigError on a line that is neither `key: value` nor a list item.
 */
export function parseConfigText(content: string, source = "config"): Record<string, ConfigValue> {
  const result: Record<string, ConfigValue> = {};
  let listKey: string | null = null;
  let lineNo = 0;

  for (const rawLine of content.split(/\r?\n/)) {
    lineNo++;
    const line = stripComment(rawLine);
    const trimmed = line.trim();
    if (trimmed === "" || trimmed === "---") {
      continue;
    }

    const item = trimmed.match(/^-\s*(.*)$/);
    if (item && listKey !== null) {
      const list = result[listKey];
      const value = unquote(item[1] ?? "");
      if (Array.isArray(list) && value !== "") {
        list.push(value);
      }
      continue;
    }

    const match = trimmed.match(/^([A-Za-z_][A-Za-z0-9_-]*):\s*(.*)$/);
    if (!match) {
      throw new ConfigError(`${source}:${lineNo}: expected 'key: value', got '${trimmed}'`);
    }
    const key = match[1] ?? "";
    const value = (match[2] ?? "").trim();
    listKey = null;

    if (value === "") {
      result[key] = [];
      listKey = key;
    } else if (value.startsWith("[") && value.endsWith("]")) {
      result[key] = value
        .slice(1, -1)
        .split(",")
        .map(unquote)
        .filter((part) => part !== "");
    } else if (value === "true" || value === "false") {
      result[key] = value === "true";
    } else {
      result[key] = unquote(value);
    }
  }

  return result;
}

/**
 * Map raw values onto ImageBuilderFileConfig.
 *
 * A list key also accepts a whitespace/comma separated string, like the
 * environment variables do.
 *
 * @throws ConfigError for a value of the wrong type.
 */
export function toFileConfig(raw: Record<string, ConfigValue>, source = "config"): ImageBuilderFileConfig {
  const config: ImageBuilderFileConfig = {};

  for (const [key, value] of Object.entries(raw)) {
    if (LIST_KEYS.has(key)) {
      if (typeof value === "boolean") {
        throw new ConfigError(`${source}: '${key}' must be a list`);
      }
      const list = typeof value === "string" ? parseNameList(value) : value;
      if (key === "ovaBuildNames") {config.ovaBuildNames = list;}
      if (key === "amiBuildNames") {config.amiBuildNames = list;}
      if (key === "varFiles") {config.varFiles = list;}
    } else if (STRING_KEYS.has(key)) {
      // `key:` with nothing after it parses as an empty list
      const text = Array.isArray(value) && value.length === 0 ? "" : value;
      if (typeof text !== "string") {
        throw new ConfigError(`${source}: '${key}' must be a string`);
      }
      if (key === "packerFlags") {config.packerFlags = text;}
      if (key === "packer") {config.packer = text;}
      if (key === "templateDir") {config.templateDir = text;}
      if (key === "outputDir") {config.outputDir = text;}
    } else if (BOOLEAN_KEYS.has(key)) {
      if (typeof value !== "boolean") {
        throw new ConfigError(`${source}: '${key}' must be true or false`);
      }
      if (key === "keepGoing") {config.keepGoing = value;}
      if (key === "strictVarFiles") {config.strictVarFiles = value;}
    } else {
      log.warn(`${source}: ignoring unknown key '${key}'`);
    }
  }

  return config;
}

/**
 * Load the first config file found in rootDir.
 *
 * @returns The parsed config, or an empty config when no file exists.
 * @throws ConfigError when the file cannot be read or parsed.
 */
export function loadFileConfig(rootDir: string): ImageBuilderFileConfig {
  for (const filename of CONFIG_FILES) {
    const path = join(rootDir, filename);
    if (!existsSync(path)) {
      continue;
    }

    let content: string;
    try {
      content = readFileSync(path, "utf-8");
    } catch (e: unknown) {
      throw new ConfigError(`Cannot read ${path}: ${extractErrorDetails(e)}`);
    }
    log.debug(`Loaded config: ${path}`);
    return toFileConfig(parseConfigText(content, filename), filename);
  }
  return {};
}
