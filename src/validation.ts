/**
 * Input validation utilities for kube-image-builder.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: cli, commands, packer
 */

import { ValidationError } from "./errors.js";

/**
 * Build name pattern.
 *
 * A name doubles as a file name (`<kind>/<name>.json`) and as an output
 * prefix (`output/<name>*`), so separators and glob characters are excluded.
 */
const BUILD_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function isValidBuildName(name: string): boolean {
  return BUILD_NAME_PATTERN.test(name);
}

/**
 * Split a name list given as one string ("ova-centos-7 ova-ubuntu-1804" or
 * "a,b"). Empty segments are dropped; order is kept.
 */
export function parseNameList(value: string): string[] {
  return value.split(/[\s,]+/).filter((part) => part !== "");
}

/**
 * Split a flag string into argv tokens with shell-like quoting.
 *
 *   -force -var 'region=us-east-1' -var "name=a \"b\""
 *   -> ["-force", "-var", "region=us-east-1", "-var", "name=a \"b\""]
 *
 * Single quotes are literal. Inside double quotes only `\"` and `\\` are
 * escapes. Outside quotes a backslash escapes the next character.
 *
 * @throws ValidationError on an unterminated quote or trailing backslash.
 */
export function parseFlagString(value: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i);

    if (quote === "'") {
      if (ch === "'") {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === "\\" && (value[i + 1] === '"' || value[i + 1] === "\\")) {
        current += value.charAt(i + 1);
        i++;
      } else {
        current += ch;
      }
      continue;
    }

    if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
      continue;
    }

    inToken = true;
    if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === "\\") {
      if (i + 1 >= value.length) {
        throw new ValidationError(`Invalid flags '${value}': trailing backslash`);
      }
      current += value.charAt(i + 1);
      i++;
    } else {
      current += ch;
    }
  }

  if (quote !== null) {
    throw new ValidationError(`Invalid flags '${value}': unterminated ${quote} quote`);
  }
  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}
