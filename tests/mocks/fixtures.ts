/**
 * Temporary build roots for tests.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export function makeTempDir(prefix = "image-builder-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function writeFile(root: string, relPath: string, content = "{}"): string {
  const path = join(root, relPath);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
}

/**
 * Build root with per-name config files for the given names, e.g.
 * { ova: ["ova-centos-7"], ami: ["ami-default"] }.
 */
export function makeBuildRoot(names: { ova?: string[]; ami?: string[] } = {}): string {
  const root = makeTempDir();
  for (const name of names.ova ?? []) {
    writeFile(root, `packer/ova/${name}.json`);
  }
  for (const name of names.ami ?? []) {
    writeFile(root, `packer/ami/${name}.json`);
  }
  return root;
}
