/**
 * OVA assembly: checksums, the .mf manifest and the tar container.
 *
 * An OVA is an uncompressed tar whose first entry is the OVF descriptor.
 */

import { createHash } from "node:crypto";
import { createReadStream, createWriteStream, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import archiver from "archiver";

import { ArchiveError, extractErrorDetails } from "../errors.js";
import { log } from "../logger.js";

/** Hex SHA-256 of a file, streamed (VMDKs run to gigabytes). */
export function sha256File(path: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash("sha256");
    createReadStream(path)
      .on("data", (chunk) => hash.update(chunk))
      .on("error", reject)
      .on("end", () => resolve(hash.digest("hex")));
  });
}

/**
 * Write an OVA manifest: one `SHA256(<file>)= <hex>` line per file.
 *
 * @param files - Names relative to dir, in listing order.
 */
export async function createOvaManifest(path: string, dir: string, files: readonly string[]): Promise<void> {
  log.info(`create ova manifest ${path}`);
  let content = "";
  for (const file of files) {
    content += `SHA256(${file})= ${await sha256File(join(dir, file))}\n`;
  }
  writeFileSync(path, content, "utf-8");
}

/**
 * Tar files (relative to dir) into path, in the given order.
 *
 * Any archiver warning (such as a missing input) or stream error aborts the
 * archive and removes the partial file.
 *
 * @throws ArchiveError
 */
export async function writeTar(path: string, dir: string, files: readonly string[]): Promise<void> {
  const output = createWriteStream(path);
  const archive = archiver("tar");

  const written = new Promise<void>((resolve, reject) => {
    const fail = (error: Error): void => reject(new ArchiveError(`Cannot write ${path}: ${error.message}`, path));
    archive.on("warning", fail);
    archive.on("error", fail);
    output.on("error", fail);
    output.on("close", () => resolve());
  });

  archive.pipe(output);
  for (const file of files) {
    archive.file(join(dir, file), { name: file });
  }

  try {
    await Promise.all([archive.finalize(), written]);
  } catch (error: unknown) {
    archive.abort();
    output.destroy();
    rmSync(path, { force: true });
    if (error instanceof ArchiveError) {
      throw error;
    }
    throw new ArchiveError(`Cannot write ${path}: ${extractErrorDetails(error)}`, path);
  }
}

/**
 * Tar files into an OVA and write `<path>.sha256` holding the archive's
 * hex digest. No checksum is written for a failed archive.
 *
 * @returns The archive's SHA-256.
 * @throws ArchiveError
 */
export async function createOva(path: string, dir: string, files: readonly string[]): Promise<string> {
  log.info(`create ova ${path}`);
  await writeTar(path, dir, files);

  const checksumPath = `${path}.sha256`;
  log.info(`create ova checksum ${checksumPath}`);
  const digest = await sha256File(path);
  writeFileSync(checksumPath, digest, "utf-8");
  return digest;
}
