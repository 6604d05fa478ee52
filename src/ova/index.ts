/**
 * OVA packaging for a finished packer build.
 *
 * Steps, all inside the build directory:
 *   1. read packer-manifest.json (first build)
 *   2. stream-optimize each VMDK with vmware-vdiskmanager
 *   3. render <name>.ovf
 *   4. write <name>.mf with SHA-256 lines for the OVF and disk
 *   5. tar OVF, manifest and disk into <name>.ova, plus <name>.ova.sha256
 * Only the first VMDK goes into the OVA.
 */

import { existsSync, rmSync, statSync } from "node:fs";
import { join, resolve } from "node:path";

import { VDISKMANAGER_BIN, VDISK_STREAM_OPTIMIZED } from "../constants.js";
import { ExternalToolError, ManifestError } from "../errors.js";
import { log } from "../logger.js";
import type { ProcessRunner } from "../packer/index.js";
import { createOva, createOvaManifest } from "./archive.js";
import { loadManifest, vmdkFiles, type ManifestFile } from "./manifest.js";
import { createOvf, ovfValues } from "./ovf.js";

export interface StreamOptimizedDisk {
  /** Source VMDK as listed in the manifest. */
  readonly source: ManifestFile;
  /** Stream-optimized file name, relative to the build directory. */
  readonly streamName: string;
  readonly streamSize: number;
}

export interface OvaResult {
  readonly ova: string;
  readonly ovf: string;
  readonly manifest: string;
  readonly checksum: string;
  readonly sha256: string;
}

/** <x>.vmdk -> <x>.ova.vmdk (first occurrence only). */
export function streamOptimizedName(name: string): string {
  return name.replace(".vmdk", ".ova.vmdk");
}

/**
 * Convert VMDKs to stream-optimized disks, replacing earlier outputs.
 *
 * @throws ExternalToolError when vmware-vdiskmanager exits non-zero.
 */
export async function streamOptimizeDisks(
  buildDir: string,
  disks: readonly ManifestFile[],
  runner: ProcessRunner
): Promise<StreamOptimizedDisk[]> {
  const result: StreamOptimizedDisk[] = [];

  for (const disk of disks) {
    const streamName = streamOptimizedName(disk.name);
    const streamPath = join(buildDir, streamName);
    if (existsSync(streamPath)) {
      rmSync(streamPath, { force: true });
    }

    log.info(`stream optimize ${disk.name} --> ${streamName} (1-2 minutes)`);
    const { exitCode } = await runner.run({
      command: VDISKMANAGER_BIN,
      args: ["-r", disk.name, "-t", VDISK_STREAM_OPTIMIZED, streamName],
      cwd: buildDir,
    });
    if (exitCode !== 0) {
      throw new ExternalToolError(`${VDISKMANAGER_BIN} failed for ${disk.name} (exit ${exitCode})`, exitCode);
    }

    result.push({ source: disk, streamName, streamSize: statSync(streamPath).size });
  }

  return result;
}

/**
 * Package the build in buildDir as an OVA.
 *
 * @throws ManifestError, ExternalToolError, TemplateError
 */
export async function packageOva(buildDir: string, runner: ProcessRunner): Promise<OvaResult> {
  const dir = resolve(buildDir);
  log.info(`cd ${dir}`);

  const build = loadManifest(dir);
  log.info(`loaded ${build.name}-kube-${build.customData.kubernetes_semver}`);

  const disks = vmdkFiles(build);
  if (disks.length === 0) {
    throw new ManifestError(`Build '${build.name}' lists no .vmdk files`);
  }
  if (disks.length > 1) {
    log.warn(`Build '${build.name}' has ${disks.length} disks; only ${disks[0]?.name ?? ""} is packaged`);
  }

  const [disk] = await streamOptimizeDisks(dir, disks, runner);
  if (!disk) {
    throw new ManifestError(`Build '${build.name}' lists no .vmdk files`);
  }

  const ovf = `${build.name}.ovf`;
  createOvf(join(dir, ovf), ovfValues(build, { name: disk.streamName, populated: disk.source.size, stream: disk.streamSize }));

  const manifest = `${build.name}.mf`;
  await createOvaManifest(join(dir, manifest), dir, [ovf, disk.streamName]);

  const ova = `${build.name}.ova`;
  const sha256 = await createOva(join(dir, ova), dir, [ovf, manifest, disk.streamName]);

  log.success(`Packaged ${join(dir, ova)}`);
  return {
    ova: join(dir, ova),
    ovf: join(dir, ovf),
    manifest: join(dir, manifest),
    checksum: join(dir, `${ova}.sha256`),
    sha256,
  };
}
