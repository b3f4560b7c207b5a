import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { Config } from "../schemas/config.schema.js";
import { isErrnoException, MissingInputFileError } from "../utils/errors.js";
import * as log from "../utils/logger.js";
import {
  FILE_OPTIONS,
  PATCH_LEVEL_KEY,
  readMetadata,
  RESERVED_OPTIONS,
  type MetadataEntry,
} from "./boot-metadata.js";
import type { BuildRequest } from "./command-parser.js";
import { requireDeviceModel } from "./materializer.js";
import type { ModelRegistry } from "./models.js";
import type { ModelPointer } from "./model-pointer.js";
import type { CommandRunner } from "./runner.js";
import { requireTools, runChecked } from "./tools.js";

export interface PackagingContext {
  root: string;
  config: Config;
  models: ModelRegistry;
  pointer: ModelPointer;
  runner: CommandRunner;
}

export interface PackagingResult {
  bootImage: string;
  vbmetaImage?: string;
  apTar?: string;
}

/**
 * mkbootimg arguments: every metadata entry as `--key value` in file order,
 * with only os_patch_level replaced when an override is given, then the
 * kernel image and output. `kernel` and `output` entries are dropped.
 */
export function buildMkbootimgArgs(
  entries: MetadataEntry[],
  osPatchLevel: string | undefined,
  kernelImage: string,
  output: string
): string[] {
  const args: string[] = [];
  for (const { key, value } of entries) {
    if (RESERVED_OPTIONS.has(key)) continue;
    const effective = key === PATCH_LEVEL_KEY && osPatchLevel ? osPatchLevel : value;
    args.push(`--${key}`, effective);
  }
  args.push("--kernel", kernelImage, "--output", output);
  return args;
}

/** Files mkbootimg will read: the kernel image plus file-valued metadata */
export function packagingInputs(entries: MetadataEntry[], kernelImage: string): string[] {
  return [kernelImage, ...entries.filter((e) => FILE_OPTIONS.has(e.key)).map((e) => e.value)];
}

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch (err) {
    if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) return false;
    throw err;
  }
}

/** Append `<md5>  <name>` to the tarball and rename it to `<name>.md5`, like Odin expects */
export function appendMd5(root: string, tarName: string): string {
  const tarPath = path.join(root, tarName);
  const digest = crypto.createHash("md5").update(fs.readFileSync(tarPath)).digest("hex");
  fs.appendFileSync(tarPath, `${digest}  ${tarName}\n`);
  const finalName = `${tarName}.md5`;
  fs.renameSync(tarPath, path.join(root, finalName));
  return finalName;
}

async function makeVbmeta(runner: CommandRunner, output: string): Promise<string> {
  requireTools(runner, ["avbtool"]);
  log.info("Preparing vbmeta...");
  await runChecked(runner, "avbtool", ["make_vbmeta_image", "--out", output]);
  return output;
}

async function makeApTar(
  ctx: PackagingContext,
  bootImage: string,
  vbmetaImage: string
): Promise<string> {
  const { runner } = ctx;
  const tarName = ctx.config.packaging.ap_tar_name;
  requireTools(runner, ["tar", "lz4"]);
  log.info(`Preparing ${tarName}.md5...`);
  await runChecked(runner, "lz4", ["-m", "-f", "-B6", "--content-size", bootImage, vbmetaImage]);
  await runChecked(runner, "tar", [
    "-H",
    "ustar",
    "-c",
    "-f",
    tarName,
    `${bootImage}.lz4`,
    `${vbmetaImage}.lz4`,
  ]);
  return appendMd5(ctx.root, tarName);
}

/** The mkimg stage */
export async function makeBootImage(
  request: BuildRequest,
  ctx: PackagingContext
): Promise<PackagingResult> {
  const { runner, config } = ctx;
  const { tree, packaging } = config;
  requireTools(runner, ["mkbootimg"]);

  const model = requireDeviceModel(request, ctx.models);
  const metadataFile = ctx.pointer.metadataFile(model.id);
  const metadataPath = path.join(ctx.root, metadataFile);
  if (!isFile(metadataPath)) throw new MissingInputFileError(metadataFile);

  log.info(`Preparing ${tree.boot_image}...`);
  const entries = readMetadata(metadataPath);
  for (const file of packagingInputs(entries, tree.kernel_image)) {
    if (file === "" || !isFile(path.join(ctx.root, file))) throw new MissingInputFileError(file);
  }

  const args = buildMkbootimgArgs(entries, request.osPatchLevel, tree.kernel_image, tree.boot_image);
  await runChecked(runner, "mkbootimg", args);
  log.success(`Created ${tree.boot_image}`);

  const result: PackagingResult = { bootImage: tree.boot_image };
  if (packaging.vbmeta || packaging.ap_tar) {
    result.vbmetaImage = await makeVbmeta(runner, packaging.vbmeta_image);
  }
  if (packaging.ap_tar && result.vbmetaImage) {
    result.apTar = await makeApTar(ctx, tree.boot_image, result.vbmetaImage);
    log.success(`Created ${result.apTar}`);
  }
  return result;
}
