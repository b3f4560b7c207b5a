import fs from "node:fs";
import path from "node:path";
import type { Config, TreeLayout } from "../schemas/config.schema.js";
import { UsageError } from "../utils/errors.js";
import * as log from "../utils/logger.js";
import { findPatchLevel, readMetadata } from "./boot-metadata.js";
import { formatBuildDate, type BuildRecord } from "./build-record.js";
import { resolveModel, type BuildRequest } from "./command-parser.js";
import {
  baselineFragmentPath,
  enabledFragments,
  MAGISK_FRAGMENT,
  type FragmentSet,
} from "./fragments.js";
import type { DeviceModel, ModelRegistry } from "./models.js";
import type { ModelPointer } from "./model-pointer.js";
import type { CommandRunner } from "./runner.js";
import { KernelConfigTool, MagiskPayload } from "./tools.js";

export interface MaterializeContext {
  root: string;
  config: Config;
  models: ModelRegistry;
  pointer: ModelPointer;
  record: BuildRecord;
  runner: CommandRunner;
  now?: () => Date;
}

export interface MaterializeResult {
  mergeList: string[];
  osPatchLevel?: string;
  magiskVersion?: string;
}

/** Defconfig path of a model, relative to the tree root */
export function defconfigPath(model: DeviceModel, layout: Pick<TreeLayout, "defconfig_dir">): string {
  return path.posix.join(layout.defconfig_dir, model.defconfig);
}

/** Model defconfig, then the baseline fragment, then enabled fragments by name */
export function computeMergeList(
  model: DeviceModel,
  fragments: FragmentSet,
  layout: TreeLayout
): string[] {
  return [
    defconfigPath(model, layout),
    baselineFragmentPath(layout),
    ...enabledFragments(fragments).map((f) => f.path),
  ];
}

/** Record lines for the fragment selection */
export function describeFragments(fragments: FragmentSet): string[] {
  const enabled = enabledFragments(fragments);
  if (enabled.length === 0) return ["Configuration: basic only"];
  return [
    "Configuration:",
    ...enabled.map((f) => `\t${f.name} (default: ${f.enabledByDefault ? "On" : "Off"})`),
  ];
}

/** Look up a request's model; only reachable with a model for config/mkimg keywords */
export function requireDeviceModel(request: BuildRequest, models: ModelRegistry): DeviceModel {
  const id = resolveModel(request.model, undefined);
  const model = models.get(id);
  if (!model) {
    throw new UsageError(`Unknown device model: ${id}`, "UNKNOWN_MODEL");
  }
  return model;
}

/** Patch level from the model's packaging metadata, without modifying it */
function metadataPatchLevel(ctx: MaterializeContext, model: string): string | undefined {
  const file = ctx.pointer.metadataFile(model);
  const filePath = path.join(ctx.root, file);
  if (!fs.existsSync(filePath)) {
    log.warn(`No packaging metadata for ${model} (${file})`);
    return undefined;
  }
  return findPatchLevel(readMetadata(filePath));
}

/**
 * The config stage: recreate the build record, sync Magisk when selected,
 * merge the fragments and apply the name/model overrides.
 */
export async function materializeConfig(
  request: BuildRequest,
  ctx: MaterializeContext
): Promise<MaterializeResult> {
  const model = requireDeviceModel(request, ctx.models);
  const { record, config } = ctx;
  const kernelTool = new KernelConfigTool(ctx.runner, config.tree);

  record.reset();
  record.append(`Build date: ${formatBuildDate(ctx.now?.() ?? new Date())}`);
  record.append(`Name: ${request.kernelName ?? config.kernel.default_name}`);
  record.append(`Model: ${model.id}`);

  let magiskVersion: string | undefined;
  const magisk = request.fragments.get(MAGISK_FRAGMENT);
  if (magisk?.enabled) {
    const payload = new MagiskPayload(ctx.runner, ctx.root, config.magisk);
    magiskVersion = await payload.sync(magisk.canary ?? false);
    record.append(`Magisk Version: ${magiskVersion}`);
  }

  for (const line of describeFragments(request.fragments)) {
    record.append(line);
  }

  const mergeList = computeMergeList(model, request.fragments, config.tree);
  await kernelTool.merge(mergeList);

  if (request.kernelName !== undefined) {
    log.info(`Setting kernel name to: ${request.kernelName}`);
    await kernelTool.setString("LOCALVERSION", `-${request.kernelName}`);
  }

  log.info(`Setting kernel model to: ${model.id}`);
  await kernelTool.enable(`CONFIG_MODEL_${model.id}`);

  const osPatchLevel = request.osPatchLevel ?? metadataPatchLevel(ctx, model.id);
  if (osPatchLevel !== undefined) {
    record.append(`OS Patch Level: ${osPatchLevel}`);
  }

  return { mergeList, osPatchLevel, magiskVersion };
}
