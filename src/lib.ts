/**
 * Public API surface for the kforge library.
 * Re-exports the pipeline pieces for programmatic use and custom front ends.
 */

// Entry point
export { runKforge, type RunOptions } from "./commands/run.js";
export { kforgeUsage } from "./commands/usage.js";

// Config
export { loadConfig, configLayers, deepMerge } from "./core/config-loader.js";
export type { Config, TreeLayout } from "./schemas/config.schema.js";

// Parsing
export { parseBuildCommand, resolveModel, isValidPatchLevel, type BuildRequest } from "./core/command-parser.js";
export { STAGES, STAGE_KEYWORDS, resolveStages, type Stage, type StageKeyword } from "./core/stages.js";
export { ModelRegistry, BUILTIN_MODELS, type DeviceModel } from "./core/models.js";
export { discoverFragments, classifyFragmentFile, type ConfigFragment, type FragmentSet } from "./core/fragments.js";

// Stages
export { runPipeline, describePlan, type PipelineContext, type PipelineResult } from "./core/pipeline.js";
export { materializeConfig, computeMergeList } from "./core/materializer.js";
export { makeBootImage, buildMkbootimgArgs } from "./core/packaging.js";
export { DeviceFlasher, type DeviceBridge, type DownloadModeTool, type FlasherState } from "./core/device-flasher.js";

// State and host
export { ModelPointer } from "./core/model-pointer.js";
export { BuildRecord } from "./core/build-record.js";
export { SpawnRunner, type CommandRunner, type ExecOptions, type ExecResult } from "./core/runner.js";

// Errors
export * from "./utils/errors.js";
