import os from "node:os";
import type { Config } from "../schemas/config.schema.js";
import { StageFailedError, ToolExecutionError } from "../utils/errors.js";
import * as log from "../utils/logger.js";
import type { BuildRecord } from "./build-record.js";
import type { BuildRequest } from "./command-parser.js";
import { DeviceFlasher, type FlasherState } from "./device-flasher.js";
import { enabledFragments } from "./fragments.js";
import { computeMergeList, materializeConfig } from "./materializer.js";
import type { ModelRegistry } from "./models.js";
import type { ModelPointer } from "./model-pointer.js";
import { makeBootImage } from "./packaging.js";
import type { CommandRunner } from "./runner.js";
import { STAGES, type Stage } from "./stages.js";
import { AdbClient, HeimdallClient, KernelCompiler, requireTools } from "./tools.js";

export interface PipelineContext {
  root: string;
  config: Config;
  models: ModelRegistry;
  pointer: ModelPointer;
  record: BuildRecord;
  runner: CommandRunner;
  now?: () => Date;
  /** Overrides the flasher's sleep between download-mode probes */
  sleep?: (ms: number) => Promise<unknown>;
  onFlasherTransition?: (from: FlasherState, to: FlasherState) => void;
}

export interface StageOutcome {
  stage: Stage;
  durationMs: number;
}

export interface PipelineResult {
  stages: StageOutcome[];
  kernelVersion?: string;
}

export interface PipelinePlan {
  stages: Stage[];
  model: string | null;
  kernelName: string | null;
  osPatchLevel: string | null;
  fragments: string[];
  mergeList: string[] | null;
  jobs: number;
}

/** make -j value: config override, else the host's available parallelism */
export function buildJobs(config: Config): number {
  return config.build.jobs ?? os.availableParallelism();
}

/** What a run would do, for --dry-run */
export function describePlan(request: BuildRequest, ctx: Pick<PipelineContext, "config" | "models">): PipelinePlan {
  const model = request.model !== undefined ? ctx.models.get(request.model) : undefined;
  return {
    stages: request.stages,
    model: request.model ?? null,
    kernelName: request.kernelName ?? null,
    osPatchLevel: request.osPatchLevel ?? null,
    fragments: enabledFragments(request.fragments).map((f) => f.name),
    mergeList:
      model && request.stages.includes("config")
        ? computeMergeList(model, request.fragments, ctx.config.tree)
        : null,
    jobs: buildJobs(ctx.config),
  };
}

async function flashStage(ctx: PipelineContext): Promise<string> {
  requireTools(ctx.runner, ["adb", "heimdall"]);
  const flasher = new DeviceFlasher(new AdbClient(ctx.runner), new HeimdallClient(ctx.runner), {
    pollIntervalMs: ctx.config.flash.poll_interval_ms,
    sleep: ctx.sleep,
    onTransition: ctx.onFlasherTransition,
  });
  return flasher.flash(ctx.config.tree.boot_image);
}

/**
 * Run the requested stages in the fixed order config → build → mkimg → flash.
 * The first failure aborts the run; a tool's non-zero exit becomes
 * StageFailedError carrying the stage and the tool's status.
 */
export async function runPipeline(
  request: BuildRequest,
  ctx: PipelineContext
): Promise<PipelineResult> {
  const result: PipelineResult = { stages: [] };

  for (const stage of STAGES) {
    if (!request.stages.includes(stage)) continue;

    log.heading(`==> ${stage}`);
    const startTime = Date.now();
    try {
      switch (stage) {
        case "config":
          await materializeConfig(request, ctx);
          break;
        case "build":
          await new KernelCompiler(ctx.runner).make(buildJobs(ctx.config));
          break;
        case "mkimg":
          await makeBootImage(request, ctx);
          break;
        case "flash":
          result.kernelVersion = await flashStage(ctx);
          break;
      }
    } catch (err) {
      if (err instanceof ToolExecutionError) throw new StageFailedError(stage, err);
      throw err;
    }

    const durationMs = Date.now() - startTime;
    result.stages.push({ stage, durationMs });
    log.success(`${stage} completed (${durationMs}ms)`);
  }

  return result;
}
