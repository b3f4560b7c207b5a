import path from "node:path";
import { BuildRecord } from "../core/build-record.js";
import { parseBuildCommand, type BuildRequest } from "../core/command-parser.js";
import { loadConfig } from "../core/config-loader.js";
import { DEFAULT_ENVIRONMENT, setupEnvironment } from "../core/environment.js";
import { discoverFragments, FAKE_CONFIG_FRAGMENT } from "../core/fragments.js";
import { defconfigPath } from "../core/materializer.js";
import { ModelPointer } from "../core/model-pointer.js";
import { ModelRegistry } from "../core/models.js";
import { describePlan, runPipeline } from "../core/pipeline.js";
import { SpawnRunner, type CommandRunner } from "../core/runner.js";
import type { Config } from "../schemas/config.schema.js";
import { KforgeError, UsageError } from "../utils/errors.js";
import type { LogLevel } from "../utils/logger.js";
import { renderError } from "../utils/render-error.js";
import * as log from "../utils/logger.js";
import { kforgeUsage, type UsageInfo } from "./usage.js";

export interface RunOptions {
  /** Kernel tree root (default: cwd) */
  root?: string;
  dryRun?: boolean;
  logLevel?: LogLevel;
  color?: boolean;
  /** Environment handed to every tool; defaults are filled in place */
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  runner?: CommandRunner;
  now?: () => Date;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * With the fake_config fragment selected, kconfig treats the model's
 * defconfig as the built-in config reported by /proc/config.gz.
 */
function applyFakeConfig(
  request: BuildRequest,
  models: ModelRegistry,
  config: Config,
  env: NodeJS.ProcessEnv
): void {
  if (!request.fragments.get(FAKE_CONFIG_FRAGMENT)?.enabled) return;
  const model = request.model !== undefined ? models.get(request.model) : undefined;
  if (!model) {
    log.debug(`${FAKE_CONFIG_FRAGMENT} enabled but no model resolved for ${request.keyword}`);
    return;
  }
  const builtin = { KCONFIG_BUILTINCONFIG: defconfigPath(model, config.tree) };
  for (const line of setupEnvironment(builtin, env)) log.output(line);
}

/** Parse and run one invocation. Returns the process exit status. */
export async function runKforge(argv: string[], options: RunOptions = {}): Promise<number> {
  const root = path.resolve(options.root ?? process.cwd());
  const env = options.env ?? process.env;
  let usageInfo: UsageInfo = { models: new ModelRegistry().ids(), fragments: [] };

  try {
    const config = loadConfig(root, { homeDir: options.homeDir });
    log.configureLogger(
      options.logLevel ?? config.logging.level,
      options.color ?? (config.logging.color && process.stdout.isTTY === true)
    );

    const models = new ModelRegistry(config.models);
    const fragments = discoverFragments(root, config.tree);
    usageInfo = { models: models.ids(), fragments: [...fragments.keys()] };

    const defaults = { ...DEFAULT_ENVIRONMENT, ...config.environment };
    for (const line of setupEnvironment(defaults, env)) log.output(line);

    const pointer = new ModelPointer(root, config.tree.mkbootimg_prefix);
    const request = parseBuildCommand(argv, { models, fragments, pointer });
    applyFakeConfig(request, models, config, env);

    if (options.dryRun) {
      log.output(JSON.stringify(describePlan(request, { config, models }), null, 2));
      return 0;
    }

    if (request.modelExplicit && request.model !== undefined) {
      pointer.write(request.model);
      log.debug(`${config.tree.mkbootimg_prefix} -> ${pointer.metadataFile(request.model)}`);
    }

    await runPipeline(request, {
      root,
      config,
      models,
      pointer,
      record: new BuildRecord(path.join(root, config.tree.build_record)),
      runner: options.runner ?? new SpawnRunner(root, env),
      now: options.now,
      sleep: options.sleep,
    });
    return 0;
  } catch (error) {
    log.error(renderError(error));
    if (error instanceof UsageError) {
      console.error("\n" + kforgeUsage(usageInfo));
    }
    return error instanceof KforgeError ? error.exitStatus : 1;
  }
}
