import fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { ZodError } from "zod";
import { ConfigSchema, type Config } from "../schemas/config.schema.js";
import { ConfigValidationError } from "../utils/errors.js";
import { userConfigPath, workspacePath } from "../utils/paths.js";
import * as log from "../utils/logger.js";

export interface LoadConfigOptions {
  /** Home directory for the user-global layer (defaults to os.homedir()) */
  homeDir?: string;
}

export interface ConfigLayer {
  label: string;
  path: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Load a YAML mapping, undefined if the file does not exist or is empty */
function tryLoadYaml(filePath: string): Record<string, unknown> | undefined {
  if (!fs.existsSync(filePath)) return undefined;

  let data: unknown;
  try {
    data = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    throw new ConfigValidationError(
      `${filePath}: ${e instanceof Error ? e.message : String(e)}`,
      filePath
    );
  }

  if (data === null || data === undefined) return undefined;
  if (!isRecord(data)) {
    throw new ConfigValidationError(`${filePath}: top level must be a mapping`, filePath);
  }
  return data;
}

/** Deep merge objects: b overrides a, arrays are replaced */
export function deepMerge(
  a: Record<string, unknown>,
  b: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...a };
  for (const key of Object.keys(b)) {
    const bVal = b[key];
    const aVal = a[key];
    if (isRecord(bVal) && isRecord(aVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}

/** Config files in merge order, lowest precedence first */
export function configLayers(root: string, options: LoadConfigOptions = {}): ConfigLayer[] {
  return [
    { label: "~/.kforge/config.yaml", path: userConfigPath(options.homeDir) },
    { label: ".kforge/config.yaml", path: workspacePath("config.yaml", root) },
    { label: ".kforge/config.local.yaml", path: workspacePath("config.local.yaml", root) },
  ];
}

/**
 * Load config with 4-layer resolution:
 * 1. Schema defaults
 * 2. User global (~/.kforge/config.yaml)
 * 3. Tree shared (<tree>/.kforge/config.yaml)
 * 4. Tree local (<tree>/.kforge/config.local.yaml)
 *
 * Every file is optional. Each layer deep-merges over the previous.
 */
export function loadConfig(root: string, options: LoadConfigOptions = {}): Config {
  let merged: Record<string, unknown> = {};

  for (const layer of configLayers(root, options)) {
    const data = tryLoadYaml(layer.path);
    if (data) {
      merged = deepMerge(merged, data);
      log.debug(`Loaded config layer ${layer.label}`);
    }
  }

  try {
    return ConfigSchema.parse(merged);
  } catch (e) {
    if (e instanceof ZodError) {
      const issues = e.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`).join("\n");
      throw new ConfigValidationError(`Config validation failed:\n${issues}`, "merged");
    }
    throw e;
  }
}
