import { UsageError } from "../utils/errors.js";
import { cloneFragments, MAGISK_FRAGMENT, type FragmentSet } from "./fragments.js";
import type { ModelRegistry } from "./models.js";
import {
  acceptsConfigTokens,
  isStageKeyword,
  resolveStages,
  STAGE_KEYWORDS,
  type Stage,
  type StageKeyword,
} from "./stages.js";

/** The resolved intent of one invocation. Not mutated after parsing. */
export interface BuildRequest {
  keyword: StageKeyword;
  stages: Stage[];
  /** Unset only for keywords that take no configuration tokens */
  model?: string;
  /** Model came from a `model=` token and the pointer must follow it */
  modelExplicit: boolean;
  kernelName?: string;
  osPatchLevel?: string;
  fragments: FragmentSet;
}

export interface ParseContext {
  models: ModelRegistry;
  /** Discovered fragments with their default state; never modified */
  fragments: FragmentSet;
  pointer: { read(): string | undefined };
}

export const CONFIG_KEYS = ["name", "model", "os_patch_level"] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

interface Overrides {
  name?: string;
  model?: string;
  os_patch_level?: string;
}

/** Toggle names that address the magisk fragment, with the canary flag they imply */
const MAGISK_VARIANTS: ReadonlyMap<string, boolean> = new Map([
  ["magisk+canary", true],
  ["magisk-canary", false],
]);

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

/** `YYYY-MM` with a real month; a one-digit month is accepted */
export function isValidPatchLevel(value: string): boolean {
  const match = /^(\d{4})-(\d{1,2})$/.exec(value);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  return year >= 1 && month >= 1 && month <= 12;
}

/** explicit > persisted pointer > MissingModel */
export function resolveModel(explicit: string | undefined, persisted: string | undefined): string {
  const model = explicit ?? persisted;
  if (model === undefined) {
    throw new UsageError("Please, use model=\"<model>\".", "MISSING_MODEL", [
      "Example: model=\"G973F\"",
      "The model is remembered after the first run that names it.",
    ]);
  }
  return model;
}

function applyOverride(overrides: Overrides, token: string, models: ModelRegistry): void {
  const eq = token.indexOf("=");
  const key = token.slice(0, eq);
  const value = token.slice(eq + 1);

  if (!isConfigKey(key)) {
    throw new UsageError(`Unknown config ${key}.`, "UNKNOWN_CONFIG_KEY", [
      `Supported keys are: ${CONFIG_KEYS.join(", ")}.`,
    ]);
  }

  if (value === "") {
    throw new UsageError(`Please, use ${key}="<${key}>".`, "EMPTY_CONFIG_VALUE");
  }

  if (key === "model" && !models.has(value)) {
    throw new UsageError(`Unknown device model: ${value}`, "UNKNOWN_MODEL", [
      `Supported models: ${models.ids().join(", ")}`,
    ]);
  }

  if (key === "os_patch_level" && !isValidPatchLevel(value)) {
    throw new UsageError(
      "Please, use os_patch_level=\"YYYY-MM\". For example: os_patch_level=\"2020-02\"",
      "INVALID_DATE_FORMAT"
    );
  }

  overrides[key] = value;
}

function applyToggle(fragments: FragmentSet, token: string): void {
  const sign = token.charAt(0);
  const option = token.slice(1);
  if (sign !== "+" && sign !== "-") {
    throw new UsageError(`Unknown switch '${token}'.`, "INVALID_SWITCH", [
      `Use '+${token}'/'-${token}' to enable/disable option.`,
    ]);
  }
  const enable = sign === "+";

  const canary = MAGISK_VARIANTS.get(option);
  const name = canary === undefined ? option : MAGISK_FRAGMENT;
  const fragment = fragments.get(name);
  if (!fragment) {
    throw new UsageError(`Unknown config '${option}'.`, "UNKNOWN_CONFIG", [
      `Available: ${[...fragments.keys()].join(", ") || "(none)"}`,
    ]);
  }

  fragment.enabled = enable;
  if (canary !== undefined) {
    fragment.canary = canary;
  } else if (name === MAGISK_FRAGMENT && enable) {
    // plain +magisk selects the stable payload; -magisk keeps the variant
    fragment.canary = false;
  }
}

/**
 * Parse `<stage> [key=value | +name | -name]...` into a BuildRequest.
 *
 * Tokens are applied left to right, so the last toggle of a fragment wins.
 * `:build` and `:flash` ignore trailing tokens and resolve no model.
 */
export function parseBuildCommand(argv: readonly string[], ctx: ParseContext): BuildRequest {
  const keyword: string | undefined = argv[0];
  const tokens = argv.slice(1);
  if (keyword === undefined || !isStageKeyword(keyword)) {
    throw new UsageError(
      keyword === undefined ? "Please, specify the stage." : `Unknown stage '${keyword}'.`,
      "UNKNOWN_STAGE",
      [`Use one of: ${STAGE_KEYWORDS.join(", ")}.`]
    );
  }

  const stages = resolveStages(keyword);
  const fragments = cloneFragments(ctx.fragments);

  if (!acceptsConfigTokens(keyword)) {
    return { keyword, stages, modelExplicit: false, fragments };
  }

  const overrides: Overrides = {};
  for (const token of tokens) {
    if (token.includes("=")) {
      applyOverride(overrides, token, ctx.models);
    } else {
      applyToggle(fragments, token);
    }
  }

  const model = resolveModel(
    overrides.model,
    overrides.model === undefined ? ctx.pointer.read() : undefined
  );
  if (!ctx.models.has(model)) {
    throw new UsageError(`Unknown device model: ${model}`, "UNKNOWN_MODEL", [
      "The remembered model is no longer configured; pass model=<model>.",
    ]);
  }

  return {
    keyword,
    stages,
    model,
    modelExplicit: overrides.model !== undefined,
    kernelName: overrides.name,
    osPatchLevel: overrides.os_patch_level,
    fragments,
  };
}
