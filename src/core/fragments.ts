import fs from "node:fs";
import path from "node:path";
import type { TreeLayout } from "../schemas/config.schema.js";
import * as log from "../utils/logger.js";

export const MAGISK_FRAGMENT = "magisk";
export const FAKE_CONFIG_FRAGMENT = "fake_config";

/** One toggle-able configuration fragment */
export interface ConfigFragment {
  name: string;
  /** Path relative to the tree root */
  path: string;
  enabledByDefault: boolean;
  enabled: boolean;
  /** Only on the magisk fragment: use the canary payload */
  canary?: boolean;
}

export type FragmentSet = Map<string, ConfigFragment>;

export interface FragmentFile {
  name: string;
  enabledByDefault: boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Classify `<prefix><+|-><name>.conf`. The sign is the default state.
 * Returns null for the baseline `<prefix>.conf` and for unrelated files.
 */
export function classifyFragmentFile(fileName: string, prefix: string): FragmentFile | null {
  const match = new RegExp(`^${escapeRegExp(prefix)}([+-])(.+)\\.conf$`).exec(fileName);
  if (!match) return null;
  return { name: match[2], enabledByDefault: match[1] === "+" };
}

/** Path of the unconditional baseline fragment */
export function baselineFragmentPath(layout: Pick<TreeLayout, "fragment_dir" | "fragment_prefix">): string {
  return path.posix.join(layout.fragment_dir, `${layout.fragment_prefix}.conf`);
}

/** Scan the fragment directory. Fragments are keyed and ordered by name. */
export function discoverFragments(
  root: string,
  layout: Pick<TreeLayout, "fragment_dir" | "fragment_prefix">
): FragmentSet {
  const dir = path.join(root, layout.fragment_dir);
  const fragments: FragmentSet = new Map();
  if (!fs.existsSync(dir)) {
    log.warn(`Fragment directory not found: ${layout.fragment_dir}`);
    return fragments;
  }

  const files = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  for (const fileName of files) {
    const parsed = classifyFragmentFile(fileName, layout.fragment_prefix);
    if (!parsed) continue;
    const fragment: ConfigFragment = {
      name: parsed.name,
      path: path.posix.join(layout.fragment_dir, fileName),
      enabledByDefault: parsed.enabledByDefault,
      enabled: parsed.enabledByDefault,
    };
    if (parsed.name === MAGISK_FRAGMENT) fragment.canary = false;
    if (fragments.has(parsed.name)) {
      log.warn(`Fragment '${parsed.name}' defined twice, using ${fileName}`);
    }
    fragments.set(parsed.name, fragment);
  }
  return fragments;
}

/** Independent copy, so parsing never touches the discovered defaults */
export function cloneFragments(fragments: FragmentSet): FragmentSet {
  return new Map([...fragments].map(([name, fragment]) => [name, { ...fragment }]));
}

/** Enabled fragments in name order, the order they are merged in */
export function enabledFragments(fragments: FragmentSet): ConfigFragment[] {
  return [...fragments.values()]
    .filter((f) => f.enabled)
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
