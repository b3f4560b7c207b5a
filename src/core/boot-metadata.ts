import fs from "node:fs";

/**
 * Packaging metadata (`build.mkbootimg.<model>`): one `key=value` per line,
 * each key an mkbootimg option name. Order is kept; blank lines and `#`
 * comments are skipped. Values are split at the first `=` only.
 */
export interface MetadataEntry {
  key: string;
  value: string;
}

export const PATCH_LEVEL_KEY = "os_patch_level";

/** mkbootimg options whose values are input files */
export const FILE_OPTIONS: ReadonlySet<string> = new Set([
  "ramdisk",
  "second",
  "dtb",
  "recovery_dtbo",
  "recovery_acpio",
  "vendor_ramdisk",
]);

/** Options the mkimg stage always passes itself */
export const RESERVED_OPTIONS: ReadonlySet<string> = new Set(["kernel", "output"]);

export function parseMetadata(text: string): MetadataEntry[] {
  const entries: MetadataEntry[] = [];
  for (const raw of text.split("\n")) {
    const line = raw.trimEnd();
    if (line.trim() === "" || line.trimStart().startsWith("#")) continue;
    const eq = line.indexOf("=");
    if (eq === -1) {
      entries.push({ key: line.trim(), value: "" });
      continue;
    }
    entries.push({ key: line.slice(0, eq).trim(), value: line.slice(eq + 1) });
  }
  return entries;
}

export function readMetadata(filePath: string): MetadataEntry[] {
  return parseMetadata(fs.readFileSync(filePath, "utf-8"));
}

export function findPatchLevel(entries: MetadataEntry[]): string | undefined {
  return entries.find((e) => e.key === PATCH_LEVEL_KEY)?.value;
}
