import fs from "node:fs";
import * as log from "../utils/logger.js";

/**
 * Human-readable summary of the last `config` stage (build.info).
 * Recreated at the start of every config stage, appended to during it,
 * read-only afterwards.
 */
export class BuildRecord {
  constructor(readonly filePath: string) {}

  /** Discard the previous record */
  reset(): void {
    fs.rmSync(this.filePath, { force: true });
  }

  /** Print a line and append the same text to the record */
  append(line: string): void {
    log.output(line);
    fs.appendFileSync(this.filePath, `${line}\n`);
  }

  read(): string[] {
    if (!fs.existsSync(this.filePath)) return [];
    return fs
      .readFileSync(this.filePath, "utf-8")
      .split("\n")
      .filter((l) => l.length > 0);
  }
}

/** `YYYY-MM-DD HH:MM UTC` */
export function formatBuildDate(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}
