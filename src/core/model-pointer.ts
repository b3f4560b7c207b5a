import fs from "node:fs";
import path from "node:path";
import { isErrnoException } from "../utils/errors.js";

/**
 * Cross-invocation memory of the last selected device model.
 *
 * Stored as a symlink `<prefix> -> <prefix>.<model>` in the tree root, so the
 * active model's packaging metadata is also reachable under a fixed name.
 *
 * Contract:
 * - `write(model)` replaces the link; only explicit `model=` tokens call it.
 * - `read()` returns the model the link names, or undefined when the link is
 *   absent, not a symlink, or dangling.
 * - No locking: concurrent invocations on one tree race on the link.
 */
export class ModelPointer {
  readonly linkPath: string;

  constructor(
    root: string,
    private readonly prefix: string
  ) {
    this.linkPath = path.join(root, prefix);
  }

  /** Metadata file for a model, relative to the tree root */
  metadataFile(model: string): string {
    return `${this.prefix}.${model}`;
  }

  read(): string | undefined {
    let stat: fs.Stats;
    try {
      stat = fs.lstatSync(this.linkPath);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return undefined;
      throw err;
    }
    if (!stat.isSymbolicLink() || !fs.existsSync(this.linkPath)) return undefined;

    const target = fs.readlinkSync(this.linkPath);
    const dot = target.lastIndexOf(".");
    if (dot === -1 || dot === target.length - 1) return undefined;
    return target.slice(dot + 1);
  }

  write(model: string): void {
    const target = path.basename(this.metadataFile(model));
    fs.rmSync(this.linkPath, { force: true });
    fs.symlinkSync(target, this.linkPath);
  }
}
