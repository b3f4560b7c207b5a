import fs from "node:fs";
import path from "node:path";
import type { MagiskConfig, TreeLayout } from "../schemas/config.schema.js";
import { MagiskSyncError, ToolExecutionError, ToolNotFoundError } from "../utils/errors.js";
import type { CommandRunner, ExecOptions, ExecResult } from "./runner.js";

/** Run a tool and throw ToolExecutionError on a non-zero exit */
export async function runChecked(
  runner: CommandRunner,
  file: string,
  args: string[],
  options?: ExecOptions
): Promise<ExecResult> {
  const result = await runner.exec(file, args, options);
  if (result.exitCode !== 0) {
    throw new ToolExecutionError(path.basename(file), result.exitCode);
  }
  return result;
}

/** Throw ToolNotFoundError naming every missing tool */
export function requireTools(runner: CommandRunner, tools: string[]): void {
  const missing = tools.filter((t) => !runner.exists(t));
  if (missing.length > 0) throw new ToolNotFoundError(missing);
}

/** Kernel tree's own kconfig scripts */
export class KernelConfigTool {
  constructor(
    private readonly runner: CommandRunner,
    private readonly layout: Pick<TreeLayout, "merge_script" | "config_script">
  ) {}

  /** Merge fragments in order; later files win on duplicate symbols */
  async merge(files: string[]): Promise<void> {
    await runChecked(this.runner, this.layout.merge_script, files);
  }

  async setString(symbol: string, value: string): Promise<void> {
    await runChecked(this.runner, this.layout.config_script, ["--set-str", symbol, value]);
  }

  async enable(symbol: string): Promise<void> {
    await runChecked(this.runner, this.layout.config_script, ["--enable", symbol]);
  }
}

export class KernelCompiler {
  constructor(private readonly runner: CommandRunner) {}

  async make(jobs: number): Promise<void> {
    await runChecked(this.runner, "make", ["-j", String(jobs)]);
  }
}

/** Downloads or updates the Magisk payload bundled into the kernel */
export class MagiskPayload {
  constructor(
    private readonly runner: CommandRunner,
    private readonly root: string,
    private readonly config: MagiskConfig
  ) {}

  /** Sync the stable or canary payload and return its version string */
  async sync(canary: boolean): Promise<string> {
    const result = await this.runner.exec(this.config.update_script, canary ? ["--canary"] : []);
    if (result.exitCode !== 0) {
      throw new MagiskSyncError(
        `Magisk ${canary ? "canary" : "stable"} update failed with status ${result.exitCode}`
      );
    }

    const versionPath = path.join(this.root, this.config.version_file);
    if (!fs.existsSync(versionPath)) {
      throw new MagiskSyncError(`Magisk version file not found: ${this.config.version_file}`);
    }
    return fs.readFileSync(versionPath, "utf-8").split("\n")[0].trim();
  }
}

/** adb, for the device in normal mode */
export class AdbClient {
  constructor(private readonly runner: CommandRunner) {}

  async waitForDevice(): Promise<void> {
    await runChecked(this.runner, "adb", ["wait-for-device"]);
  }

  async rebootToDownload(): Promise<void> {
    await runChecked(this.runner, "adb", ["reboot", "download"]);
  }

  async kernelVersion(): Promise<string> {
    const result = await runChecked(this.runner, "adb", ["shell", "cat", "/proc/version"], {
      capture: true,
    });
    return result.stdout.trim();
  }
}

/** heimdall, for the device in download mode */
export class HeimdallClient {
  constructor(private readonly runner: CommandRunner) {}

  /** Probe only: a non-zero exit means no device in download mode */
  async detect(): Promise<boolean> {
    const result = await this.runner.exec("heimdall", ["detect"], { silent: true });
    return result.exitCode === 0;
  }

  async flashBoot(image: string): Promise<void> {
    await runChecked(this.runner, "heimdall", ["flash", "--BOOT", image]);
  }
}
