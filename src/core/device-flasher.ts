import { setTimeout as sleep } from "node:timers/promises";
import * as log from "../utils/logger.js";
import { withSpinner } from "../utils/ui.js";

export type FlasherState = "unknown" | "normal" | "download" | "flashing" | "verified";

const TRANSITIONS: Record<FlasherState, readonly FlasherState[]> = {
  unknown: ["normal", "download"],
  normal: ["download"],
  download: ["flashing"],
  flashing: ["verified"],
  verified: [],
};

/** Device in normal mode (adb) */
export interface DeviceBridge {
  waitForDevice(): Promise<void>;
  rebootToDownload(): Promise<void>;
  kernelVersion(): Promise<string>;
}

/** Device in download mode (heimdall) */
export interface DownloadModeTool {
  detect(): Promise<boolean>;
  flashBoot(image: string): Promise<void>;
}

export interface FlasherOptions {
  pollIntervalMs: number;
  sleep?: (ms: number) => Promise<unknown>;
  onTransition?: (from: FlasherState, to: FlasherState) => void;
}

/**
 * Drives a device from wherever it is into download mode, flashes the boot
 * image and waits for it to come back up.
 *
 *   unknown ──detect──▶ download
 *      │                   ▲
 *      └─wait─▶ normal ─reboot+poll─┘
 *   download ─flash─▶ flashing ─boot+version─▶ verified
 *
 * Waits have no timeout; the only way out is interrupting the process.
 */
export class DeviceFlasher {
  private current: FlasherState = "unknown";
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(
    private readonly bridge: DeviceBridge,
    private readonly download: DownloadModeTool,
    private readonly options: FlasherOptions
  ) {
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
  }

  get state(): FlasherState {
    return this.current;
  }

  /** Flash `image` and return the kernel version the device boots with */
  async flash(image: string): Promise<string> {
    if (this.current !== "unknown") {
      throw new Error(`Flasher already used (state: ${this.current})`);
    }

    if (await this.download.detect()) {
      this.transition("download");
    } else {
      await withSpinner("Waiting for the device...", () => this.bridge.waitForDevice());
      this.transition("normal");
      await this.bridge.rebootToDownload();
      await withSpinner("Waiting for download mode...", () => this.pollDownloadMode());
      this.transition("download");
    }

    this.transition("flashing");
    log.info(`Flashing ${image}...`);
    await this.download.flashBoot(image);

    await withSpinner("Waiting for the device...", () => this.bridge.waitForDevice());
    const version = await this.bridge.kernelVersion();
    this.transition("verified");
    log.output(version);
    return version;
  }

  private async pollDownloadMode(): Promise<void> {
    while (!(await this.download.detect())) {
      await this.sleep(this.options.pollIntervalMs);
    }
  }

  private transition(to: FlasherState): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid flasher transition: ${from} -> ${to}`);
    }
    this.current = to;
    log.debug(`flasher: ${from} -> ${to}`);
    this.options.onTransition?.(from, to);
  }
}
