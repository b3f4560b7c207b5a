import { execFileSync, spawn } from "node:child_process";
import path from "node:path";
import { isErrnoException } from "../utils/errors.js";
import * as log from "../utils/logger.js";

/** Exit status reported when a tool is missing or not executable */
export const NOT_RUNNABLE_STATUS = 127;

export interface ExecOptions {
  /** Collect stdout instead of passing it through to the terminal */
  capture?: boolean;
  /** Discard stdout and stderr (probes) */
  silent?: boolean;
}

export interface ExecResult {
  command: string;
  exitCode: number;
  /** Captured stdout; empty unless `capture` was set */
  stdout: string;
  durationMs: number;
}

/**
 * The one seam between kforge and the host. Every external tool goes through
 * it, so tests substitute a recording fake.
 */
export interface CommandRunner {
  /** Run to completion. Resolves with the exit status, never rejects on non-zero. */
  exec(file: string, args: string[], options?: ExecOptions): Promise<ExecResult>;
  /** Whether `name` is on PATH and executable */
  exists(name: string): boolean;
}

/** Runs tools as child processes inside the kernel tree */
export class SpawnRunner implements CommandRunner {
  constructor(
    private readonly cwd: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  exec(file: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const command = [file, ...args].join(" ");
    // Tree-relative scripts (scripts/config) resolve against the tree, not our cwd
    const executable = file.includes("/") ? path.resolve(this.cwd, file) : file;
    const stdout = options.silent ? "ignore" : options.capture ? "pipe" : "inherit";
    const stderr = options.silent ? "ignore" : "inherit";

    log.debug(`exec: ${command}`);
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      const child = spawn(executable, args, {
        cwd: this.cwd,
        env: this.env,
        stdio: ["inherit", stdout, stderr],
      });

      let captured = "";
      if (child.stdout) {
        child.stdout.setEncoding("utf-8");
        child.stdout.on("data", (chunk: string) => {
          captured += chunk;
        });
      }

      let settled = false;
      child.on("error", (err) => {
        if (settled) return;
        settled = true;
        if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "EACCES")) {
          // 127: command not found, as a shell reports it
          log.debug(`${path.basename(file)} could not be started (${err.code})`);
          resolve({ command, exitCode: NOT_RUNNABLE_STATUS, stdout: "", durationMs: Date.now() - startTime });
          return;
        }
        reject(err);
      });
      child.on("close", (code) => {
        if (settled) return;
        settled = true;
        const durationMs = Date.now() - startTime;
        const exitCode = code ?? 1;
        log.debug(`${path.basename(file)} exited with ${exitCode} (${durationMs}ms)`);
        resolve({ command, exitCode, stdout: captured, durationMs });
      });
    });
  }

  exists(name: string): boolean {
    try {
      execFileSync("which", [name], { stdio: "ignore", env: this.env });
      return true;
    } catch {
      return false;
    }
  }
}
