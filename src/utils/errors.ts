/**
 * Typed error classes for kforge.
 *
 * Hierarchy:
 *   KforgeError (base)
 *   ├── UsageError             rejected command line (hints, usage is printed)
 *   ├── ConfigValidationError  .kforge/config.yaml failed validation
 *   ├── MagiskSyncError        Magisk payload update failed
 *   ├── ToolNotFoundError      host tools missing from PATH (tools)
 *   ├── MissingInputFileError  packaging input absent (filePath)
 *   ├── ToolExecutionError     external tool exited non-zero (toolName, exitCode)
 *   └── StageFailedError       pipeline stage aborted by a tool (stage, exitCode)
 */

import type { Stage } from "../core/stages.js";

export type UsageErrorCode =
  | "UNKNOWN_STAGE"
  | "UNKNOWN_CONFIG_KEY"
  | "EMPTY_CONFIG_VALUE"
  | "UNKNOWN_MODEL"
  | "INVALID_DATE_FORMAT"
  | "INVALID_SWITCH"
  | "UNKNOWN_CONFIG"
  | "MISSING_MODEL";

export type ErrorCode =
  | UsageErrorCode
  | "CONFIG_INVALID"
  | "MAGISK_SYNC_FAILED"
  | "TOOL_NOT_FOUND"
  | "MISSING_INPUT_FILE"
  | "TOOL_EXECUTION_ERROR"
  | "STAGE_FAILED";

/** Base error for all kforge-specific errors */
export class KforgeError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = "KforgeError";
    this.code = code;
  }

  /** Process exit status reported for this failure */
  get exitStatus(): number {
    return 1;
  }
}

/** Command-line validation failures */
export class UsageError extends KforgeError {
  readonly hints: string[];

  constructor(message: string, code: UsageErrorCode, hints: string[] = []) {
    super(message, code);
    this.name = "UsageError";
    this.hints = hints;
  }
}

/** Layered configuration failed to parse or validate */
export class ConfigValidationError extends KforgeError {
  readonly source: string;

  constructor(message: string, source: string) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigValidationError";
    this.source = source;
  }
}

export class MagiskSyncError extends KforgeError {
  constructor(message: string) {
    super(message, "MAGISK_SYNC_FAILED");
    this.name = "MagiskSyncError";
  }
}

export class ToolNotFoundError extends KforgeError {
  readonly tools: string[];

  constructor(tools: string[]) {
    super(`Please, install ${tools.map((t) => `'${t}'`).join(", ")}.`, "TOOL_NOT_FOUND");
    this.name = "ToolNotFoundError";
    this.tools = tools;
  }
}

export class MissingInputFileError extends KforgeError {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Can't find file '${filePath}'.`, "MISSING_INPUT_FILE");
    this.name = "MissingInputFileError";
    this.filePath = filePath;
  }
}

/** External tool returned a non-zero exit status */
export class ToolExecutionError extends KforgeError {
  readonly toolName: string;
  readonly exitCode: number;

  constructor(toolName: string, exitCode: number) {
    super(`${toolName} exited with status ${exitCode}`, "TOOL_EXECUTION_ERROR");
    this.name = "ToolExecutionError";
    this.toolName = toolName;
    this.exitCode = exitCode;
  }

  get exitStatus(): number {
    return this.exitCode > 0 ? this.exitCode : 1;
  }
}

/** A pipeline stage aborted; carries the failing tool's exit status */
export class StageFailedError extends KforgeError {
  readonly stage: Stage;
  readonly toolName: string;
  readonly exitCode: number;

  constructor(stage: Stage, cause: ToolExecutionError) {
    super(`Stage '${stage}' failed: ${cause.message}`, "STAGE_FAILED");
    this.name = "StageFailedError";
    this.stage = stage;
    this.toolName = cause.toolName;
    this.exitCode = cause.exitCode;
  }

  get exitStatus(): number {
    return this.exitCode > 0 ? this.exitCode : 1;
  }
}

/** Node system error with an errno code (ENOENT, EEXIST, ...) */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
