import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  KforgeError,
  UsageError,
  ConfigValidationError,
  MagiskSyncError,
  ToolNotFoundError,
  MissingInputFileError,
  ToolExecutionError,
  StageFailedError,
  isErrnoException,
} from "../../../src/utils/errors.js";
import { renderError } from "../../../src/utils/render-error.js";

describe("KforgeError", () => {
  it("sets code and message", () => {
    const err = new KforgeError("something broke", "STAGE_FAILED");
    assert.equal(err.message, "something broke");
    assert.equal(err.code, "STAGE_FAILED");
    assert.equal(err.name, "KforgeError");
    assert.equal(err.exitStatus, 1);
  });

  it("is instanceof Error", () => {
    const err = new KforgeError("test", "CONFIG_INVALID");
    assert.ok(err instanceof Error);
    assert.ok(err instanceof KforgeError);
  });
});

describe("UsageError", () => {
  it("carries code and hints", () => {
    const err = new UsageError("Unknown stage 'foo'.", "UNKNOWN_STAGE", ["Use one of: config."]);
    assert.equal(err.code, "UNKNOWN_STAGE");
    assert.deepEqual(err.hints, ["Use one of: config."]);
    assert.equal(err.exitStatus, 1);
    assert.ok(err instanceof KforgeError);
  });

  it("defaults to no hints", () => {
    assert.deepEqual(new UsageError("x", "MISSING_MODEL").hints, []);
  });
});

describe("ToolNotFoundError", () => {
  it("names every missing tool", () => {
    const err = new ToolNotFoundError(["adb", "heimdall"]);
    assert.equal(err.message, "Please, install 'adb', 'heimdall'.");
    assert.equal(err.code, "TOOL_NOT_FOUND");
    assert.deepEqual(err.tools, ["adb", "heimdall"]);
  });
});

describe("MissingInputFileError", () => {
  it("names the file", () => {
    const err = new MissingInputFileError("arch/arm64/boot/Image");
    assert.equal(err.message, "Can't find file 'arch/arm64/boot/Image'.");
    assert.equal(err.filePath, "arch/arm64/boot/Image");
    assert.equal(err.code, "MISSING_INPUT_FILE");
  });
});

describe("StageFailedError", () => {
  it("carries stage, tool and the tool's exit status", () => {
    const err = new StageFailedError("build", new ToolExecutionError("make", 2));
    assert.equal(err.stage, "build");
    assert.equal(err.toolName, "make");
    assert.equal(err.exitCode, 2);
    assert.equal(err.exitStatus, 2);
    assert.equal(err.code, "STAGE_FAILED");
    assert.equal(err.message, "Stage 'build' failed: make exited with status 2");
  });

  it("never reports a zero exit status", () => {
    const err = new StageFailedError("flash", new ToolExecutionError("heimdall", 0));
    assert.equal(err.exitStatus, 1);
  });
});

describe("other error classes", () => {
  it("use their codes", () => {
    assert.equal(new MagiskSyncError("x").code, "MAGISK_SYNC_FAILED");
    assert.equal(new ConfigValidationError("x", "config.yaml").source, "config.yaml");
    assert.equal(new ConfigValidationError("x", "config.yaml").code, "CONFIG_INVALID");
    assert.equal(new ToolExecutionError("make", 3).exitStatus, 3);
  });
});

describe("isErrnoException", () => {
  it("recognizes errors with a code", () => {
    const err = Object.assign(new Error("missing"), { code: "ENOENT" });
    assert.equal(isErrnoException(err), true);
    assert.equal(isErrnoException(new Error("plain")), false);
    assert.equal(isErrnoException("ENOENT"), false);
  });
});

describe("renderError", () => {
  it("lists hints for usage errors", () => {
    const err = new UsageError("Unknown config 'zram'.", "UNKNOWN_CONFIG", ["Available: bfq"]);
    assert.equal(renderError(err), "Unknown config 'zram'.\n\nHow to fix:\n  - Available: bfq");
  });

  it("prints the message of other errors", () => {
    assert.equal(renderError(new MissingInputFileError("boot.img")), "Can't find file 'boot.img'.");
    assert.equal(renderError("plain"), "plain");
  });
});
