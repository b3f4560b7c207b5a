import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import { configureLogger, isLogLevel } from "../../../src/utils/logger.js";
import { pauseSpinner, withSpinner } from "../../../src/utils/ui.js";

// ora auto-disables on non-TTY (test environment); only state is checked.

describe("logger", () => {
  afterEach(() => {
    configureLogger("info", false);
  });

  it("recognizes log levels", () => {
    assert.equal(isLogLevel("debug"), true);
    assert.equal(isLogLevel("error"), true);
    assert.equal(isLogLevel("verbose"), false);
  });
});

describe("ui", () => {
  it("returns null when pausing with no spinner", () => {
    assert.equal(pauseSpinner(), null);
  });

  it("pauses the spinner of a running task", async () => {
    const resumed = await withSpinner("Waiting...", async () => {
      const resume = pauseSpinner();
      assert.ok(resume);
      resume();
      return true;
    });
    assert.equal(resumed, true);
  });

  it("withSpinner returns the task result and clears the spinner", async () => {
    const value = await withSpinner("Working...", async () => 42);
    assert.equal(value, 42);
    assert.equal(pauseSpinner(), null);
  });

  it("withSpinner rethrows and clears the spinner", async () => {
    await assert.rejects(
      withSpinner("Working...", async () => {
        throw new Error("boom");
      }),
      /boom/
    );
    assert.equal(pauseSpinner(), null);
  });
});
