import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  STAGES,
  acceptsConfigTokens,
  isStageKeyword,
  resolveStages,
} from "../../../src/core/stages.js";

describe("resolveStages", () => {
  it("runs every stage up to and including a bare stage", () => {
    assert.deepEqual(resolveStages("config"), ["config"]);
    assert.deepEqual(resolveStages("build"), ["config", "build"]);
    assert.deepEqual(resolveStages("mkimg"), ["config", "build", "mkimg"]);
    assert.deepEqual(resolveStages("flash"), ["config", "build", "mkimg", "flash"]);
  });

  it("runs only the named stage with a ':' prefix", () => {
    assert.deepEqual(resolveStages(":build"), ["build"]);
    assert.deepEqual(resolveStages(":mkimg"), ["mkimg"]);
    assert.deepEqual(resolveStages(":flash"), ["flash"]);
  });

  it("returns a fresh array", () => {
    const stages = resolveStages("flash");
    stages.pop();
    assert.equal(STAGES.length, 4);
  });
});

describe("isStageKeyword", () => {
  it("accepts the seven keywords", () => {
    for (const k of ["config", "build", "mkimg", "flash", ":build", ":mkimg", ":flash"]) {
      assert.equal(isStageKeyword(k), true, k);
    }
  });

  it("rejects anything else", () => {
    for (const k of [":config", "Config", "all", "", "flash:"]) {
      assert.equal(isStageKeyword(k), false, k);
    }
  });
});

describe("acceptsConfigTokens", () => {
  it("is true for bare stages and :mkimg only", () => {
    assert.equal(acceptsConfigTokens("config"), true);
    assert.equal(acceptsConfigTokens("flash"), true);
    assert.equal(acceptsConfigTokens(":mkimg"), true);
    assert.equal(acceptsConfigTokens(":build"), false);
    assert.equal(acceptsConfigTokens(":flash"), false);
  });
});
