import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { ModelPointer } from "../../../src/core/model-pointer.js";
import { createKernelTree, removeTree, writeFile } from "../../helpers/kernel-tree.js";

describe("ModelPointer", () => {
  let root: string;
  let pointer: ModelPointer;

  beforeEach(() => {
    root = createKernelTree({ metadata: { G973F: "pagesize=2048\n", G975F: "pagesize=2048\n" } });
    pointer = new ModelPointer(root, "build.mkbootimg");
  });

  afterEach(() => {
    removeTree(root);
  });

  it("names the metadata file", () => {
    assert.equal(pointer.metadataFile("G973F"), "build.mkbootimg.G973F");
    assert.equal(pointer.linkPath, path.join(root, "build.mkbootimg"));
  });

  it("reads nothing before the first write", () => {
    assert.equal(pointer.read(), undefined);
  });

  it("writes a relative symlink and reads it back", () => {
    pointer.write("G973F");
    assert.equal(fs.readlinkSync(pointer.linkPath), "build.mkbootimg.G973F");
    assert.equal(pointer.read(), "G973F");
  });

  it("replaces an existing link", () => {
    pointer.write("G973F");
    pointer.write("G975F");
    assert.equal(pointer.read(), "G975F");
  });

  it("ignores a dangling link", () => {
    pointer.write("N976B");
    assert.equal(fs.lstatSync(pointer.linkPath).isSymbolicLink(), true);
    assert.equal(pointer.read(), undefined);
  });

  it("ignores a regular file in place of the link", () => {
    writeFile(root, "build.mkbootimg", "not a link");
    assert.equal(pointer.read(), undefined);
  });
});
