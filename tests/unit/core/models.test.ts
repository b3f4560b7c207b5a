import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { BUILTIN_MODELS, ModelRegistry } from "../../../src/core/models.js";

describe("ModelRegistry", () => {
  it("knows the built-in models", () => {
    const registry = new ModelRegistry();
    assert.equal(registry.has("G973F"), true);
    assert.deepEqual(registry.get("N976B"), { id: "N976B", defconfig: "exynos9820-d2x_defconfig" });
    assert.deepEqual(registry.ids(), Object.keys(BUILTIN_MODELS));
  });

  it("rejects unknown models", () => {
    const registry = new ModelRegistry();
    assert.equal(registry.has("UNKNOWN"), false);
    assert.equal(registry.get("UNKNOWN"), undefined);
  });

  it("adds extra models after the built-ins", () => {
    const registry = new ModelRegistry({ G970U: "exynos9820-beyond0lte_usa_defconfig" });
    assert.equal(registry.has("G970U"), true);
    assert.equal(registry.ids().at(-1), "G970U");
    assert.equal(registry.ids().length, 8);
  });

  it("lets config point a built-in at another defconfig", () => {
    const registry = new ModelRegistry({ G973F: "custom_defconfig" });
    assert.equal(registry.get("G973F")?.defconfig, "custom_defconfig");
    assert.equal(registry.ids().length, 7);
  });
});
