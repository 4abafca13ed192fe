import { describe, expect, it } from "vitest";
import { classifyOverrides, classifyPredicate } from "../src/index.js";

describe("classifyPredicate", () => {
  it("tags custom_model_data alone as cmd", () => {
    expect(classifyPredicate({ custom_model_data: 19002 })).toEqual({
      kind: "cmd",
      customModelData: 19002,
      ignoredKeys: []
    });
  });

  it("prefers cmd+damage when both keys are present", () => {
    expect(classifyPredicate({ custom_model_data: 5, damage: 0.3 })).toEqual({
      kind: "cmd+damage",
      customModelData: 5,
      damage: 0.3,
      ignoredKeys: []
    });
  });

  it("treats damaged as damage-bearing next to custom_model_data", () => {
    expect(classifyPredicate({ custom_model_data: 7, damaged: 1 })).toEqual({
      kind: "cmd+damage",
      customModelData: 7,
      damage: null,
      ignoredKeys: []
    });
  });

  it("tags damage without custom_model_data as damage", () => {
    expect(classifyPredicate({ damaged: 0, damage: 0.25 })).toEqual({
      kind: "damage",
      damage: 0.25,
      ignoredKeys: []
    });
  });

  it("rejects damaged without damage", () => {
    const out = classifyPredicate({ damaged: 1 });
    expect(out.kind).toBe("unrecognized");
  });

  it("rejects unsupported key sets", () => {
    expect(classifyPredicate({ pulling: 1, pull: 0.5 })).toEqual({
      kind: "unrecognized",
      reason: "unsupported predicate keys: pull, pulling"
    });
    expect(classifyPredicate({})).toEqual({ kind: "unrecognized", reason: "empty predicate" });
    expect(classifyPredicate(null).kind).toBe("unrecognized");
    expect(classifyPredicate([1]).kind).toBe("unrecognized");
  });

  it("rejects non-numeric values", () => {
    expect(classifyPredicate({ custom_model_data: "12" })).toEqual({
      kind: "unrecognized",
      reason: "\"custom_model_data\" is not a number"
    });
  });

  it("truncates fractional custom_model_data and lists extra keys", () => {
    expect(classifyPredicate({ custom_model_data: 12.9, pulling: 1 })).toEqual({
      kind: "cmd",
      customModelData: 12,
      ignoredKeys: ["pulling"]
    });
  });
});

describe("classifyOverrides", () => {
  it("keeps recognized overrides with their source index", () => {
    const out = classifyOverrides([
      { predicate: { custom_model_data: 1 }, model: "a" },
      { predicate: { pulling: 1 }, model: "b" },
      { predicate: { damage: 0.5 } },
      "junk",
      { predicate: { damage: 0.5 }, model: "c" }
    ]);
    expect(out.recognized.map((o) => [o.index, o.model, o.predicate.kind])).toEqual([
      [0, "a", "cmd"],
      [4, "c", "damage"]
    ]);
    expect(out.warnings.map((w) => w.code)).toEqual([
      "PREDICATE_UNRECOGNIZED",
      "OVERRIDE_MODEL_MISSING",
      "OVERRIDE_INVALID"
    ]);
  });
});
