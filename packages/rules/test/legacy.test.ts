import { describe, expect, it } from "vitest";
import { readLegacyDocument } from "../src/index.js";

function bytes(text: string): Uint8Array {
  return Buffer.from(text, "utf8");
}

describe("readLegacyDocument", () => {
  it("reads parent, textures and raw overrides", () => {
    const out = readLegacyDocument(
      bytes('{"parent":"item/generated","textures":{"layer0":"item/apple","bad":3},"overrides":[{"predicate":{"custom_model_data":1},"model":"a"}]}')
    );
    expect(out.valid).toBe(true);
    expect(out.document).toEqual({
      parent: "item/generated",
      textures: { layer0: "item/apple" },
      overrides: [{ predicate: { custom_model_data: 1 }, model: "a" }]
    });
    expect(out.warnings).toEqual([]);
  });

  it("accepts a leading byte order mark", () => {
    const out = readLegacyDocument(bytes('\uFEFF{"parent":"item/generated"}'));
    expect(out.valid).toBe(true);
    expect(out.document?.parent).toBe("item/generated");
  });

  it("reports invalid JSON without throwing", () => {
    const out = readLegacyDocument(bytes("{ not json"));
    expect(out.valid).toBe(false);
    expect(out.errors.map((e) => e.code)).toEqual(["JSON_INVALID"]);
  });

  it("rejects non-object roots", () => {
    const out = readLegacyDocument(bytes("[1,2]"));
    expect(out.valid).toBe(false);
    expect(out.errors.map((e) => e.code)).toEqual(["MODEL_ROOT_INVALID"]);
  });

  it("warns about malformed fields and keeps the rest", () => {
    const out = readLegacyDocument(bytes('{"parent":5,"textures":[],"overrides":{}}'));
    expect(out.valid).toBe(true);
    expect(out.document).toEqual({});
    expect(out.warnings.map((w) => w.code)).toEqual(["PARENT_INVALID", "TEXTURES_INVALID", "OVERRIDES_INVALID"]);
  });
});
