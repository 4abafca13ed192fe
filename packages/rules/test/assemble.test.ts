import { describe, expect, it } from "vitest";
import type { LegacyModelDocument } from "@modelshift/core";
import { assembleDocument, resolveFallback, serializeDocument } from "../src/index.js";

const catHat: LegacyModelDocument = {
  parent: "item/handheld",
  textures: { layer0: "item/stick" },
  overrides: [{ predicate: { custom_model_data: 19002 }, model: "custom_items/cat_hat/cat_hat_black" }]
};

describe("assembleDocument", () => {
  it("merges custom_model_data overrides into one range dispatch", () => {
    const out = assembleDocument(catHat, { mode: "cmd" });
    expect(out.status).toBe("dispatch");
    if (out.status !== "dispatch") return;
    expect(out.document).toEqual({
      model: {
        type: "range_dispatch",
        property: "custom_model_data",
        fallback: { type: "model", model: "item/stick" },
        entries: [
          {
            threshold: 19002,
            model: { type: "model", model: "custom_items/cat_hat/cat_hat_black" }
          }
        ]
      }
    });
    expect(out.diagnostics).toEqual([]);
  });

  it("emits one standalone model per override in item mode", () => {
    const out = assembleDocument(catHat, { mode: "item" });
    expect(out.status).toBe("standalone");
    if (out.status !== "standalone") return;
    expect(out.models).toEqual([
      {
        index: 0,
        path: {
          modelRef: "custom_items/cat_hat/cat_hat_black",
          relativeFilePath: "custom_items/cat_hat/cat_hat_black.json",
          namespace: "minecraft"
        },
        document: { model: { type: "model", model: "custom_items/cat_hat/cat_hat_black" } }
      }
    ]);
  });

  it("builds an ascending damage dispatch over the base model", () => {
    const out = assembleDocument(
      {
        parent: "item/handheld",
        textures: { layer0: "item/wood_sword" },
        overrides: [
          { predicate: { damaged: 0, damage: 0.5 }, model: "item/wood_sword_cracked" },
          { predicate: { damaged: 0, damage: 0.25 }, model: "item/wood_sword_worn" }
        ]
      },
      { mode: "damage" }
    );
    expect(out.status).toBe("dispatch");
    if (out.status !== "dispatch") return;
    expect(out.document.model.property).toBe("damage");
    expect(out.document.model.fallback).toEqual({ type: "model", model: "item/wood_sword" });
    expect(out.document.model.entries).toEqual([
      { threshold: 0.25, model: { type: "model", model: "item/wood_sword_worn" } },
      { threshold: 0.5, model: { type: "model", model: "item/wood_sword_cracked" } }
    ]);
    expect(out.diagnostics.map((d) => d.code)).toEqual(["OVERRIDES_REORDERED"]);
  });

  it("rejects custom_model_data with damage in damage mode", () => {
    const out = assembleDocument(
      {
        parent: "item/handheld",
        textures: { layer0: "item/iron_sword" },
        overrides: [{ predicate: { custom_model_data: 5, damage: 0.3 }, model: "custom/blade" }]
      },
      { mode: "damage" }
    );
    expect(out.status).toBe("not-applicable");
    if (out.status !== "not-applicable") return;
    expect(out.reason).toBe("mode-incompatible");
    expect(out.diagnostics.map((d) => d.code)).toEqual(["MODE_INCOMPATIBLE"]);
  });

  it("never partially converts a file that mixes damage and cmd predicates in damage mode", () => {
    const out = assembleDocument(
      {
        parent: "item/generated",
        textures: { layer0: "item/bow" },
        overrides: [
          { predicate: { damage: 0.5 }, model: "item/bow_worn" },
          { predicate: { custom_model_data: 2 }, model: "custom/bow" }
        ]
      },
      { mode: "damage" }
    );
    expect(out.status).toBe("not-applicable");
    if (out.status !== "not-applicable") return;
    expect(out.reason).toBe("mode-incompatible");
  });

  it("reports cmd-only files in damage mode as incompatible", () => {
    const out = assembleDocument(catHat, { mode: "damage" });
    expect(out.status).toBe("not-applicable");
    if (out.status !== "not-applicable") return;
    expect(out.reason).toBe("mode-incompatible");
  });

  it("skips damage overrides in cmd mode and collapses duplicate thresholds", () => {
    const out = assembleDocument(
      {
        textures: { layer0: "item/carrot_on_a_stick" },
        overrides: [
          { predicate: { custom_model_data: 10 }, model: "custom/a" },
          { predicate: { damage: 0.5 }, model: "custom/b" },
          { predicate: { custom_model_data: 3 }, model: "custom/c" },
          { predicate: { custom_model_data: 10 }, model: "custom/d" }
        ]
      },
      { mode: "cmd" }
    );
    expect(out.status).toBe("dispatch");
    if (out.status !== "dispatch") return;
    expect(out.document.model.entries).toEqual([
      { threshold: 3, model: { type: "model", model: "custom/c" } },
      { threshold: 10, model: { type: "model", model: "custom/d" } }
    ]);
    expect(out.diagnostics.map((d) => d.code)).toEqual([
      "MODE_ENTRY_SKIPPED",
      "OVERRIDES_REORDERED",
      "THRESHOLD_DUPLICATE"
    ]);
  });

  it("reports a schema mismatch when nothing matches the mode", () => {
    const out = assembleDocument(
      {
        parent: "item/generated",
        overrides: [{ predicate: { damage: 0.5 }, model: "item/x" }]
      },
      { mode: "cmd" }
    );
    expect(out).toEqual({
      status: "not-applicable",
      reason: "schema-mismatch",
      diagnostics: [{ code: "SCHEMA_MISMATCH", severity: "info", message: "No override matches cmd mode." }]
    });
  });

  it("treats documents without overrides as not applicable", () => {
    expect(assembleDocument({ parent: "item/generated" }, { mode: "item" })).toEqual({
      status: "not-applicable",
      reason: "no-overrides",
      diagnostics: []
    });
  });

  it("skips dispatch documents that have nothing to fall back to", () => {
    const out = assembleDocument(
      { overrides: [{ predicate: { custom_model_data: 1 }, model: "custom/a" }] },
      { mode: "cmd" }
    );
    expect(out.status).toBe("not-applicable");
    if (out.status !== "not-applicable") return;
    expect(out.reason).toBe("fallback-missing");
  });
});

describe("resolveFallback", () => {
  it("prefers layer0 over parent", () => {
    expect(resolveFallback({ parent: "item/handheld", textures: { layer0: "minecraft:item/stick" } })).toEqual({
      type: "model",
      model: "item/stick"
    });
  });

  it("falls back to parent when no layer0 is set", () => {
    expect(resolveFallback({ parent: "minecraft:item/diamond_sword" })).toEqual({
      type: "model",
      model: "item/diamond_sword"
    });
  });
});

describe("serializeDocument", () => {
  it("writes two-space JSON with a trailing newline", () => {
    expect(serializeDocument({ model: { type: "model", model: "a" } })).toBe(
      '{\n  "model": {\n    "type": "model",\n    "model": "a"\n  }\n}\n'
    );
  });
});
