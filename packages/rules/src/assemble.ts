import {
  classifyOverrides,
  normalizeModelPath,
  type ConversionMode,
  type Diagnostic,
  type DispatchProperty,
  type ModelRef,
  type RangeDispatchDocument
} from "@modelshift/core";
import { buildDispatchEntries, buildStandaloneModels, type StandaloneModel } from "./builder.js";
import type { LegacySource } from "./legacy.js";

export type NotApplicableReason =
  | "no-overrides"
  | "schema-mismatch"
  | "mode-incompatible"
  | "no-entries"
  | "fallback-missing";

export type AssemblyResult =
  | { status: "dispatch"; document: RangeDispatchDocument; diagnostics: Diagnostic[] }
  | { status: "standalone"; models: StandaloneModel[]; diagnostics: Diagnostic[] }
  | { status: "not-applicable"; reason: NotApplicableReason; diagnostics: Diagnostic[] };

export interface AssembleOptions {
  mode: ConversionMode;
  namespace?: string;
}

const DISPATCH_PROPERTY: Record<"cmd" | "damage", DispatchProperty> = {
  cmd: "custom_model_data",
  damage: "damage"
};

/**
 * Fallback model of a dispatch document: the base model implied by
 * `textures.layer0` when present, otherwise `parent`.
 */
export function resolveFallback(source: LegacySource, namespace?: string): ModelRef | undefined {
  const layer0 = source.textures?.layer0;
  if (typeof layer0 === "string" && layer0.trim()) {
    return { type: "model", model: normalizeModelPath(layer0, { context: "texture", namespace }).modelRef };
  }
  if (typeof source.parent === "string" && source.parent.trim()) {
    return { type: "model", model: normalizeModelPath(source.parent, { context: "model", namespace }).modelRef };
  }
  return undefined;
}

export function assembleDocument(source: LegacySource, options: AssembleOptions): AssemblyResult {
  const { mode, namespace } = options;
  const overrides = source.overrides ?? [];
  if (overrides.length === 0) {
    return { status: "not-applicable", reason: "no-overrides", diagnostics: [] };
  }

  const classified = classifyOverrides(overrides);
  const diagnostics: Diagnostic[] = [...classified.warnings];
  const { recognized } = classified;

  const accepted =
    mode === "item"
      ? recognized
      : mode === "cmd"
        ? recognized.filter((o) => o.predicate.kind !== "damage")
        : recognized.filter((o) => o.predicate.kind === "damage");

  // Damage mode rejects CMD-bearing files before looking for damage entries.
  const cmdBearingInDamageMode = mode === "damage" && recognized.some((o) => o.predicate.kind !== "damage");

  if (accepted.length === 0 && !cmdBearingInDamageMode) {
    diagnostics.push({
      code: "SCHEMA_MISMATCH",
      severity: "info",
      message: `No override matches ${mode} mode.`
    });
    return { status: "not-applicable", reason: "schema-mismatch", diagnostics };
  }

  if (mode === "item") {
    const built = buildStandaloneModels(accepted, { namespace });
    diagnostics.push(...built.diagnostics);
    if (built.models.length === 0) {
      return noEntries(diagnostics);
    }
    return { status: "standalone", models: built.models, diagnostics };
  }

  // Handed every recognized override so mismatched ones are reported.
  const built = buildDispatchEntries(recognized, mode, { namespace });
  diagnostics.push(...built.diagnostics);
  if (!built.ok) {
    return { status: "not-applicable", reason: built.reason, diagnostics };
  }
  if (built.entries.length === 0) {
    return noEntries(diagnostics);
  }

  let fallback: ModelRef | undefined;
  try {
    fallback = resolveFallback(source, namespace);
  } catch (error) {
    diagnostics.push({
      code: "FALLBACK_INVALID",
      severity: "warning",
      message: (error as Error).message
    });
    return { status: "not-applicable", reason: "fallback-missing", diagnostics };
  }
  if (!fallback) {
    diagnostics.push({
      code: "FALLBACK_MISSING",
      severity: "warning",
      message: "Document has neither textures.layer0 nor parent to fall back to."
    });
    return { status: "not-applicable", reason: "fallback-missing", diagnostics };
  }

  return {
    status: "dispatch",
    document: {
      model: {
        type: "range_dispatch",
        property: DISPATCH_PROPERTY[mode],
        fallback,
        entries: built.entries
      }
    },
    diagnostics
  };
}

function noEntries(diagnostics: Diagnostic[]): AssemblyResult {
  diagnostics.push({
    code: "NO_APPLICABLE_ENTRIES",
    severity: "info",
    message: "No override produced a usable entry."
  });
  return { status: "not-applicable", reason: "no-entries", diagnostics };
}

export function serializeDocument(document: object, indent = 2): string {
  return `${JSON.stringify(document, null, indent)}\n`;
}
