import type { Diagnostic, LegacyOverride, PredicateKind, RecognizedPredicate } from "./types.js";

const KNOWN_KEYS = new Set(["custom_model_data", "damage", "damaged"]);

export interface ClassifiedOverride {
  index: number;
  model: string;
  predicate: RecognizedPredicate;
}

export interface OverrideClassification {
  recognized: ClassifiedOverride[];
  warnings: Diagnostic[];
}

function readNumber(predicate: Record<string, unknown>, key: string): number | undefined | null {
  if (!(key in predicate)) return undefined;
  const value = predicate[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function classifyPredicate(predicate: unknown): PredicateKind {
  if (!predicate || typeof predicate !== "object" || Array.isArray(predicate)) {
    return { kind: "unrecognized", reason: "predicate is not an object" };
  }
  const obj = predicate as Record<string, unknown>;

  const cmd = readNumber(obj, "custom_model_data");
  const damage = readNumber(obj, "damage");
  const damaged = readNumber(obj, "damaged");

  for (const [key, value] of [
    ["custom_model_data", cmd],
    ["damage", damage],
    ["damaged", damaged]
  ] as const) {
    if (value === null) {
      return { kind: "unrecognized", reason: `"${key}" is not a number` };
    }
  }

  const ignoredKeys = Object.keys(obj)
    .filter((key) => !KNOWN_KEYS.has(key))
    .sort();

  if (cmd !== undefined && cmd !== null) {
    const customModelData = Math.trunc(cmd);
    if (damage !== undefined || damaged !== undefined) {
      return { kind: "cmd+damage", customModelData, damage: damage ?? null, ignoredKeys };
    }
    return { kind: "cmd", customModelData, ignoredKeys };
  }

  if (damage !== undefined && damage !== null) {
    return { kind: "damage", damage, ignoredKeys };
  }

  if (damaged !== undefined) {
    return { kind: "unrecognized", reason: `"damaged" without a "damage" value` };
  }

  const keys = Object.keys(obj);
  return {
    kind: "unrecognized",
    reason: keys.length > 0 ? `unsupported predicate keys: ${keys.sort().join(", ")}` : "empty predicate"
  };
}

/**
 * Classifies every override of a legacy document once. Overrides that cannot
 * take part in any conversion (no `model`, unrecognized predicate) are left out
 * of `recognized` and reported as warnings.
 */
export function classifyOverrides(overrides: readonly unknown[]): OverrideClassification {
  const recognized: ClassifiedOverride[] = [];
  const warnings: Diagnostic[] = [];

  overrides.forEach((raw, index) => {
    if (!raw || typeof raw !== "object") {
      warnings.push({
        code: "OVERRIDE_INVALID",
        severity: "warning",
        message: `Override #${index} is not an object.`
      });
      return;
    }
    const override = raw as Partial<Record<keyof LegacyOverride, unknown>>;
    const predicate = classifyPredicate(override.predicate);
    if (predicate.kind === "unrecognized") {
      warnings.push({
        code: "PREDICATE_UNRECOGNIZED",
        severity: "warning",
        message: `Override #${index} skipped: ${predicate.reason}.`
      });
      return;
    }
    if (typeof override.model !== "string" || !override.model.trim()) {
      warnings.push({
        code: "OVERRIDE_MODEL_MISSING",
        severity: "warning",
        message: `Override #${index} skipped: missing "model" path.`
      });
      return;
    }
    recognized.push({ index, model: override.model, predicate });
  });

  return { recognized, warnings };
}

export function isCmdBearing(predicate: PredicateKind): boolean {
  return predicate.kind === "cmd" || predicate.kind === "cmd+damage";
}
