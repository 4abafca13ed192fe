import {
  isCmdBearing,
  normalizeModelPath,
  type ClassifiedOverride,
  type Diagnostic,
  type DispatchEntry,
  type NormalizedPath,
  type StandaloneModelDocument
} from "@modelshift/core";

export type DispatchMode = "cmd" | "damage";

export interface RuleOptions {
  namespace?: string;
}

interface PendingEntry {
  index: number;
  threshold: number;
  modelRef: string;
}

export type DispatchBuildResult =
  | { ok: true; entries: DispatchEntry[]; diagnostics: Diagnostic[] }
  | { ok: false; reason: "mode-incompatible"; diagnostics: Diagnostic[] };

export interface StandaloneModel {
  index: number;
  path: NormalizedPath;
  document: StandaloneModelDocument;
}

function normalizeOverrideModel(
  override: ClassifiedOverride,
  options: RuleOptions,
  diagnostics: Diagnostic[]
): NormalizedPath | undefined {
  try {
    return normalizeModelPath(override.model, { context: "model", namespace: options.namespace });
  } catch (error) {
    diagnostics.push({
      code: "MODEL_PATH_INVALID",
      severity: "warning",
      message: `Override #${override.index} skipped: ${(error as Error).message}`
    });
    return undefined;
  }
}

function noteIgnoredKeys(override: ClassifiedOverride, diagnostics: Diagnostic[]): void {
  const { ignoredKeys } = override.predicate;
  if (ignoredKeys.length === 0) return;
  diagnostics.push({
    code: "PREDICATE_KEYS_IGNORED",
    severity: "warning",
    message: `Override #${override.index}: predicate keys ${ignoredKeys.join(", ")} have no dispatch equivalent and were dropped.`
  });
}

/**
 * Sorts entries ascending by threshold. Ties keep source order and then
 * collapse onto the last one, which is the override a legacy client applied.
 */
export function orderEntries(pending: readonly PendingEntry[]): { entries: DispatchEntry[]; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];

  const reordered = pending.some((entry, i) => {
    const previous = pending[i - 1];
    return previous !== undefined && entry.threshold < previous.threshold;
  });
  if (reordered) {
    diagnostics.push({
      code: "OVERRIDES_REORDERED",
      severity: "info",
      message: "Overrides were not in ascending threshold order and have been sorted."
    });
  }

  const sorted = [...pending].sort((a, b) => a.threshold - b.threshold);
  const entries: DispatchEntry[] = [];
  for (const entry of sorted) {
    const last = entries[entries.length - 1];
    const built: DispatchEntry = { threshold: entry.threshold, model: { type: "model", model: entry.modelRef } };
    if (last && last.threshold === entry.threshold) {
      diagnostics.push({
        code: "THRESHOLD_DUPLICATE",
        severity: "warning",
        message: `Threshold ${entry.threshold} appears more than once; keeping override #${entry.index} (${entry.modelRef}).`
      });
      entries[entries.length - 1] = built;
      continue;
    }
    entries.push(built);
  }

  return { entries, diagnostics };
}

export function buildDispatchEntries(
  overrides: readonly ClassifiedOverride[],
  mode: DispatchMode,
  options: RuleOptions = {}
): DispatchBuildResult {
  const diagnostics: Diagnostic[] = [];

  if (mode === "damage") {
    const bearing = overrides.filter((o) => isCmdBearing(o.predicate));
    if (bearing.length > 0) {
      diagnostics.push({
        code: "MODE_INCOMPATIBLE",
        severity: "warning",
        message: `Damage mode cannot convert custom_model_data predicates (overrides ${bearing
          .map((o) => `#${o.index}`)
          .join(", ")}); use cmd or item mode for this file.`
      });
      return { ok: false, reason: "mode-incompatible", diagnostics };
    }
  }

  const pending: PendingEntry[] = [];
  for (const override of overrides) {
    const { predicate } = override;
    let threshold: number;
    if (mode === "cmd") {
      if (predicate.kind === "damage") {
        diagnostics.push({
          code: "MODE_ENTRY_SKIPPED",
          severity: "warning",
          message: `Override #${override.index} skipped: damage-only predicates need damage mode.`
        });
        continue;
      }
      if (predicate.kind === "cmd+damage") {
        diagnostics.push({
          code: "DAMAGE_CONDITION_DROPPED",
          severity: "info",
          message: `Override #${override.index}: damage condition dropped, dispatching on custom_model_data ${predicate.customModelData} only.`
        });
      }
      threshold = predicate.customModelData;
    } else {
      if (predicate.kind !== "damage") continue;
      if (predicate.damage < 0 || predicate.damage > 1) {
        diagnostics.push({
          code: "DAMAGE_OUT_OF_RANGE",
          severity: "warning",
          message: `Override #${override.index}: damage ${predicate.damage} is outside 0..1.`
        });
      }
      threshold = predicate.damage;
    }

    const path = normalizeOverrideModel(override, options, diagnostics);
    if (!path) continue;
    noteIgnoredKeys(override, diagnostics);
    pending.push({ index: override.index, threshold, modelRef: path.modelRef });
  }

  const ordered = orderEntries(pending);
  return { ok: true, entries: ordered.entries, diagnostics: [...diagnostics, ...ordered.diagnostics] };
}

export function buildStandaloneModels(
  overrides: readonly ClassifiedOverride[],
  options: RuleOptions = {}
): { models: StandaloneModel[]; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const models: StandaloneModel[] = [];

  for (const override of overrides) {
    const path = normalizeOverrideModel(override, options, diagnostics);
    if (!path) continue;
    noteIgnoredKeys(override, diagnostics);
    models.push({
      index: override.index,
      path,
      document: { model: { type: "model", model: path.modelRef } }
    });
  }

  return { models, diagnostics };
}
