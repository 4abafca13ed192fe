export type ConversionMode = "cmd" | "item" | "damage";

export const CONVERSION_MODES: readonly ConversionMode[] = ["cmd", "item", "damage"];

export interface Diagnostic {
  code: string;
  severity: "info" | "warning" | "error";
  message: string;
}

export interface LegacyOverride {
  predicate: Record<string, number>;
  model: string;
}

export interface LegacyModelDocument {
  parent?: string;
  textures?: Record<string, string>;
  overrides?: LegacyOverride[];
}

export type PredicateKind =
  | { kind: "cmd"; customModelData: number; ignoredKeys: string[] }
  | { kind: "cmd+damage"; customModelData: number; damage: number | null; ignoredKeys: string[] }
  | { kind: "damage"; damage: number; ignoredKeys: string[] }
  | { kind: "unrecognized"; reason: string };

export type RecognizedPredicate = Exclude<PredicateKind, { kind: "unrecognized" }>;

export interface ModelRef {
  type: "model";
  model: string;
}

export interface DispatchEntry {
  threshold: number;
  model: ModelRef;
}

export type DispatchProperty = "custom_model_data" | "damage";

export interface RangeDispatchDocument {
  model: {
    type: "range_dispatch";
    property: DispatchProperty;
    fallback: ModelRef;
    entries: DispatchEntry[];
  };
}

export interface StandaloneModelDocument {
  model: ModelRef;
}

export type PathContext = "texture" | "model";

export interface NormalizedPath {
  /** Reference written into output documents. */
  modelRef: string;
  /** Namespace-free path of the model file, with `.json` appended. */
  relativeFilePath: string;
  namespace: string;
}
