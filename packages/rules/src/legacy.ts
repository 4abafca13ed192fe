import type { Diagnostic, LegacyModelDocument } from "@modelshift/core";

/**
 * A legacy document as read from disk: `parent` and `textures` are
 * shape-checked, `overrides` entries are left raw for the classifier.
 */
export interface LegacySource extends Omit<LegacyModelDocument, "overrides"> {
  overrides?: readonly unknown[];
}

export interface LegacyReadResult {
  valid: boolean;
  document?: LegacySource;
  warnings: Diagnostic[];
  errors: Diagnostic[];
}

interface RootLike {
  parent?: unknown;
  textures?: unknown;
  overrides?: unknown;
}

function readTextures(raw: unknown, warnings: Diagnostic[]): Record<string, string> | undefined {
  if (raw === undefined) return undefined;
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    warnings.push({
      code: "TEXTURES_INVALID",
      severity: "warning",
      message: "Ignoring non-object \"textures\"."
    });
    return undefined;
  }
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") out[key] = value;
  }
  return out;
}

export function readLegacyDocument(input: Uint8Array): LegacyReadResult {
  const warnings: Diagnostic[] = [];
  const errors: Diagnostic[] = [];

  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(input).toString("utf8").replace(/^\uFEFF/, ""));
  } catch (error) {
    errors.push({
      code: "JSON_INVALID",
      severity: "error",
      message: `Invalid JSON: ${(error as Error).message}`
    });
    return { valid: false, warnings, errors };
  }

  if (!json || typeof json !== "object" || Array.isArray(json)) {
    errors.push({
      code: "MODEL_ROOT_INVALID",
      severity: "error",
      message: "Model document root is not an object."
    });
    return { valid: false, warnings, errors };
  }

  const root = json as RootLike;
  const document: LegacySource = {};
  if (typeof root.parent === "string") {
    document.parent = root.parent;
  } else if (root.parent !== undefined) {
    warnings.push({ code: "PARENT_INVALID", severity: "warning", message: "Ignoring non-string \"parent\"." });
  }

  const textures = readTextures(root.textures, warnings);
  if (textures) document.textures = textures;

  if (Array.isArray(root.overrides)) {
    document.overrides = root.overrides;
  } else if (root.overrides !== undefined) {
    warnings.push({
      code: "OVERRIDES_INVALID",
      severity: "warning",
      message: "Ignoring non-array \"overrides\"."
    });
  }

  return { valid: true, document, warnings, errors };
}
