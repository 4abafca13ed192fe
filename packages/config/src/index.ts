import { readFileSync } from "node:fs";
import YAML from "js-yaml";
import { CONVERSION_MODES, DEFAULT_NAMESPACE, isValidNamespace, type ConversionMode } from "@modelshift/core";

export interface RunConfig {
  mode: ConversionMode;
  out?: string;
  report?: string;
  dropSkipped: boolean;
  dryRun: boolean;
  namespace: string;
  indent: number;
}

export type RunConfigInput = Partial<RunConfig>;

export const DEFAULT_CONFIG: RunConfig = {
  mode: "cmd",
  dropSkipped: false,
  dryRun: false,
  namespace: DEFAULT_NAMESPACE,
  indent: 2
};

const MODE_ALIASES: Record<string, ConversionMode> = {
  cmd: "cmd",
  custom_model_data: "cmd",
  item: "item",
  item_model: "item",
  damage: "damage"
};

export function parseMode(value: unknown): ConversionMode {
  const key = String(value).trim().toLowerCase().replace(/-/g, "_");
  const mode = MODE_ALIASES[key];
  if (!mode) {
    throw new Error(`Unknown mode "${String(value)}" (expected one of: ${CONVERSION_MODES.join(", ")}).`);
  }
  return mode;
}

export function parseNamespace(value: string, source = "config"): string {
  if (!isValidNamespace(value)) {
    throw new Error(`${source}: "namespace" must match [a-z0-9_.-]+.`);
  }
  return value;
}

function expectString(obj: Record<string, unknown>, key: string, source: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new Error(`${source}: "${key}" must be a string.`);
  }
  return value;
}

function expectBoolean(obj: Record<string, unknown>, key: string, source: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new Error(`${source}: "${key}" must be true or false.`);
  }
  return value;
}

export function parseConfigObject(raw: unknown, source = "config"): RunConfigInput {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error(`${source}: expected a mapping at the top level.`);
  }
  const obj = raw as Record<string, unknown>;
  const out: RunConfigInput = {};

  if (obj.mode !== undefined && obj.mode !== null) out.mode = parseMode(obj.mode);

  const outDir = expectString(obj, "out", source);
  if (outDir !== undefined) out.out = outDir;
  const report = expectString(obj, "report", source);
  if (report !== undefined) out.report = report;
  const namespace = expectString(obj, "namespace", source);
  if (namespace !== undefined) out.namespace = parseNamespace(namespace, source);

  const dropSkipped = expectBoolean(obj, "dropSkipped", source);
  if (dropSkipped !== undefined) out.dropSkipped = dropSkipped;
  const dryRun = expectBoolean(obj, "dryRun", source);
  if (dryRun !== undefined) out.dryRun = dryRun;

  if (obj.indent !== undefined && obj.indent !== null) {
    if (!Number.isInteger(obj.indent) || Number(obj.indent) < 0 || Number(obj.indent) > 8) {
      throw new Error(`${source}: "indent" must be an integer between 0 and 8.`);
    }
    out.indent = Number(obj.indent);
  }

  return out;
}

export function readConfigFromYaml(path: string): RunConfigInput {
  const raw = readFileSync(path, "utf8");
  return parseConfigObject(YAML.load(raw), path);
}

/** Later layers win; `undefined` fields never override. */
export function resolveConfig(...layers: RunConfigInput[]): RunConfig {
  const merged: RunConfig = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return merged;
}
