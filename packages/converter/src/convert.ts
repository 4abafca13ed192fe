import type { Diagnostic } from "@modelshift/core";
import { assembleDocument, readLegacyDocument, serializeDocument, type NotApplicableReason } from "@modelshift/rules";
import type { FilePlan, PlanOptions, PlannedOutput } from "./types.js";

export interface ItemModelLocation {
  namespace: string;
  /** Path below `models/item/`, including the `.json` extension. */
  rest: string;
}

// Resource locations are lowercase; differently cased paths are not item models.
const ITEM_MODEL_PATH = /^assets\/([^/]+)\/models\/item\/(.+\.json)$/;

export function locateItemModel(relPath: string): ItemModelLocation | undefined {
  const match = ITEM_MODEL_PATH.exec(relPath);
  if (!match || match[1] === undefined || match[2] === undefined) return undefined;
  return { namespace: match[1], rest: match[2] };
}

export function itemsPathFor(namespace: string, rest: string): string {
  return `assets/${namespace}/items/${rest}`;
}

const SKIP_DETAIL: Record<Exclude<NotApplicableReason, "no-overrides">, string> = {
  "schema-mismatch": "no override matches the selected mode",
  "mode-incompatible": "custom_model_data predicates cannot be converted in damage mode; use cmd or item mode",
  "no-entries": "no override produced a usable entry",
  "fallback-missing": "no fallback model could be derived"
};

function verbatim(relPath: string, bytes: Uint8Array): PlannedOutput {
  return { path: relPath, contents: bytes, kind: "verbatim" };
}

/**
 * Decides what one input file becomes in the output tree. Nothing is written
 * here; the walker applies the plan.
 */
export function planFile(relPath: string, bytes: Uint8Array, options: PlanOptions): FilePlan {
  const location = locateItemModel(relPath);
  if (!location) {
    return { outcome: "copied", detail: "passthrough", outputs: [verbatim(relPath, bytes)], diagnostics: [] };
  }

  const legacy = readLegacyDocument(bytes);
  if (!legacy.valid || !legacy.document) {
    // The file still ships, so its parse errors downgrade to warnings.
    const diagnostics = legacy.errors.map<Diagnostic>((e) => ({ ...e, severity: "warning" }));
    return {
      outcome: "copied",
      detail: "unreadable model JSON, copied unchanged",
      outputs: [verbatim(relPath, bytes)],
      diagnostics
    };
  }

  const assembled = assembleDocument(legacy.document, { mode: options.mode, namespace: options.namespace });
  const diagnostics = [...legacy.warnings, ...assembled.diagnostics];
  const indent = options.indent ?? 2;

  switch (assembled.status) {
    case "dispatch": {
      const { property, entries } = assembled.document.model;
      return {
        outcome: "converted",
        detail: `range_dispatch on ${property} with ${entries.length} entr${entries.length === 1 ? "y" : "ies"}`,
        outputs: [
          {
            path: itemsPathFor(location.namespace, location.rest),
            contents: serializeDocument(assembled.document, indent),
            kind: "converted"
          }
        ],
        diagnostics
      };
    }
    case "standalone": {
      const outputs = assembled.models.map<PlannedOutput>((model) => ({
        path: itemsPathFor(model.path.namespace, model.path.relativeFilePath),
        contents: serializeDocument(model.document, indent),
        kind: "converted"
      }));
      return {
        outcome: "converted",
        detail: `${outputs.length} standalone item model${outputs.length === 1 ? "" : "s"}`,
        outputs,
        diagnostics
      };
    }
    case "not-applicable": {
      if (assembled.reason === "no-overrides") {
        return { outcome: "copied", detail: "no overrides", outputs: [verbatim(relPath, bytes)], diagnostics };
      }
      return {
        outcome: "skipped",
        detail: SKIP_DETAIL[assembled.reason],
        outputs: options.dropSkipped ? [] : [verbatim(relPath, bytes)],
        diagnostics
      };
    }
  }
}
