import type { NormalizedPath, PathContext } from "./types.js";

export const DEFAULT_NAMESPACE = "minecraft";

const VANILLA_ROOTS = ["item/", "block/"];

const NAMESPACE_PATTERN = /^[a-z0-9_.-]+$/;

export function isValidNamespace(namespace: string): boolean {
  return NAMESPACE_PATTERN.test(namespace);
}

export interface NormalizeOptions {
  /** Namespace that unnamespaced references resolve to. */
  namespace?: string;
  context: PathContext;
}

function splitNamespace(path: string): { namespace?: string; body: string } {
  const idx = path.indexOf(":");
  if (idx < 0) return { body: path };
  const namespace = path.slice(0, idx);
  return { namespace: namespace || undefined, body: path.slice(idx + 1) };
}

export function isVanillaRooted(path: string): boolean {
  return VANILLA_ROOTS.some((root) => path.startsWith(root));
}

/**
 * Canonical form of a legacy model or texture reference.
 *
 * `minecraft:` is the implicit namespace of every resource location, so it is
 * dropped from references. Any other namespace is kept on the reference and
 * only stripped from the file path. Bare layer textures live under
 * `textures/item` in legacy packs and gain an `item/` prefix.
 */
export function normalizeModelPath(path: string, options: NormalizeOptions): NormalizedPath {
  const defaultNamespace = options.namespace ?? DEFAULT_NAMESPACE;
  const cleaned = path.trim().replace(/\\/g, "/").replace(/^\/+/, "");
  const { namespace: explicit, body: rawBody } = splitNamespace(cleaned);
  const body = rawBody.replace(/^\/+/, "");
  if (!body) {
    throw new Error(`Empty ${options.context} path: "${path}"`);
  }
  for (const namespace of [defaultNamespace, explicit]) {
    if (namespace !== undefined && !isValidNamespace(namespace)) {
      throw new Error(`Invalid namespace "${namespace}" in ${options.context} path: "${path}"`);
    }
  }
  if (body.split("/").some((segment) => segment === "." || segment === "..")) {
    throw new Error(`Relative segments are not allowed in ${options.context} path: "${path}"`);
  }

  if (explicit !== undefined && explicit !== DEFAULT_NAMESPACE) {
    return {
      modelRef: `${explicit}:${body}`,
      relativeFilePath: `${body}.json`,
      namespace: explicit
    };
  }

  const resolvedNamespace = explicit ?? defaultNamespace;
  const rooted = options.context === "texture" && !isVanillaRooted(body) ? `item/${body}` : body;
  // Bare references only stay bare when they mean minecraft both ways.
  const implicit = resolvedNamespace === DEFAULT_NAMESPACE && defaultNamespace === DEFAULT_NAMESPACE;
  const modelRef = implicit ? rooted : `${resolvedNamespace}:${rooted}`;

  return {
    modelRef,
    relativeFilePath: `${rooted}.json`,
    namespace: resolvedNamespace
  };
}
