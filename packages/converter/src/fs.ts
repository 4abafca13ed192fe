import { accessSync, constants, type Stats, mkdirSync, readdirSync, realpathSync, statSync, writeFileSync } from "node:fs";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";

export interface ScannedFile {
  path: string;
  /** Path relative to the scan root with POSIX separators. */
  relPath: string;
  size: number;
}

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

export function toPosix(path: string): string {
  return path.split(sep).join("/");
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function isWritableDir(path: string): boolean {
  try {
    accessSync(path, constants.W_OK);
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function isInside(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/** Absolute target of `relPath` under `root`, or undefined when it would land outside. */
export function resolveInside(root: string, relPath: string): string | undefined {
  const target = resolve(root, relPath);
  return target !== resolve(root) && isInside(root, target) ? target : undefined;
}

export function writeFileEnsured(path: string, contents: Uint8Array | string): void {
  ensureDir(dirname(path));
  writeFileSync(path, contents);
}

export interface FolderScan {
  files: ScannedFile[];
  /** Links whose target is missing or unreadable, relative POSIX paths. */
  unresolved: string[];
}

/**
 * Lists every file below `root`, following symbolic links. Linked
 * directories are entered once per real path.
 */
export function scanFolderRecursively(root: string): FolderScan {
  const base = resolve(root);
  const files: ScannedFile[] = [];
  const unresolved: string[] = [];
  const visited = new Set<string>([realpathSync(base)]);
  const stack = [base];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    const entries = readdirSync(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = resolve(current, entry.name);
      const relPath = toPosix(relative(base, full));
      if (entry.isSymbolicLink()) {
        let stats: Stats;
        try {
          stats = statSync(full);
        } catch {
          unresolved.push(relPath);
          continue;
        }
        if (stats.isDirectory()) {
          const real = realpathSync(full);
          if (visited.has(real)) continue;
          visited.add(real);
          stack.push(full);
        } else if (stats.isFile()) {
          files.push({ path: full, relPath, size: stats.size });
        }
      } else if (entry.isDirectory()) {
        stack.push(full);
      } else if (entry.isFile()) {
        files.push({ path: full, relPath, size: statSync(full).size });
      }
    }
  }
  files.sort((a, b) => compareOrdinal(a.relPath, b.relPath));
  unresolved.sort(compareOrdinal);
  return { files, unresolved };
}

function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
