import { mkdirSync, mkdtempSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { describe, expect, it } from "vitest";
import { resolveInside, scanFolderRecursively } from "../src/index.js";

describe("resolveInside", () => {
  it("resolves paths below the root", () => {
    expect(resolveInside("/packs/out", "assets/minecraft/items/stick.json")).toBe(
      resolve("/packs/out", "assets/minecraft/items/stick.json")
    );
  });

  it("refuses paths that climb out of the root or name the root itself", () => {
    expect(resolveInside("/packs/out", "assets/minecraft/items/../../../../escaped.json")).toBeUndefined();
    expect(resolveInside("/packs/out", "../out-sibling/x.json")).toBeUndefined();
    expect(resolveInside("/packs/out", "/etc/x.json")).toBeUndefined();
    expect(resolveInside("/packs/out", ".")).toBeUndefined();
  });
});

describe("scanFolderRecursively", () => {
  it("follows linked files and directories and reports dangling links", () => {
    const base = mkdtempSync(join(tmpdir(), "modelshift-scan-"));
    const root = join(base, "pack");
    const shared = join(base, "shared");
    mkdirSync(join(root, "assets"), { recursive: true });
    mkdirSync(shared, { recursive: true });
    writeFileSync(join(root, "pack.mcmeta"), "{}");
    writeFileSync(join(shared, "stick.json"), "{}");
    symlinkSync(join(shared, "stick.json"), join(root, "assets", "linked.json"));
    symlinkSync(shared, join(root, "assets", "shared"));
    symlinkSync(root, join(root, "assets", "loop"));
    symlinkSync(join(base, "missing.json"), join(root, "assets", "dangling.json"));

    const scan = scanFolderRecursively(root);

    expect(scan.files.map((f) => f.relPath)).toEqual([
      "assets/linked.json",
      "assets/shared/stick.json",
      "pack.mcmeta"
    ]);
    expect(scan.unresolved).toEqual(["assets/dangling.json"]);
  });
});
