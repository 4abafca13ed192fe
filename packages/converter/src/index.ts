export * from "./types.js";
export * from "./errors.js";
export * from "./convert.js";
export * from "./walk.js";
export * from "./report.js";
export { resolveInside, scanFolderRecursively, type FolderScan, type ScannedFile } from "./fs.js";
export * from "./flags.js";
