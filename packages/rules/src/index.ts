export * from "./legacy.js";
export * from "./builder.js";
export * from "./assemble.js";
