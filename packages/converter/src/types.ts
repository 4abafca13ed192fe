import type { ConversionMode, Diagnostic } from "@modelshift/core";

export type FileOutcome = "converted" | "copied" | "skipped" | "error";

export interface PlannedOutput {
  /** Output path relative to the output root, POSIX separators. */
  path: string;
  contents: Uint8Array | string;
  kind: "converted" | "verbatim";
}

export interface FilePlan {
  outcome: Exclude<FileOutcome, "error">;
  detail: string;
  outputs: PlannedOutput[];
  diagnostics: Diagnostic[];
}

export interface FileEvent {
  path: string;
  outcome: FileOutcome;
  detail: string;
  outputs: string[];
  diagnostics: Diagnostic[];
}

export interface RunCounts {
  scanned: number;
  converted: number;
  copied: number;
  skipped: number;
  errored: number;
}

export interface RunReport {
  mode: ConversionMode;
  inputRoot: string;
  outputRoot: string;
  dryRun: boolean;
  stopped: boolean;
  counts: RunCounts;
  files: FileEvent[];
}

export interface PlanOptions {
  mode: ConversionMode;
  namespace?: string;
  indent?: number;
  dropSkipped?: boolean;
}

export interface WalkOptions extends PlanOptions {
  input: string;
  output: string;
  dryRun?: boolean;
  onProgress?: (event: FileEvent, done: number, total: number) => void;
  /** Polled after every file; returning true ends the walk. */
  shouldStop?: () => boolean;
}
