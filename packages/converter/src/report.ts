import { writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { ensureDir } from "./fs.js";
import type { FileEvent, RunReport } from "./types.js";

export interface RunSummary {
  mode: RunReport["mode"];
  input: string;
  output: string;
  dryRun: boolean;
  stopped: boolean;
  scanned: number;
  converted: number;
  copied: number;
  skipped: number;
  errored: number;
  warnings: number;
}

export function summarizeRun(report: RunReport): RunSummary {
  const warnings = report.files.reduce(
    (sum, file) => sum + file.diagnostics.filter((d) => d.severity === "warning").length,
    0
  );
  return {
    mode: report.mode,
    input: report.inputRoot,
    output: report.outputRoot,
    dryRun: report.dryRun,
    stopped: report.stopped,
    ...report.counts,
    warnings
  };
}

/** One console line per noteworthy diagnostic; silent files yield none. */
export function formatEvent(event: FileEvent): string[] {
  const lines: string[] = [];
  if (event.outcome === "error" || event.outcome === "skipped") {
    lines.push(`${event.outcome} ${event.path}: ${event.detail}`);
  }
  for (const diagnostic of event.diagnostics) {
    if (diagnostic.severity === "info") continue;
    lines.push(`  ${diagnostic.severity} ${diagnostic.code} ${event.path}: ${diagnostic.message}`);
  }
  return lines;
}

export function writeRunReport(path: string, report: RunReport): void {
  ensureDir(dirname(path));
  const payload = { summary: summarizeRun(report), files: report.files };
  writeFileSync(path, JSON.stringify(payload, null, 2), "utf8");
}
