import { existsSync, readFileSync, renameSync, rmSync } from "node:fs";
import { resolve } from "node:path";
import type { ConversionMode, Diagnostic } from "@modelshift/core";
import { planFile, locateItemModel } from "./convert.js";
import { RunAbortedError } from "./errors.js";
import {
  ensureDir,
  isDirectory,
  isInside,
  isWritableDir,
  resolveInside,
  scanFolderRecursively,
  writeFileEnsured,
  type FolderScan,
  type ScannedFile
} from "./fs.js";
import type {
  FileEvent,
  FilePlan,
  PlannedOutput,
  PlanOptions,
  RunCounts,
  RunReport,
  WalkOptions
} from "./types.js";

function emptyCounts(scanned: number): RunCounts {
  return { scanned, converted: 0, copied: 0, skipped: 0, errored: 0 };
}

function scanInput(input: string): FolderScan {
  if (!isDirectory(input)) {
    throw new RunAbortedError("INPUT_UNREADABLE", `Input directory "${input}" does not exist or is not a directory.`);
  }
  try {
    return scanFolderRecursively(input);
  } catch (error) {
    throw new RunAbortedError("INPUT_UNREADABLE", `Cannot read input directory "${input}": ${(error as Error).message}`, {
      cause: error
    });
  }
}

function prepareOutput(input: string, output: string, dryRun: boolean): void {
  if (isInside(input, output)) {
    throw new RunAbortedError("OUTPUT_INSIDE_INPUT", `Output directory "${output}" must not be inside the input "${input}".`);
  }
  if (dryRun) return;
  try {
    ensureDir(output);
  } catch (error) {
    throw new RunAbortedError("OUTPUT_UNWRITABLE", `Cannot create output directory "${output}": ${(error as Error).message}`, {
      cause: error
    });
  }
  if (!isWritableDir(output)) {
    throw new RunAbortedError("OUTPUT_UNWRITABLE", `Output directory "${output}" is not writable.`);
  }
}

/**
 * Files outside `models/item` go first so that converted documents landing on
 * the same path replace pass-through copies, never the other way around.
 */
export function orderForProcessing(files: readonly ScannedFile[]): ScannedFile[] {
  const passthrough = files.filter((f) => !locateItemModel(f.relPath));
  const models = files.filter((f) => locateItemModel(f.relPath));
  return [...passthrough, ...models];
}

type PlanAttempt = { ok: true; plan: FilePlan } | { ok: false; event: FileEvent };

function readPlan(file: ScannedFile, options: PlanOptions): PlanAttempt {
  let bytes: Buffer;
  try {
    bytes = readFileSync(file.path);
  } catch (error) {
    return { ok: false, event: ioFailure(file.relPath, "read", error) };
  }
  return { ok: true, plan: planFile(file.relPath, bytes, options) };
}

function ioFailure(path: string, op: "read" | "write", error: unknown, target = path): FileEvent {
  return failedEvent(path, `${op} failed`, `Failed to ${op} ${target}: ${(error as Error).message}`);
}

function failedEvent(path: string, detail: string, message: string): FileEvent {
  return {
    path,
    outcome: "error",
    detail,
    outputs: [],
    diagnostics: [{ code: "IO_FAILURE", severity: "error", message }]
  };
}

interface WrittenOutput {
  source: string;
  kind: PlannedOutput["kind"];
}

type Undo = () => void;

function unresolvedLink(path: string): FileEvent {
  return {
    path,
    outcome: "skipped",
    detail: "unresolvable symbolic link",
    outputs: [],
    diagnostics: [
      {
        code: "SYMLINK_UNRESOLVED",
        severity: "warning",
        message: `${path} is a symbolic link whose target cannot be read; nothing was written for it.`
      }
    ]
  };
}

/**
 * Writes one file's outputs. Either every output lands or the file's
 * earlier writes are undone and an error event is returned.
 */
function applyPlan(
  file: ScannedFile,
  plan: FilePlan,
  output: string,
  dryRun: boolean,
  written: Map<string, WrittenOutput>
): FileEvent {
  const diagnostics: Diagnostic[] = [...plan.diagnostics];
  const outputs: string[] = [];
  const journal: Undo[] = [];

  const rollback = (failure: FileEvent): FileEvent => {
    for (const undo of journal.reverse()) {
      try {
        undo();
      } catch (error) {
        failure.diagnostics.push({
          code: "ROLLBACK_FAILED",
          severity: "warning",
          message: `Could not undo an earlier write of ${file.relPath}: ${(error as Error).message}`
        });
      }
    }
    return failure;
  };

  for (const out of plan.outputs) {
    const target = resolveInside(output, out.path);
    if (target === undefined) {
      return rollback(
        failedEvent(file.relPath, "write refused", `Refusing to write ${out.path}: it resolves outside the output directory.`)
      );
    }

    const previous = written.get(out.path);
    try {
      if (previous !== undefined && previous.kind === "verbatim" && out.kind === "converted") {
        // A converted document displaces a file shipped in the pack; keep it beside.
        const backup = `${out.path}.bak`;
        if (!dryRun) {
          renameSync(target, `${target}.bak`);
          journal.push(() => renameSync(`${target}.bak`, target));
        }
        const displaced = written.get(backup);
        written.set(backup, previous);
        journal.push(() => restoreEntry(written, backup, displaced));
        outputs.push(backup);
        diagnostics.push({
          code: "PATH_COLLISION",
          severity: "warning",
          message: `${out.path} was already written from ${previous.source}; that copy was moved to ${backup}.`
        });
      } else if (previous !== undefined) {
        diagnostics.push({
          code: "PATH_COLLISION",
          severity: "warning",
          message: `${out.path} was already written from ${previous.source}; last write wins.`
        });
      }

      if (!dryRun) {
        const created = !existsSync(target);
        writeFileEnsured(target, out.contents);
        if (created) journal.push(() => rmSync(target, { force: true }));
      }
    } catch (error) {
      return rollback(ioFailure(file.relPath, "write", error, out.path));
    }

    written.set(out.path, { source: file.relPath, kind: out.kind });
    journal.push(() => restoreEntry(written, out.path, previous));
    outputs.push(out.path);
  }

  return { path: file.relPath, outcome: plan.outcome, detail: plan.detail, outputs, diagnostics };
}

function restoreEntry(written: Map<string, WrittenOutput>, path: string, entry: WrittenOutput | undefined): void {
  if (entry === undefined) {
    written.delete(path);
  } else {
    written.set(path, entry);
  }
}

export function walkPack(options: WalkOptions): RunReport {
  const input = resolve(options.input);
  const output = resolve(options.output);
  const dryRun = options.dryRun ?? false;

  const scan = scanInput(input);
  prepareOutput(input, output, dryRun);

  const report: RunReport = {
    mode: options.mode,
    inputRoot: input,
    outputRoot: output,
    dryRun,
    stopped: false,
    counts: emptyCounts(scan.files.length + scan.unresolved.length),
    files: []
  };

  // Output path -> input file that produced it, for collision handling.
  const written = new Map<string, WrittenOutput>();
  const ordered = orderForProcessing(scan.files);
  const total = scan.unresolved.length + ordered.length;
  const work = [
    ...scan.unresolved.map((path) => () => unresolvedLink(path)),
    ...ordered.map((file) => () => {
      const attempt = readPlan(file, options);
      return attempt.ok ? applyPlan(file, attempt.plan, output, dryRun, written) : attempt.event;
    })
  ];

  for (const step of work) {
    const event = step();
    report.files.push(event);
    report.counts[countKey(event.outcome)] += 1;
    options.onProgress?.(event, report.files.length, total);

    if (options.shouldStop?.()) {
      report.stopped = report.files.length < total;
      break;
    }
  }

  return report;
}

function countKey(outcome: FileEvent["outcome"]): Exclude<keyof RunCounts, "scanned"> {
  return outcome === "error" ? "errored" : outcome;
}

export interface CandidateListing {
  candidates: string[];
  unreadable: string[];
}

/** Relative paths of the files a run in `mode` would convert. Writes nothing. */
export function listCandidates(inputDir: string, mode: ConversionMode, namespace?: string): CandidateListing {
  const input = resolve(inputDir);
  const files = scanInput(input).files.filter((f) => locateItemModel(f.relPath));
  const candidates: string[] = [];
  const unreadable: string[] = [];

  for (const file of files) {
    const attempt = readPlan(file, { mode, namespace });
    if (!attempt.ok) {
      unreadable.push(file.relPath);
      continue;
    }
    if (attempt.plan.outcome === "converted") {
      candidates.push(file.relPath);
    }
  }

  return { candidates, unreadable };
}
