#!/usr/bin/env node
import { resolve } from "node:path";
import { readConfigFromYaml, resolveConfig } from "@modelshift/config";
import { flagLayer, parseArgs } from "./flags.js";
import { formatEvent, summarizeRun, writeRunReport } from "./report.js";
import { listCandidates, walkPack } from "./walk.js";

function printHelp(): void {
  console.log(`modelshift - legacy item model converter (1.14-1.21.3 -> 1.21.4+)

Usage:
  npm run modelshift -- convert <pack-folder> --out <folder> --mode cmd|item|damage
  npm run modelshift -- scan <pack-folder> --mode cmd|item|damage

Options:
  --out <dir>              Output folder (required for convert unless set in --config)
  --mode <mode>            cmd | item | damage (default: cmd)
  --config <file>          YAML run settings (mode, out, report, dropSkipped, dryRun, namespace, indent)
  --report <file>          Write a JSON report of every processed file
  --namespace <ns>         Namespace for unnamespaced references (default: minecraft)
  --dry-run                Plan the conversion without writing anything
  --drop-skipped           Leave files that could not be converted out of the output
  --quiet                  Only print the summary
`);
}

function log(message: string): void {
  console.log(`[modelshift] ${message}`);
}

async function run(): Promise<void> {
  const argv = parseArgs(process.argv.slice(2));

  const command = argv._[0];
  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  if (command !== "convert" && command !== "scan") {
    throw new Error(`Unknown command: ${String(command)}`);
  }

  const folder = argv._[1];
  if (!folder) {
    throw new Error("Missing pack folder argument.");
  }

  const fileLayer = typeof argv.config === "string" ? readConfigFromYaml(resolve(argv.config)) : {};
  const config = resolveConfig(fileLayer, flagLayer(argv));
  const quiet = Boolean(argv.quiet);

  if (command === "scan") {
    const listing = listCandidates(resolve(String(folder)), config.mode, config.namespace);
    console.log(JSON.stringify({ mode: config.mode, ...listing }, null, 2));
    return;
  }

  if (!config.out) {
    throw new Error("Missing --out folder.");
  }

  const report = walkPack({
    input: resolve(String(folder)),
    output: resolve(config.out),
    mode: config.mode,
    namespace: config.namespace,
    indent: config.indent,
    dryRun: config.dryRun,
    dropSkipped: config.dropSkipped,
    onProgress: quiet
      ? undefined
      : (event) => {
          for (const line of formatEvent(event)) log(line);
        }
  });

  if (config.report) {
    writeRunReport(resolve(config.report), report);
    if (!quiet) log(`report written to ${resolve(config.report)}`);
  }

  console.log(JSON.stringify(summarizeRun(report), null, 2));
  if (report.counts.errored > 0) {
    process.exitCode = 2;
  }
}

run().catch((error) => {
  console.error(`[modelshift] ${String((error as Error).message)}`);
  if (error && typeof error === "object" && "stack" in (error as { stack?: unknown })) {
    const stack = (error as { stack?: unknown }).stack;
    if (typeof stack === "string" && stack.trim()) {
      console.error(stack);
    }
  }
  process.exit(1);
});
