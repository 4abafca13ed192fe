import minimist from "minimist";
import { parseMode, parseNamespace, type RunConfigInput } from "@modelshift/config";

export function parseArgs(args: string[]): minimist.ParsedArgs {
  return minimist(args, {
    boolean: ["dry-run", "drop-skipped", "quiet"],
    string: ["out", "mode", "config", "report", "namespace"]
  });
}

/** Settings given on the command line, validated like the YAML ones. */
export function flagLayer(argv: minimist.ParsedArgs): RunConfigInput {
  const layer: RunConfigInput = {};
  if (argv.mode !== undefined) layer.mode = parseMode(argv.mode);
  if (typeof argv.out === "string") layer.out = argv.out;
  if (typeof argv.report === "string") layer.report = argv.report;
  if (typeof argv.namespace === "string") layer.namespace = parseNamespace(argv.namespace, "--namespace");
  if (argv["dry-run"] === true) layer.dryRun = true;
  if (argv["drop-skipped"] === true) layer.dropSkipped = true;
  return layer;
}
