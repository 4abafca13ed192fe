import { resolve } from "node:path";
import { CONVERSION_MODES } from "../packages/core/src/index.js";
import { summarizeRun, walkPack } from "../packages/converter/src/index.js";

async function main(): Promise<void> {
  for (const mode of CONVERSION_MODES) {
    const report = walkPack({
      input: resolve("fixtures/sample-pack"),
      output: resolve("data/smoke", mode),
      mode
    });
    console.log(`[smoke] ${mode} summary:`);
    console.log(JSON.stringify(summarizeRun(report), null, 2));
  }
  console.log("[smoke] outputs written under data/smoke/<mode>");
}

main().catch((error) => {
  console.error(`[smoke] failed: ${(error as Error).message}`);
  process.exit(1);
});
