import dotenv from "dotenv";
import path from "path";

dotenv.config({ path: path.resolve(__dirname, "../../../.env"), quiet: true });

import { loadConfig } from "@viral-calls/core";
import { createRunDeps, runOptionsFrom } from "./deps";
import { runOnce } from "./runOnce";

async function main() {
  console.log("--- Viral call scout starting ---");
  const config = loadConfig();

  const summary = await runOnce(createRunDeps(config), runOptionsFrom(config));

  console.log(
    `Done. analyzed=${summary.analyzed} degraded=${summary.degraded} skipped=${summary.skipped} ` +
      `winners=${summary.winners} notified=${summary.notified}`
  );
}

main().catch((err) => {
  console.error("Run failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
