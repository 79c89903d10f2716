import dotenv from "dotenv";
import path from "path";
dotenv.config({ path: path.resolve(__dirname, "../.env"), quiet: true });

import { createSheetsStore, getTargetPostCount, loadConfig, scanPendingCalls } from "@viral-calls/core";

// Read-only: lists what the next run would analyze without touching any row.
async function main() {
  const config = loadConfig();
  const sheets = createSheetsStore(config.googleCredentials, config.spreadsheetId);

  const target = await getTargetPostCount(sheets);
  const calls = await scanPendingCalls(sheets);

  console.log(`Target posts: ${target}`);
  console.log(`Eligible calls: ${calls.length}\n`);
  for (const call of calls) {
    console.log(`  Row ${call.rowIndex}  ${call.durationSeconds}s  ${call.audioUrl}`);
  }
}

main().catch((err) => {
  console.error("Failed:", err);
  process.exit(1);
});
