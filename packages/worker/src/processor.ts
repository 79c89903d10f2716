import {
  analyzeCall,
  errorMessage,
  writeBackAnalysis,
  type AnalysisOutcome,
  type CallRecord,
} from "@viral-calls/core";
import type { RunDeps } from "./deps";

/**
 * Analyzes one queued call and records the outcome on its row. Skipped calls
 * leave the row Pending so the next run picks them up again.
 */
export async function processCall(deps: RunDeps, call: CallRecord): Promise<AnalysisOutcome> {
  const outcome = await analyzeCall(
    { assets: deps.assets, model: deps.analysisModel },
    call
  );

  if (outcome.status === "skipped") return outcome;

  const { result } = outcome;
  console.log(`  Score: ${result.score}/10 (${outcome.status})`);

  try {
    await writeBackAnalysis(deps.sheets, call, result);
    call.status = "Processed";
    call.score = result.score;
    call.transcriptSummary = result.transcriptSummary;
    call.painPoint = result.painPoint;
  } catch (err) {
    console.error(`  Write-back failed for row ${call.rowIndex}: ${errorMessage(err)}`);
  }

  return outcome;
}
