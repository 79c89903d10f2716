import {
  formatViralPostMessage,
  generatePostContent,
  getSettings,
  rankCalls,
  scanPendingCalls,
  type AnalyzedCall,
} from "@viral-calls/core";
import type { RunDeps, RunOptions } from "./deps";
import { processCall } from "./processor";

export interface RunSummary {
  targetPostCount: number;
  queued: number;
  analyzed: number;
  degraded: number;
  skipped: number;
  winners: number;
  notified: number;
}

export async function runOnce(deps: RunDeps, options: RunOptions): Promise<RunSummary> {
  const { targetPostCount } = await getSettings(deps.sheets);
  const calls = await scanPendingCalls(deps.sheets);
  console.log(`Found ${calls.length} pending calls (target posts: ${targetPostCount}).`);

  const summary: RunSummary = {
    targetPostCount,
    queued: calls.length,
    analyzed: 0,
    degraded: 0,
    skipped: 0,
    winners: 0,
    notified: 0,
  };

  const analyzed: AnalyzedCall[] = [];

  for (const [i, call] of calls.entries()) {
    if (i > 0) await deps.sleep(options.interCallDelayMs);
    console.log(`Processing row ${call.rowIndex} (${i + 1}/${calls.length})...`);

    const outcome = await processCall(deps, call);
    summary[outcome.status]++;
    if (outcome.status === "analyzed") {
      analyzed.push({ call, analysis: outcome.result });
    }
  }

  const winners = rankCalls(analyzed, targetPostCount, options.minWinnerScore);
  summary.winners = winners.length;
  console.log(`Selected ${winners.length} winner(s) from ${analyzed.length} analyzed call(s).`);

  for (const { call, analysis } of winners) {
    console.log(`Generating content for row ${call.rowIndex} (score ${analysis.score})...`);
    const content = await generatePostContent(deps.contentModel, analysis);
    if (!content) continue;

    const sent = await deps.notify(formatViralPostMessage(call, analysis, content));
    if (sent) {
      summary.notified++;
      console.log(`  Sent to Slack.`);
    }
  }

  return summary;
}
