import { errorMessage } from "../errors";
import type { AnalysisResult, CallRecord, Settings } from "../types/calls";
import type { SpreadsheetStore } from "./client";

export const DEFAULT_TARGET_POST_COUNT = 2;
export const DEFAULT_DURATION_SECONDS = 600;
export const MIN_DURATION_SECONDS = 300;

const SETTINGS_RANGE = "Settings!B1:B2";
const CALLS_RANGE = "Calls!A:D";

// Calls table columns (0-based): A id, B audio URL, C duration, D status; E score, F summary.
const URL_COL = 1;
const DURATION_COL = 2;
const STATUS_COL = 3;

// --- Settings ---

export async function getSettings(sheets: SpreadsheetStore): Promise<Settings> {
  return { targetPostCount: await getTargetPostCount(sheets) };
}

export async function getTargetPostCount(sheets: SpreadsheetStore): Promise<number> {
  try {
    const rows = await sheets.getValues(SETTINGS_RANGE);
    const raw = rows[0]?.[0]?.trim() ?? "";
    const count = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
    if (!Number.isInteger(count) || count < 1) {
      console.warn(`  [Settings] Target post count "${raw}" unusable, defaulting to ${DEFAULT_TARGET_POST_COUNT}`);
      return DEFAULT_TARGET_POST_COUNT;
    }
    return count;
  } catch (err) {
    console.warn(`  [Settings] Could not read ${SETTINGS_RANGE}: ${errorMessage(err)}`);
    return DEFAULT_TARGET_POST_COUNT;
  }
}

// --- Queue ---

export async function scanPendingCalls(sheets: SpreadsheetStore): Promise<CallRecord[]> {
  const rows = await sheets.getValues(CALLS_RANGE);
  return selectPendingCalls(rows);
}

/**
 * Filters raw sheet rows down to Pending calls longer than five minutes.
 * The header row is iterated like any other row and drops out on content.
 */
export function selectPendingCalls(rows: string[][]): CallRecord[] {
  const pending: CallRecord[] = [];

  rows.forEach((row, i) => {
    if (row.length <= STATUS_COL || row[STATUS_COL] !== "Pending") return;

    const duration = parseDuration(row[DURATION_COL]);
    if (duration === null || duration <= MIN_DURATION_SECONDS) return;

    const audioUrl = row[URL_COL]?.trim() ?? "";
    if (!audioUrl) {
      console.warn(`  [Queue] Row ${i + 1} is Pending but has no audio URL, skipping`);
      return;
    }

    pending.push({
      rowIndex: i + 1,
      audioUrl,
      durationSeconds: duration,
      status: "Pending",
    });
  });

  return pending;
}

function parseDuration(cell: string | undefined): number | null {
  const raw = cell?.trim() ?? "";
  if (raw === "") return DEFAULT_DURATION_SECONDS;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

// --- Write-back ---

export async function writeBackAnalysis(
  sheets: SpreadsheetStore,
  call: CallRecord,
  result: AnalysisResult
): Promise<void> {
  const row = call.rowIndex;
  await sheets.updateValues(`Calls!D${row}:F${row}`, [
    ["Processed", result.score, result.transcriptSummary],
  ]);
}
