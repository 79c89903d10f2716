import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type {
  AssetStore,
  CellValue,
  GenerativeModel,
  SpreadsheetStore,
  UploadedAsset,
} from "@viral-calls/core";
import type { RunDeps } from "../deps";
import { runOnce } from "../runOnce";

class MemorySheets implements SpreadsheetStore {
  updates: { range: string; values: CellValue[][] }[] = [];

  constructor(private readonly ranges: Record<string, string[][]>) {}

  async getValues(range: string): Promise<string[][]> {
    return this.ranges[range] ?? [];
  }

  async updateValues(range: string, values: CellValue[][]): Promise<void> {
    this.updates.push({ range, values });
  }
}

const assets: AssetStore = {
  upload: async (_filePath: string, mimeType: string): Promise<UploadedAsset> => ({
    name: "files/upload",
    uri: "https://generativelanguage.googleapis.com/v1beta/files/upload",
    mimeType,
    state: "PROCESSING",
  }),
  waitUntilActive: async (asset) => ({ ...asset, state: "ACTIVE" }),
  remove: async () => {},
};

function analysisReply(summary: string, painPoint: string, score: number): string {
  return "```json\n" + JSON.stringify({ transcript_summary: summary, pain_point: painPoint, score }) + "\n```";
}

const contentReply = JSON.stringify({
  hooks: ["Hook 1", "Hook 2", "Hook 3"],
  english_slides: ["E1", "E2", "E3"],
  tamil_slides: ["T1", "T2", "T3"],
});

function scriptedModel(replies: string[]): GenerativeModel {
  const queue = [...replies];
  return {
    label: "scripted",
    generate: async () => {
      const next = queue.shift();
      if (next === undefined) throw new Error("no scripted reply left");
      return next;
    },
  };
}

const failingModel: GenerativeModel = {
  label: "down",
  generate: async () => {
    throw new Error("503 unavailable");
  },
};

const callsTable = [
  ["1", "https://audio.test/1.mp3", "600", "Pending"],
  ["2", "https://audio.test/2.mp3", "100", "Pending"],
  ["3", "https://audio.test/3.mp3", "450", "Pending"],
];

function makeDeps(overrides: Partial<RunDeps> & { sheets: SpreadsheetStore }): RunDeps {
  return {
    assets,
    analysisModel: scriptedModel([
      analysisReply("Claim delayed three weeks", "Slow claims", 8),
      analysisReply("Premium question", "Premium confusion", 4),
    ]),
    contentModel: scriptedModel([contentReply, contentReply]),
    notify: vi.fn(async (_payload: unknown) => true),
    sleep: vi.fn(async (_ms: number) => {}),
    ...overrides,
  };
}

describe("runOnce", () => {
  beforeEach(() => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(new Uint8Array([1, 2, 3]))));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("analyzes eligible calls, writes back, and notifies the winner", async () => {
    const sheets = new MemorySheets({ "Settings!B1:B2": [], "Calls!A:D": callsTable });
    const deps = makeDeps({ sheets });

    const summary = await runOnce(deps, { minWinnerScore: 6, interCallDelayMs: 2000 });

    expect(summary).toEqual({
      targetPostCount: 2,
      queued: 2,
      analyzed: 2,
      degraded: 0,
      skipped: 0,
      winners: 1,
      notified: 1,
    });
    expect(sheets.updates).toEqual([
      { range: "Calls!D1:F1", values: [["Processed", 8, "Claim delayed three weeks"]] },
      { range: "Calls!D3:F3", values: [["Processed", 4, "Premium question"]] },
    ]);
    expect(deps.sleep).toHaveBeenCalledTimes(1);
    expect(deps.sleep).toHaveBeenCalledWith(2000);
    expect(deps.notify).toHaveBeenCalledTimes(1);
    expect(deps.notify).toHaveBeenCalledWith(
      expect.objectContaining({ text: "Viral content generated for row 1 (score 8/10)" })
    );
  });

  it("stops at the target count taken from settings", async () => {
    const sheets = new MemorySheets({ "Settings!B1:B2": [["1"]], "Calls!A:D": callsTable });
    const deps = makeDeps({ sheets });

    const summary = await runOnce(deps, { minWinnerScore: 0, interCallDelayMs: 0 });

    expect(summary.targetPostCount).toBe(1);
    expect(summary.winners).toBe(1);
    expect(deps.notify).toHaveBeenCalledWith(
      expect.objectContaining({ text: "Viral content generated for row 1 (score 8/10)" })
    );
  });

  it("sends both winners in score order when no minimum applies", async () => {
    const sheets = new MemorySheets({ "Calls!A:D": callsTable });
    const deps = makeDeps({ sheets });

    await runOnce(deps, { minWinnerScore: 0, interCallDelayMs: 0 });

    const notify = vi.mocked(deps.notify);
    expect(notify.mock.calls.map(([payload]) => payload)).toEqual([
      expect.objectContaining({ text: "Viral content generated for row 1 (score 8/10)" }),
      expect.objectContaining({ text: "Viral content generated for row 3 (score 4/10)" }),
    ]);
  });

  it("skips the notification when content generation fails", async () => {
    const sheets = new MemorySheets({ "Calls!A:D": callsTable });
    const deps = makeDeps({ sheets, contentModel: failingModel });

    const summary = await runOnce(deps, { minWinnerScore: 6, interCallDelayMs: 0 });

    expect(summary.winners).toBe(1);
    expect(summary.notified).toBe(0);
    expect(deps.notify).not.toHaveBeenCalled();
  });

  it("marks rows Processed with placeholders when the model is down", async () => {
    const sheets = new MemorySheets({ "Calls!A:D": callsTable });
    const deps = makeDeps({ sheets, analysisModel: failingModel });

    const summary = await runOnce(deps, { minWinnerScore: 0, interCallDelayMs: 0 });

    expect(summary).toMatchObject({ analyzed: 0, degraded: 2, winners: 0, notified: 0 });
    expect(sheets.updates).toEqual([
      { range: "Calls!D1:F1", values: [["Processed", 0, "Error"]] },
      { range: "Calls!D3:F3", values: [["Processed", 0, "Error"]] },
    ]);
  });

  it("leaves rows untouched when the audio cannot be downloaded", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("missing", { status: 404 })));
    const sheets = new MemorySheets({ "Calls!A:D": callsTable });
    const deps = makeDeps({ sheets });

    const summary = await runOnce(deps, { minWinnerScore: 0, interCallDelayMs: 0 });

    expect(summary).toMatchObject({ queued: 2, skipped: 2, analyzed: 0 });
    expect(sheets.updates).toEqual([]);
  });
});
