export type CallStatus = "Pending" | "Processed";

export interface CallRecord {
  /** 1-based spreadsheet row, header row included. */
  rowIndex: number;
  audioUrl: string;
  durationSeconds: number;
  status: CallStatus;
  score?: number;
  transcriptSummary?: string;
  painPoint?: string;
}

export interface AnalysisResult {
  transcriptSummary: string;
  painPoint: string;
  score: number;
  reasonForScore?: string;
}

export interface PostContent {
  hooks: string[];
  englishSlides: string[];
  tamilSlides: string[];
}

export interface Settings {
  targetPostCount: number;
}

export type AnalysisOutcome =
  | { status: "analyzed"; result: AnalysisResult }
  | { status: "degraded"; result: AnalysisResult; error: Error }
  | { status: "skipped"; error: Error };

export interface AnalyzedCall {
  call: CallRecord;
  analysis: AnalysisResult;
}

export const DEGRADED_ANALYSIS: Readonly<AnalysisResult> = {
  score: 0,
  transcriptSummary: "Error",
  painPoint: "Error",
};
