import fs from "fs";
import path from "path";
import { PipelineError, errorMessage } from "../errors";
import type { AssetStore, GenerativeModel, UploadedAsset } from "../model/types";
import { DEGRADED_ANALYSIS, type AnalysisOutcome, type AnalysisResult, type CallRecord } from "../types/calls";
import { withTempAudioFile } from "./audio";
import { extractJsonObject } from "./jsonExtract";
import { analysisResponseSchema } from "./schemas";

const PROMPT_PATH = path.resolve(__dirname, "../prompts/analysis_v1.txt");
export const AUDIO_MIME_TYPE = "audio/mp3";

export interface AnalyzerDeps {
  assets: AssetStore;
  model: GenerativeModel;
}

export function parseAnalysis(text: string): AnalysisResult {
  const parsed = analysisResponseSchema.safeParse(extractJsonObject(text));
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join(".") || "(root)").join(", ");
    throw new PipelineError("parse", `Analysis response failed validation: ${fields}`);
  }
  return parsed.data;
}

/**
 * Downloads, uploads and scores one call. Never throws: transfer failures
 * come back as `skipped`, model and parse failures as `degraded`.
 */
export async function analyzeCall(deps: AnalyzerDeps, call: CallRecord): Promise<AnalysisOutcome> {
  try {
    const prompt = fs.readFileSync(PROMPT_PATH, "utf-8");
    return await withTempAudioFile(call.audioUrl, async (filePath) => {
      const uploaded = await deps.assets.upload(filePath, AUDIO_MIME_TYPE);
      try {
        const asset = await deps.assets.waitUntilActive(uploaded);
        return await scoreAsset(deps.model, asset, prompt);
      } finally {
        await removeAsset(deps.assets, uploaded);
      }
    });
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(`  [Analyzer] Row ${call.rowIndex} skipped: ${error.message}`);
    return { status: "skipped", error };
  }
}

async function scoreAsset(
  model: GenerativeModel,
  asset: UploadedAsset,
  prompt: string
): Promise<AnalysisOutcome> {
  try {
    const text = await model.generate({
      prompt,
      file: { uri: asset.uri, mimeType: asset.mimeType },
    });
    return { status: "analyzed", result: parseAnalysis(text) };
  } catch (err) {
    const error =
      err instanceof PipelineError ? err : new PipelineError("model", errorMessage(err), { cause: err });
    console.error(`  [Analyzer] Degraded result (${error.kind}): ${error.message}`);
    return { status: "degraded", result: { ...DEGRADED_ANALYSIS }, error };
  }
}

async function removeAsset(assets: AssetStore, asset: UploadedAsset): Promise<void> {
  try {
    await assets.remove(asset);
  } catch (err) {
    console.warn(`  [Analyzer] Could not delete ${asset.name}: ${errorMessage(err)}`);
  }
}
