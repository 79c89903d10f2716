import fs from "fs";
import path from "path";
import { extractJsonObject } from "../analysis/jsonExtract";
import { postContentResponseSchema } from "../analysis/schemas";
import { PipelineError, errorMessage } from "../errors";
import type { GenerativeModel } from "../model/types";
import type { AnalysisResult, PostContent } from "../types/calls";

const PROMPT_PATH = path.resolve(__dirname, "../prompts/content_v1.txt");

const PLACEHOLDER = /\{\{(pain_point|transcript_summary)\}\}/g;

/** Fills both placeholders in one pass; the analysis text is inserted literally. */
export function buildContentPrompt(template: string, analysis: AnalysisResult): string {
  return template.replace(PLACEHOLDER, (_match, key: string) =>
    key === "pain_point" ? analysis.painPoint : analysis.transcriptSummary
  );
}

export function parsePostContent(text: string): PostContent {
  const parsed = postContentResponseSchema.safeParse(extractJsonObject(text));
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join(".") || "(root)").join(", ");
    throw new PipelineError("parse", `Post content failed validation: ${fields}`);
  }
  return parsed.data;
}

/** Returns null when the model fails or its reply can't be used. */
export async function generatePostContent(
  model: GenerativeModel,
  analysis: AnalysisResult
): Promise<PostContent | null> {
  try {
    const template = fs.readFileSync(PROMPT_PATH, "utf-8");
    const text = await model.generate({ prompt: buildContentPrompt(template, analysis) });
    const content = parsePostContent(text);
    if (content.hooks.length !== 3 || content.englishSlides.length !== 3 || content.tamilSlides.length !== 3) {
      console.warn(
        `  [Content] Expected 3/3/3, got hooks=${content.hooks.length} english=${content.englishSlides.length} tamil=${content.tamilSlides.length}`
      );
    }
    return content;
  } catch (err) {
    console.error(`  [Content] Generation failed via ${model.label}: ${errorMessage(err)}`);
    return null;
  }
}
