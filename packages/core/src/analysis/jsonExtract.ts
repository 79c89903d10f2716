import { PipelineError } from "../errors";

const FENCE_PATTERN = /```(?:json)?/gi;

/**
 * Pulls the JSON object out of free-form model text: strips Markdown fences,
 * then parses the span from the first `{` to the last `}`.
 */
export function extractJsonObject(text: string): unknown {
  const unfenced = text.replace(FENCE_PATTERN, "").trim();
  const start = unfenced.indexOf("{");
  const end = unfenced.lastIndexOf("}");

  if (start === -1 || end < start) {
    throw new PipelineError("parse", "No JSON object found in model response");
  }

  try {
    return JSON.parse(unfenced.slice(start, end + 1));
  } catch (err) {
    throw new PipelineError("parse", "Model response contained malformed JSON", { cause: err });
  }
}
