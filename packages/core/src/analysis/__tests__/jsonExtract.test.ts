import { describe, it, expect } from "vitest";
import { extractJsonObject } from "../jsonExtract";
import { PipelineError } from "../../errors";

function parseErrorOf(fn: () => unknown): PipelineError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PipelineError) return err;
    throw err;
  }
  throw new Error("expected a PipelineError");
}

describe("extractJsonObject", () => {
  it("strips json code fences", () => {
    expect(extractJsonObject('```json\n{"score":7}\n```')).toEqual({ score: 7 });
  });

  it("ignores prose before and after the object", () => {
    const text = 'Sure! Here is the analysis:\n{"pain_point": "late payout", "score": 3}\nLet me know.';
    expect(extractJsonObject(text)).toEqual({ pain_point: "late payout", score: 3 });
  });

  it("handles bare fences and upper-case language tags", () => {
    expect(extractJsonObject('```\n{"a":1}\n```')).toEqual({ a: 1 });
    expect(extractJsonObject('```JSON\n{"a":2}\n```')).toEqual({ a: 2 });
  });

  it("keeps nested objects intact", () => {
    expect(extractJsonObject('{"outer":{"inner":[1,2]}}')).toEqual({ outer: { inner: [1, 2] } });
  });

  it("raises a parse error when there is no object", () => {
    const err = parseErrorOf(() => extractJsonObject("I could not hear the audio."));
    expect(err.kind).toBe("parse");
    expect(err.message).toBe("No JSON object found in model response");
  });

  it("raises a parse error when braces are reversed", () => {
    expect(parseErrorOf(() => extractJsonObject("} nothing {")).kind).toBe("parse");
  });

  it("raises a parse error for malformed JSON", () => {
    const err = parseErrorOf(() => extractJsonObject('{"score": }'));
    expect(err.kind).toBe("parse");
    expect(err.message).toBe("Model response contained malformed JSON");
  });
});
