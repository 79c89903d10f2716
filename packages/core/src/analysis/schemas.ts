import { z } from "zod";

export const analysisResponseSchema = z
  .object({
    transcript_summary: z.string().min(1),
    pain_point: z.string().min(1),
    score: z
      .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
      .pipe(z.number().min(0).max(10)),
    reason_for_score: z.string().optional(),
  })
  .transform((r) => ({
    transcriptSummary: r.transcript_summary,
    painPoint: r.pain_point,
    score: Math.round(r.score),
    ...(r.reason_for_score ? { reasonForScore: r.reason_for_score } : {}),
  }));

const slideList = z.array(z.string()).min(1);

export const postContentResponseSchema = z
  .object({
    hooks: slideList,
    english_slides: slideList,
    tamil_slides: slideList,
  })
  .transform((r) => ({
    hooks: r.hooks,
    englishSlides: r.english_slides,
    tamilSlides: r.tamil_slides,
  }));
