import { z } from "zod";
import { PipelineError } from "../errors";

const modelList = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((raw) =>
      (raw ?? fallback)
        .split(",")
        .map((m) => m.trim())
        .filter((m) => m.length > 0)
    )
    .pipe(z.array(z.string()).min(1, "must name at least one model"));

const intSetting = (fallback: number, min: number, max?: number) => {
  let num = z.coerce.number().int().min(min);
  if (max !== undefined) num = num.max(max);
  return z
    .string()
    .optional()
    .transform((raw) => (raw === undefined || raw.trim() === "" ? String(fallback) : raw))
    .pipe(num);
};

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export type ServiceAccountCredentials = z.infer<typeof serviceAccountSchema>;

const credsJson = z.string().transform((raw, ctx) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "is not valid JSON" });
    return z.NEVER;
  }
  const creds = serviceAccountSchema.safeParse(parsed);
  if (!creds.success) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must contain client_email and private_key",
    });
    return z.NEVER;
  }
  return creds.data;
});

const required = (name: string) => z.string({ required_error: `${name} not set` }).min(1, `${name} not set`);

const envSchema = z
  .object({
    GEMINI_API_KEY: required("GEMINI_API_KEY"),
    SLACK_WEBHOOK_URL: required("SLACK_WEBHOOK_URL").url(),
    SPREADSHEET_ID: required("SPREADSHEET_ID"),
    GOOGLE_CREDS_JSON: required("GOOGLE_CREDS_JSON").pipe(credsJson),
    GEMINI_ANALYSIS_MODELS: modelList("gemini-1.5-flash"),
    GEMINI_CONTENT_MODELS: modelList("gemini-1.5-pro"),
    CONTENT_PROVIDER: z.enum(["gemini", "openai"]).default("gemini"),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_CONTENT_MODELS: modelList("gpt-4o"),
    MIN_WINNER_SCORE: intSetting(6, 0, 10),
    POLL_INTERVAL_MS: intSetting(2_000, 0),
    MAX_POLL_ATTEMPTS: intSetting(150, 1),
    INTER_CALL_DELAY_MS: intSetting(2_000, 0),
  })
  .superRefine((env, ctx) => {
    if (env.CONTENT_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "OPENAI_API_KEY not set (required when CONTENT_PROVIDER=openai)",
      });
    }
  });

export interface AppConfig {
  geminiApiKey: string;
  slackWebhookUrl: string;
  spreadsheetId: string;
  googleCredentials: ServiceAccountCredentials;
  analysisModels: string[];
  content:
    | { provider: "gemini"; models: string[] }
    | { provider: "openai"; apiKey: string; models: string[] };
  minWinnerScore: number;
  pollIntervalMs: number;
  maxPollAttempts: number;
  interCallDelayMs: number;
}

/**
 * Validates the process environment. Every problem is reported at once;
 * the worker treats the thrown error as fatal.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const key = issue.path.join(".");
      return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
    });
    throw new PipelineError("config", `Invalid configuration:\n  - ${problems.join("\n  - ")}`);
  }

  const e = parsed.data;
  return {
    geminiApiKey: e.GEMINI_API_KEY,
    slackWebhookUrl: e.SLACK_WEBHOOK_URL,
    spreadsheetId: e.SPREADSHEET_ID,
    googleCredentials: e.GOOGLE_CREDS_JSON,
    analysisModels: e.GEMINI_ANALYSIS_MODELS,
    content:
      e.CONTENT_PROVIDER === "openai" && e.OPENAI_API_KEY
        ? { provider: "openai", apiKey: e.OPENAI_API_KEY, models: e.OPENAI_CONTENT_MODELS }
        : { provider: "gemini", models: e.GEMINI_CONTENT_MODELS },
    minWinnerScore: e.MIN_WINNER_SCORE,
    pollIntervalMs: e.POLL_INTERVAL_MS,
    maxPollAttempts: e.MAX_POLL_ATTEMPTS,
    interCallDelayMs: e.INTER_CALL_DELAY_MS,
  };
}
