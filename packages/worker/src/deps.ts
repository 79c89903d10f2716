import {
  GeminiClient,
  OpenAIChatModel,
  createSheetsStore,
  postToWebhook,
  type AppConfig,
  type AssetStore,
  type GenerativeModel,
  type SpreadsheetStore,
} from "@viral-calls/core";

export interface RunDeps {
  sheets: SpreadsheetStore;
  assets: AssetStore;
  analysisModel: GenerativeModel;
  contentModel: GenerativeModel;
  notify: (payload: unknown) => Promise<boolean>;
  sleep: (ms: number) => Promise<void>;
}

export interface RunOptions {
  minWinnerScore: number;
  interCallDelayMs: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Builds the clients for a single run from validated config. */
export function createRunDeps(config: AppConfig): RunDeps {
  const gemini = new GeminiClient({
    apiKey: config.geminiApiKey,
    pollIntervalMs: config.pollIntervalMs,
    maxPollAttempts: config.maxPollAttempts,
    sleep,
  });

  const contentModel =
    config.content.provider === "openai"
      ? new OpenAIChatModel(config.content.apiKey, config.content.models)
      : gemini.model(config.content.models);

  return {
    sheets: createSheetsStore(config.googleCredentials, config.spreadsheetId),
    assets: gemini,
    analysisModel: gemini.model(config.analysisModels),
    contentModel,
    notify: (payload) => postToWebhook(config.slackWebhookUrl, payload),
    sleep,
  };
}

export function runOptionsFrom(config: AppConfig): RunOptions {
  return {
    minWinnerScore: config.minWinnerScore,
    interCallDelayMs: config.interCallDelayMs,
  };
}
