import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { withModelFallback } from "./fallback";
import type { GenerationRequest, GenerativeModel } from "./types";

/** The part of the OpenAI SDK this model calls; `OpenAI` itself satisfies it. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming
      ): Promise<{ choices: { message: { content: string | null } }[] }>;
    };
  };
}

/**
 * Text-only content model on OpenAI chat completions. The analysis step
 * needs audio and always goes to Gemini.
 */
export class OpenAIChatModel implements GenerativeModel {
  readonly label: string;
  private readonly client: ChatCompletionClient;

  constructor(
    apiKey: string,
    private readonly models: readonly string[],
    client?: ChatCompletionClient
  ) {
    this.label = `openai:${models.join(",")}`;
    this.client = client ?? new OpenAI({ apiKey });
  }

  async generate(request: GenerationRequest): Promise<string> {
    if (request.file) {
      throw new Error("OpenAI content model does not accept file inputs");
    }

    return withModelFallback(this.models, async (model) => {
      const response = await this.client.chat.completions.create({
        model,
        messages: [{ role: "user", content: request.prompt }],
        temperature: 0.7,
        response_format: { type: "json_object" },
      });

      const content = response.choices[0]?.message?.content;
      if (!content) throw new Error("Empty response from content LLM");
      return content;
    });
  }
}
