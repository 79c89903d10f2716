import fs from "fs";
import { z } from "zod";
import { PipelineError, errorMessage } from "../errors";
import { withModelFallback } from "./fallback";
import type {
  AssetStore,
  GenerationRequest,
  GenerativeModel,
  UploadedAsset,
} from "./types";

const GEMINI_API = "https://generativelanguage.googleapis.com";

const fileSchema = z.object({
  name: z.string(),
  uri: z.string(),
  mimeType: z.string().default("audio/mp3"),
  state: z.enum(["STATE_UNSPECIFIED", "PROCESSING", "ACTIVE", "FAILED"]).default("PROCESSING"),
});

const uploadResponseSchema = z.object({ file: fileSchema });

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .default([]),
});

export interface GeminiClientOptions {
  apiKey: string;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
}

interface GeminiRequestInit {
  method?: "GET" | "POST" | "DELETE";
  headers?: Record<string, string>;
  body?: string | Buffer;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * REST client for the Gemini file store and generateContent endpoint.
 */
export class GeminiClient implements AssetStore {
  private readonly apiKey: string;
  private readonly pollIntervalMs: number;
  private readonly maxPollAttempts: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: GeminiClientOptions) {
    this.apiKey = options.apiKey;
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.maxPollAttempts = options.maxPollAttempts ?? 150;
    this.sleep = options.sleep ?? sleep;
  }

  private async geminiFetch(url: string, init: GeminiRequestInit = {}): Promise<Response> {
    const res = await fetch(url, {
      method: init.method ?? "GET",
      headers: {
        "x-goog-api-key": this.apiKey,
        ...init.headers,
      },
      body: init.body,
    });

    if (!res.ok) {
      const body = await res.text();
      throw new Error(`Gemini API ${res.status}: ${body}`);
    }
    return res;
  }

  async upload(filePath: string, mimeType: string): Promise<UploadedAsset> {
    try {
      const bytes = await fs.promises.readFile(filePath);

      const start = await this.geminiFetch(`${GEMINI_API}/upload/v1beta/files`, {
        method: "POST",
        headers: {
          "X-Goog-Upload-Protocol": "resumable",
          "X-Goog-Upload-Command": "start",
          "X-Goog-Upload-Header-Content-Length": String(bytes.length),
          "X-Goog-Upload-Header-Content-Type": mimeType,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ file: { display_name: "audio_call" } }),
      });

      const uploadUrl = start.headers.get("x-goog-upload-url");
      if (!uploadUrl) throw new Error("Upload session returned no X-Goog-Upload-URL");

      const finalize = await this.geminiFetch(uploadUrl, {
        method: "POST",
        headers: {
          "X-Goog-Upload-Offset": "0",
          "X-Goog-Upload-Command": "upload, finalize",
        },
        body: bytes,
      });

      const { file } = uploadResponseSchema.parse(await finalize.json());
      console.log(`  [Gemini] Uploaded ${file.name} (${bytes.length} bytes)`);
      return file;
    } catch (err) {
      if (err instanceof PipelineError) throw err;
      throw new PipelineError("upload", `Audio upload failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async getAsset(name: string): Promise<UploadedAsset> {
    const res = await this.geminiFetch(`${GEMINI_API}/v1beta/${name}`);
    return fileSchema.parse(await res.json());
  }

  /**
   * Polls at a fixed interval until the asset is ACTIVE. FAILED and running
   * out of attempts are both errors.
   */
  async waitUntilActive(asset: UploadedAsset): Promise<UploadedAsset> {
    console.log("  [Gemini] Waiting for audio processing...");
    let current = asset;

    for (let attempt = 1; attempt <= this.maxPollAttempts; attempt++) {
      if (current.state === "ACTIVE") return current;
      if (current.state === "FAILED") {
        throw new PipelineError("processing_failed", `File processing failed for ${asset.name}`);
      }

      await this.sleep(this.pollIntervalMs);
      try {
        current = await this.getAsset(asset.name);
      } catch (err) {
        throw new PipelineError("upload", `Could not check state of ${asset.name}`, { cause: err });
      }
    }

    if (current.state === "ACTIVE") return current;
    if (current.state === "FAILED") {
      throw new PipelineError("processing_failed", `File processing failed for ${asset.name}`);
    }
    throw new PipelineError(
      "processing_timeout",
      `${asset.name} still ${current.state} after ${this.maxPollAttempts} checks`
    );
  }

  async remove(asset: UploadedAsset): Promise<void> {
    await this.geminiFetch(`${GEMINI_API}/v1beta/${asset.name}`, { method: "DELETE" });
  }

  async generateContent(model: string, request: GenerationRequest): Promise<string> {
    const parts: Record<string, unknown>[] = [];
    if (request.file) {
      parts.push({ file_data: { mime_type: request.file.mimeType, file_uri: request.file.uri } });
    }
    parts.push({ text: request.prompt });

    const res = await this.geminiFetch(`${GEMINI_API}/v1beta/models/${model}:generateContent`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ contents: [{ parts }] }),
    });

    const data = generateResponseSchema.parse(await res.json());
    const text = (data.candidates[0]?.content?.parts ?? [])
      .map((p) => p.text ?? "")
      .join("");
    if (!text) throw new Error(`Empty response from ${model}`);
    return text;
  }

  /** Binds this client to an ordered list of fallback model ids. */
  model(models: readonly string[]): GenerativeModel {
    return {
      label: `gemini:${models.join(",")}`,
      generate: (request) =>
        withModelFallback(models, (model) => this.generateContent(model, request)),
    };
  }
}
