export * from "./errors";
export * from "./types/calls";
export * from "./config/env";
export * from "./sheets/client";
export * from "./sheets/repositories";
export * from "./model/types";
export * from "./model/fallback";
export * from "./model/gemini";
export * from "./model/openai";
export * from "./analysis/jsonExtract";
export * from "./analysis/analyzer";
export * from "./analysis/audio";
export * from "./content/generator";
export * from "./ranking/ranker";
export * from "./formatting/slackPayload";
export * from "./notify/webhook";
