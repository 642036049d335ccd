import OpenAI from "openai";
import type { LlmConfig } from "./config.js";

export type CompleteFn = (
  body: OpenAI.ChatCompletionCreateParamsNonStreaming
) => Promise<OpenAI.ChatCompletion>;

/** Any OpenAI-compatible endpoint; set baseURL for OpenRouter and the like. */
export function createOpenAI(cfg: LlmConfig): OpenAI {
  return new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseURL });
}

export function chatCompletion(client: OpenAI): CompleteFn {
  return (body) => client.chat.completions.create(body);
}
