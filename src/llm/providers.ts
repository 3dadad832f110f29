import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { LlmProvider } from "../config";

/**
 * Resolves a provider/model pair to an AI SDK model. Hosted providers take
 * the key from configuration; local ones take a base URL from the environment.
 */
export function getModel(
  provider: LlmProvider,
  modelId: string,
  apiKey?: string,
): LanguageModel {
  switch (provider) {
    case "anthropic":
      return createAnthropic({ apiKey })(modelId);
    case "openai":
      return createOpenAI({ apiKey })(modelId);
    case "gemini":
      return createGoogleGenerativeAI({ apiKey })(modelId);
    case "ollama":
      return createOllama({
        baseURL: process.env["OLLAMA_BASE_URL"] ?? "http://localhost:11434/api",
      })(modelId);
    case "lmstudio":
      return createOpenAICompatible({
        name: "lmstudio",
        baseURL: process.env["LMSTUDIO_BASE_URL"] ?? "http://localhost:1234/v1",
      })(modelId);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`unknown provider: ${_exhaustive}`);
    }
  }
}
