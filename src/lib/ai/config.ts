import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import type { LanguageModel } from "ai";
import type { AiConfig } from "@/lib/config";

const DEFAULT_MODELS = {
  local: "phi3:mini",
  anthropic: "claude-sonnet-4-5-20250929",
  google: "gemini-2.0-flash",
} as const;

export function getModelId(config: AiConfig): string {
  return config.model ?? DEFAULT_MODELS[config.provider];
}

export function getModel(config: AiConfig): LanguageModel {
  const modelId = getModelId(config);

  if (config.provider === "google") {
    return google(modelId);
  }

  if (config.provider === "anthropic") {
    return anthropic(modelId);
  }

  // Servidor local compatible con OpenAI (Ollama, LM Studio, llama.cpp)
  const local = createOpenAICompatible({ name: "local", baseURL: config.baseUrl });
  return local.chatModel(modelId);
}
