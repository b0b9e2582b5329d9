import { createLlmClient, type LlmClient } from "@/lib/ai/client";
import { getModel, getModelId } from "@/lib/ai/config";
import { getConfig } from "@/lib/config";
import { SessionStore } from "@/lib/session/session-store";

// Un store y un cliente por proceso del servidor

let store: SessionStore | null = null;
let client: LlmClient | null = null;

export function getSessionStore(): SessionStore {
  if (store) return store;
  store = new SessionStore({ sampleRows: getConfig().prompt.sampleRows });
  return store;
}

export function getLlmClient(): LlmClient {
  if (client) return client;
  const { ai } = getConfig();
  client = createLlmClient({
    model: getModel(ai),
    modelId: getModelId(ai),
    temperature: ai.temperature,
    maxOutputTokens: ai.maxOutputTokens,
    timeoutMs: ai.timeoutMs,
  });
  return client;
}
