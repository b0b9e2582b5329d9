import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "@/lib/config";
import { getModelId } from "@/lib/ai/config";

describe("loadConfig", () => {
  it("usa valores por defecto", () => {
    const config = loadConfig({});
    expect(config.ai).toEqual({
      provider: "local",
      model: undefined,
      baseUrl: "http://localhost:11434/v1",
      temperature: 0.2,
      maxOutputTokens: 512,
      timeoutMs: 60_000,
    });
    expect(config.prompt).toEqual({ contextChars: 8000, historyMessages: 12, sampleRows: 5 });
    expect(config.dataset).toEqual({ maxBytes: 10 * 1024 * 1024, maxRows: 100_000 });
    expect(config.logLevel).toBe("info");
  });

  it("convierte numeros y trata vacios como ausentes", () => {
    const config = loadConfig({ PROMPT_CONTEXT_CHARS: "2000", AI_TEMPERATURE: "", AI_MODEL: "llama3" });
    expect(config.prompt.contextChars).toBe(2000);
    expect(config.ai.temperature).toBe(0.2);
    expect(config.ai.model).toBe("llama3");
  });

  it("lista todas las variables invalidas", () => {
    let error: unknown;
    try {
      loadConfig({ AI_PROVIDER: "otro", PROMPT_CONTEXT_CHARS: "100" });
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.issues).toHaveLength(2);
    expect(error.issues[0].startsWith("AI_PROVIDER:")).toBe(true);
    expect(error.issues[1].startsWith("PROMPT_CONTEXT_CHARS:")).toBe(true);
  });
});

describe("getModelId", () => {
  it("elige el modelo por defecto del proveedor salvo que se indique otro", () => {
    const { ai } = loadConfig({});
    expect(getModelId(ai)).toBe("phi3:mini");
    expect(getModelId({ ...ai, provider: "google" })).toBe("gemini-2.0-flash");
    expect(getModelId({ ...ai, model: "qwen2.5:3b" })).toBe("qwen2.5:3b");
  });
});
