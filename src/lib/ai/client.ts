import { APICallError, generateText, type LanguageModel } from "ai";

export type CompletionFailureKind = "timeout" | "unreachable" | "provider" | "unknown";

export interface CompletionFailure {
  kind: CompletionFailureKind;
  message: string;
  statusCode?: number;
}

export interface CompletionUsage {
  inputTokens: number;
  outputTokens: number;
}

export type CompletionResult =
  | { ok: true; text: string; usage: CompletionUsage; latencyMs: number }
  | { ok: false; error: CompletionFailure; latencyMs: number };

export interface CompletionRequest {
  system: string;
  prompt: string;
}

export interface LlmClient {
  readonly modelId: string;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export interface LlmClientOptions {
  model: LanguageModel;
  modelId: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

class TimeoutError extends Error {
  constructor(ms: number) {
    super(`El modelo no respondio en ${ms} ms`);
    this.name = "TimeoutError";
  }
}

function classify(error: unknown, timedOut: boolean): CompletionFailure {
  if (timedOut || error instanceof TimeoutError) {
    return {
      kind: "timeout",
      message: error instanceof Error ? error.message : "Tiempo de espera agotado",
    };
  }
  if (APICallError.isInstance(error)) {
    // Sin status HTTP: no hubo respuesta (conexion rechazada, DNS, etc.)
    if (error.statusCode === undefined) {
      return { kind: "unreachable", message: error.message };
    }
    return { kind: "provider", message: error.message, statusCode: error.statusCode };
  }
  const message = error instanceof Error ? error.message : "Error desconocido";
  if (error instanceof TypeError && /fetch failed|ECONNREFUSED|ENOTFOUND/i.test(message)) {
    return { kind: "unreachable", message };
  }
  return { kind: "unknown", message };
}

/**
 * Cliente de una sola llamada: sin reintentos y acotado por `timeoutMs`
 * aunque el proveedor ignore la senal de aborto. Nunca lanza.
 */
export function createLlmClient(options: LlmClientOptions): LlmClient {
  return {
    modelId: options.modelId,

    async complete({ system, prompt }) {
      const t0 = performance.now();
      const controller = new AbortController();
      let timer: ReturnType<typeof setTimeout> | undefined;

      const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          controller.abort();
          reject(new TimeoutError(options.timeoutMs));
        }, options.timeoutMs);
      });

      try {
        const result = await Promise.race([
          generateText({
            model: options.model,
            system,
            prompt,
            temperature: options.temperature,
            maxOutputTokens: options.maxOutputTokens,
            maxRetries: 0,
            abortSignal: controller.signal,
          }),
          deadline,
        ]);
        return {
          ok: true,
          text: result.text,
          usage: {
            inputTokens: result.usage.inputTokens ?? 0,
            outputTokens: result.usage.outputTokens ?? 0,
          },
          latencyMs: Math.round(performance.now() - t0),
        };
      } catch (e: unknown) {
        return {
          ok: false,
          error: classify(e, controller.signal.aborted),
          latencyMs: Math.round(performance.now() - t0),
        };
      } finally {
        clearTimeout(timer);
      }
    },
  };
}
