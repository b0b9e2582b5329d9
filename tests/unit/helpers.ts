import type { CompletionRequest, CompletionResult, LlmClient } from "@/lib/ai/client";
import { loadDataset } from "@/lib/data/dataset-loader";
import type { Dataset } from "@/lib/types";

export const SALES_CSV = [
  "region,producto,ventas,unidades",
  "Norte,Mate,100,2",
  "Sur,Mate,50,1",
  "Norte,Yerba,30,3",
  "Centro,Termo,80,1",
  "Sur,Yerba,20,4",
].join("\n");

export function encode(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function datasetFromCsv(text: string, fileName = "ventas.csv"): Dataset {
  return loadDataset({ fileName, data: encode(text) });
}

export function ok(text: string): CompletionResult {
  return { ok: true, text, usage: { inputTokens: 10, outputTokens: 20 }, latencyMs: 5 };
}

/** Cliente en memoria: devuelve las respuestas en orden y registra los pedidos. */
export class FakeLlmClient implements LlmClient {
  readonly modelId = "fake-model";
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly results: CompletionResult[]) {}

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    this.requests.push(request);
    const next = this.results.shift();
    if (!next) throw new Error("FakeLlmClient sin respuestas");
    return next;
  }
}

export function fenced(tag: string, body: unknown): string {
  return "```" + tag + "\n" + JSON.stringify(body) + "\n```";
}
