import { detectIntent, type TurnIntent } from "@/lib/agent/intent";
import type { CompletionFailure, CompletionFailureKind, LlmClient } from "@/lib/ai/client";
import { interpretResponse } from "@/lib/ai/interpreter";
import { buildTurnPrompt, getSystemPrompt } from "@/lib/ai/prompts";
import type { PromptConfig } from "@/lib/config";
import { renderDashboard } from "@/lib/dashboard/render";
import { createLogger, type Logger } from "@/lib/logger";
import type { AnalystSession } from "@/lib/session/analyst-session";
import type { AgentResponse, Message, RenderedDashboard } from "@/lib/types";

export class TurnInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TurnInputError";
  }
}

export interface TurnDeps {
  client: LlmClient;
  prompt: PromptConfig;
  systemPrompt?: string;
  logger?: Logger;
}

export interface TurnOutcome {
  reply: Message;
  intent: TurnIntent | null;
  response: AgentResponse | null;
  dashboard: RenderedDashboard | null;
  error?: CompletionFailure;
}

const FAILURE_MESSAGES: Record<CompletionFailureKind, string> = {
  timeout: "El modelo tardó demasiado en responder. Probá enviar el mensaje de nuevo.",
  unreachable:
    "No pude conectarme con el modelo. Verificá que el servidor del modelo esté disponible y probá de nuevo.",
  provider: "El proveedor del modelo devolvió un error. Probá enviar el mensaje de nuevo.",
  unknown: "Ocurrió un error inesperado al consultar el modelo. Probá de nuevo.",
};

const NO_DATASET_REPLY = "Subí un dataset (CSV o Excel) para empezar.";
const RENDER_REPLY = "Acá está el dashboard actual.";
const EMPTY_INSIGHT_REPLY = "El modelo no devolvió contenido. Probá reformular la pregunta.";
const DATASET_CHANGED_REPLY =
  "El dataset cambió mientras procesaba tu mensaje. Descarté la respuesta: enviá el pedido de nuevo.";

function clarificationText(question: string, options: string[]): string {
  if (options.length === 0) return question;
  return [question, ...options.map((o) => `- ${o}`)].join("\n");
}

/**
 * Un turno de conversacion: intencion → prompt → modelo → interpretacion →
 * actualizacion de la sesion. Los fallos del modelo quedan en el turno.
 */
export async function runTurn(
  session: AnalystSession,
  text: string,
  deps: TurnDeps
): Promise<TurnOutcome> {
  const message = text.trim();
  if (!message) throw new TurnInputError("El mensaje esta vacio");
  const log = deps.logger ?? createLogger("chat");

  const dataset = session.dataset;
  const summary = session.summary;
  if (!dataset || !summary) {
    session.appendMessage("user", message);
    const reply = session.appendMessage("assistant", NO_DATASET_REPLY, "info");
    return { reply, intent: null, response: null, dashboard: null };
  }

  const current = session.dashboard;
  const intent = detectIntent(message, current !== null);
  const history = [...session.messages];
  session.appendMessage("user", message);

  if (intent === "render" && current) {
    const reply = session.appendMessage("assistant", RENDER_REPLY, "info");
    return { reply, intent, response: null, dashboard: renderDashboard(current, dataset) };
  }

  const pendingQuestion = session.pendingQuestion;
  const prompt = buildTurnPrompt(
    {
      userMessage: message,
      summary,
      history,
      mode: intent === "revise" ? "revise" : "create",
      dashboard: current?.spec ?? null,
      userGoal: session.userGoal,
      pendingQuestion,
      historyLimit: deps.prompt.historyMessages,
    },
    deps.prompt.contextChars
  );

  const result = await deps.client.complete({
    system: deps.systemPrompt ?? getSystemPrompt(),
    prompt,
  });

  // Una carga durante la espera reemplaza el dataset: la respuesta ya no aplica
  const active = session.dataset;
  if (active !== dataset) {
    log.warn("Dataset reemplazado durante el turno", { session: session.id });
    const reply = session.appendMessage("assistant", DATASET_CHANGED_REPLY, "info");
    const state = session.dashboard;
    return {
      reply,
      intent,
      response: null,
      dashboard: state && active ? renderDashboard(state, active) : null,
    };
  }

  if (!result.ok) {
    log.warn("Fallo la llamada al modelo", {
      session: session.id,
      model: deps.client.modelId,
      kind: result.error.kind,
      error: result.error.message,
      latency_ms: result.latencyMs,
    });
    const reply = session.appendMessage("assistant", FAILURE_MESSAGES[result.error.kind], "error");
    return {
      reply,
      intent,
      response: null,
      dashboard: current ? renderDashboard(current, dataset) : null,
      error: result.error,
    };
  }

  const response = interpretResponse(result.text, {
    columns: dataset.columns.map((c) => c.name),
  });

  if (pendingQuestion) {
    session.resolveClarification(message);
  } else if (intent === "create") {
    session.setUserGoal(message);
  }

  let reply: Message;
  switch (response.kind) {
    case "clarification":
      session.beginClarification(response.question);
      reply = session.appendMessage(
        "assistant",
        clarificationText(response.question, response.options),
        "clarification"
      );
      break;
    case "dashboard": {
      const state = session.setDashboard(response.spec);
      const lead =
        response.text ||
        response.spec.conclusion ||
        `Dashboard "${response.spec.title}" con ${response.spec.widgets.length} widgets.`;
      const content = response.warnings.length > 0
        ? `${lead}\n\n${response.warnings.join("\n")}`
        : lead;
      reply = session.appendMessage("assistant", content, "dashboard");
      log.debug("Dashboard actualizado", { session: session.id, revision: state.revision });
      break;
    }
    case "insight":
      if (response.text) session.setInsight(response.text);
      reply = session.appendMessage("assistant", response.text || EMPTY_INSIGHT_REPLY, "insight");
      break;
  }

  log.info("Turno completado", {
    session: session.id,
    intent,
    kind: response.kind,
    reason: response.kind === "insight" ? response.reason : undefined,
    model: deps.client.modelId,
    latency_ms: result.latencyMs,
    tokens_input: result.usage.inputTokens,
    tokens_output: result.usage.outputTokens,
  });

  const latest = session.dashboard;
  return {
    reply,
    intent,
    response,
    dashboard: latest ? renderDashboard(latest, dataset) : null,
  };
}
