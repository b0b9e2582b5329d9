import { describe, it, expect, beforeEach } from "vitest";
import { TurnInputError, runTurn, type TurnDeps } from "@/lib/agent/run-turn";
import type { CompletionResult, LlmClient } from "@/lib/ai/client";
import { createLogger } from "@/lib/logger";
import { AnalystSession } from "@/lib/session/analyst-session";
import { FakeLlmClient, SALES_CSV, datasetFromCsv, fenced, ok } from "./helpers";

const BAR_DASHBOARD = fenced("dashboard", {
  title: "Ventas por region",
  conclusion: "El Norte lidera las ventas.",
  widgets: [
    { kind: "chart", type: "bar", title: "Ventas por region", x: "region", y: "ventas", aggregation: "sum" },
  ],
});

const WITH_KPI = fenced("dashboard", {
  title: "Ventas por region",
  widgets: [
    { kind: "kpi", label: "Total", column: "ventas" },
    { kind: "chart", type: "bar", title: "Ventas por region", x: "region", y: "ventas" },
  ],
});

const CLARIFY = fenced("clarification", {
  question: "¿Qué querés mejorar?",
  options: ["colores", "agregar KPIs"],
});

const TIMEOUT: CompletionResult = {
  ok: false,
  error: { kind: "timeout", message: "El modelo no respondio en 20 ms" },
  latencyMs: 20,
};

function setup(results: CompletionResult[], withDataset = true) {
  const session = new AnalystSession();
  if (withDataset) session.setDataset(datasetFromCsv(SALES_CSV));
  const client = new FakeLlmClient(results);
  const deps: TurnDeps = {
    client,
    prompt: { contextChars: 8000, historyMessages: 12, sampleRows: 5 },
    systemPrompt: "sistema",
    logger: createLogger("test", "silent"),
  };
  return { session, client, deps };
}

describe("runTurn", () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup([]);
  });

  it("sin dataset pide subir uno sin llamar al modelo", async () => {
    const { session, client, deps } = setup([], false);

    const outcome = await runTurn(session, "hola", deps);

    expect(outcome.reply.kind).toBe("info");
    expect(outcome.reply.content).toBe("Subí un dataset (CSV o Excel) para empezar.");
    expect(client.requests).toHaveLength(0);
    expect(session.messages).toHaveLength(2);
  });

  it("rechaza mensajes vacios", async () => {
    await expect(runTurn(ctx.session, "   ", ctx.deps)).rejects.toThrow(TurnInputError);
    expect(ctx.session.messages).toHaveLength(0);
  });

  it("un pedido claro produce un grafico de barras renderizado", async () => {
    const { session, client, deps } = setup([ok(BAR_DASHBOARD)]);

    const outcome = await runTurn(session, "Mostrame un grafico de barras de ventas por region", deps);

    expect(outcome.intent).toBe("create");
    expect(outcome.response?.kind).toBe("dashboard");
    expect(outcome.reply).toMatchObject({
      role: "assistant",
      kind: "dashboard",
      content: "El Norte lidera las ventas.",
    });
    expect(outcome.dashboard?.revision).toBe(1);
    expect(outcome.dashboard?.widgets).toEqual([
      {
        kind: "chart",
        chart: {
          type: "bar",
          title: "Ventas por region",
          indexBy: "region",
          keys: ["ventas (sum)"],
          layout: "vertical",
          data: [
            { region: "Norte", "ventas (sum)": 130 },
            { region: "Centro", "ventas (sum)": 80 },
            { region: "Sur", "ventas (sum)": 70 },
          ],
        },
      },
    ]);
    expect(session.userGoal).toBe("Mostrame un grafico de barras de ventas por region");
    expect(client.requests[0].system).toBe("sistema");
    expect(
      client.requests[0].prompt.endsWith(
        "## Mensaje del usuario\nMostrame un grafico de barras de ventas por region"
      )
    ).toBe(true);
  });

  it("un pedido ambiguo abre una aclaracion y la respuesta la resuelve", async () => {
    const { session, client, deps } = setup([ok(BAR_DASHBOARD), ok(CLARIFY), ok(WITH_KPI)]);
    await runTurn(session, "ventas por region", deps);

    const asked = await runTurn(session, "mejoralo", deps);

    expect(asked.intent).toBe("revise");
    expect(asked.reply.kind).toBe("clarification");
    expect(asked.reply.content).toBe("¿Qué querés mejorar?\n- colores\n- agregar KPIs");
    expect(session.awaitingClarification).toBe(true);
    expect(asked.dashboard?.revision).toBe(1);
    expect(client.requests[1].prompt).toContain("Modo: revisar el dashboard actual segun el pedido");
    expect(client.requests[1].prompt).toContain("Usuario: ventas por region");

    const answered = await runTurn(session, "agregar KPIs", deps);

    expect(client.requests[2].prompt).toContain('Aclaracion pendiente: "¿Qué querés mejorar?"');
    expect(answered.response?.kind).toBe("dashboard");
    expect(answered.dashboard?.revision).toBe(2);
    expect(answered.dashboard?.widgets[0]).toEqual({
      kind: "kpi",
      kpi: { label: "Total", value: 280, format: "number", detail: "ventas (sum)" },
    });
    expect(answered.reply.content).toBe('Dashboard "Ventas por region" con 2 widgets.');
    expect(session.awaitingClarification).toBe(false);
    expect(session.userGoal).toBe("ventas por region (aclaracion: agregar KPIs)");
  });

  it("un fallo del modelo deja la sesion como estaba", async () => {
    const { session, deps } = setup([ok(BAR_DASHBOARD), ok(CLARIFY), TIMEOUT]);
    await runTurn(session, "ventas por region", deps);
    await runTurn(session, "mejoralo", deps);

    const outcome = await runTurn(session, "agregar KPIs", deps);

    expect(outcome.error?.kind).toBe("timeout");
    expect(outcome.reply.kind).toBe("error");
    expect(outcome.reply.content).toBe(
      "El modelo tardó demasiado en responder. Probá enviar el mensaje de nuevo."
    );
    expect(outcome.dashboard?.revision).toBe(1);
    expect(session.pendingQuestion).toBe("¿Qué querés mejorar?");
    expect(session.userGoal).toBe("ventas por region");
    expect(session.messages).toHaveLength(6);
  });

  it("pedir ver el dashboard no llama al modelo", async () => {
    const { session, client, deps } = setup([ok(BAR_DASHBOARD)]);
    await runTurn(session, "ventas por region", deps);

    const outcome = await runTurn(session, "mostrame el dashboard", deps);

    expect(client.requests).toHaveLength(1);
    expect(outcome.intent).toBe("render");
    expect(outcome.reply.content).toBe("Acá está el dashboard actual.");
    expect(outcome.dashboard?.revision).toBe(1);
  });

  it("una respuesta en texto queda como ultimo insight", async () => {
    const { session, deps } = setup([ok("El Norte concentra casi la mitad de las ventas.")]);

    const outcome = await runTurn(session, "¿Qué region vende mas?", deps);

    expect(outcome.reply.kind).toBe("insight");
    expect(session.latestInsight).toBe("El Norte concentra casi la mitad de las ventas.");
    expect(outcome.dashboard).toBeNull();
  });

  it("pedir un dashboard nuevo reemplaza el objetivo", async () => {
    const { session, client, deps } = setup([ok(BAR_DASHBOARD), ok(WITH_KPI)]);
    await runTurn(session, "ventas por region", deps);

    const outcome = await runTurn(session, "armá otro dashboard de unidades", deps);

    expect(outcome.intent).toBe("create");
    expect(client.requests[1].prompt).toContain("Modo: proponer un dashboard nuevo");
    expect(session.userGoal).toBe("armá otro dashboard de unidades");
    expect(outcome.dashboard?.revision).toBe(2);
  });

  it("descarta la respuesta si el dataset cambio durante el turno", async () => {
    const { session, deps } = setup([]);
    let release: (result: CompletionResult) => void = () => undefined;
    const client: LlmClient = {
      modelId: "fake-model",
      complete: () =>
        new Promise<CompletionResult>((resolve) => {
          release = resolve;
        }),
    };

    const pending = runTurn(session, "ventas por region", { ...deps, client });
    session.setDataset(datasetFromCsv("a,b\n1,2", "otro.csv"));
    release(ok(BAR_DASHBOARD));
    const outcome = await pending;

    expect(outcome.reply.kind).toBe("info");
    expect(outcome.reply.content).toBe(
      "El dataset cambió mientras procesaba tu mensaje. Descarté la respuesta: enviá el pedido de nuevo."
    );
    expect(outcome.response).toBeNull();
    expect(outcome.dashboard).toBeNull();
    expect(session.dataset?.fileName).toBe("otro.csv");
    expect(session.dashboard).toBeNull();
    expect(session.userGoal).toBeNull();
  });
});
