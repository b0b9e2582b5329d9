import { describe, it, expect } from "vitest";
import {
  buildTurnPrompt,
  formatSchema,
  getSystemPrompt,
  truncate,
  type TurnPromptInput,
} from "@/lib/ai/prompts";
import { summarizeDataset } from "@/lib/data/dataset-loader";
import type { DashboardSpec, Message } from "@/lib/types";
import { SALES_CSV, datasetFromCsv } from "./helpers";

const summary = summarizeDataset(datasetFromCsv(SALES_CSV));

function userMessage(i: number, extra = 80): Message {
  return {
    id: `m${i}`,
    role: "user",
    content: `mensaje ${i} ${"x".repeat(extra)}`,
    createdAt: i,
  };
}

function input(overrides: Partial<TurnPromptInput> = {}): TurnPromptInput {
  return {
    userMessage: "hola",
    summary,
    history: [],
    mode: "create",
    ...overrides,
  };
}

describe("truncate", () => {
  it("recorta con elipsis sin pasar el maximo", () => {
    expect(truncate("abcdef", 4)).toBe("abc…");
    expect(truncate("abc", 3)).toBe("abc");
    expect(truncate("abc", 1)).toBe("…");
    expect(truncate("abc", 0)).toBe("");
  });
});

describe("formatSchema", () => {
  it("describe archivo y columnas con sus estadisticas", () => {
    const lines = formatSchema(summary).split("\n");
    expect(lines[0]).toBe("Archivo: ventas.csv (5 filas, 4 columnas)");
    expect(lines[1]).toBe(
      "- region (string) | nulos: 0 | distintos: 3 | frecuentes: Norte, Sur, Centro"
    );
    expect(lines[3]).toBe(
      "- ventas (number) | nulos: 0 | distintos: 5 | rango: 20 a 100 | media: 56"
    );
  });
});

describe("buildTurnPrompt", () => {
  it("ubica el mensaje del usuario al final", () => {
    const prompt = buildTurnPrompt(input(), 8000);
    expect(prompt.startsWith("## Esquema del dataset\n")).toBe(true);
    expect(prompt.endsWith("## Mensaje del usuario\nhola")).toBe(true);
    expect(prompt).toContain("## Filas de ejemplo\n");
    expect(prompt).toContain("Modo: proponer un dashboard nuevo");
  });

  it("nunca supera el limite de caracteres", () => {
    const history = Array.from({ length: 40 }, (_, i) => userMessage(i, 2000));
    for (const budget of [500, 800, 2000, 8000]) {
      const prompt = buildTurnPrompt(
        input({ userMessage: "y".repeat(5000), history, userGoal: "z".repeat(1000) }),
        budget
      );
      expect(prompt.length).toBeLessThanOrEqual(budget);
    }
  });

  it("el estado largo no desplaza al mensaje del usuario con el limite minimo", () => {
    const dashboard: DashboardSpec = {
      title: "Ventas",
      widgets: [{ kind: "kpi", label: "Total", column: "ventas", aggregation: "sum", format: "number" }],
    };
    const prompt = buildTurnPrompt(
      input({
        userMessage: "quiero ver ventas por producto",
        mode: "revise",
        dashboard,
        userGoal: "g".repeat(400),
        pendingQuestion: "p".repeat(400),
      }),
      500
    );

    expect(prompt.length).toBeLessThanOrEqual(500);
    expect(prompt.endsWith("## Mensaje del usuario\nquiero ver ventas por producto")).toBe(true);
    expect(prompt).toContain("## Estado\nModo: revisar el dashboard actual segun el pedido");
  });

  it("recorta un mensaje largo a una parte del limite", () => {
    const prompt = buildTurnPrompt(input({ userMessage: "y".repeat(5000) }), 8000);
    expect(prompt.endsWith(`${"y".repeat(1999)}…`)).toBe(true);
  });

  it("prioriza el historial mas reciente y conserva el orden", () => {
    const history = Array.from({ length: 20 }, (_, i) => userMessage(i));
    const prompt = buildTurnPrompt(
      input({ history, summary: summarizeDataset(datasetFromCsv(SALES_CSV), 0) }),
      900
    );

    expect(prompt).toContain("Usuario: mensaje 19 ");
    expect(prompt).not.toContain("mensaje 0 ");
    expect(prompt.indexOf("mensaje 18 ")).toBeLessThan(prompt.indexOf("mensaje 19 "));
  });

  it("sin limite de historial no incluye la conversacion", () => {
    const prompt = buildTurnPrompt(input({ history: [userMessage(1)], historyLimit: 0 }));
    expect(prompt).not.toContain("## Conversacion reciente");
  });

  it("incluye el dashboard actual solo al revisar", () => {
    const dashboard: DashboardSpec = {
      title: "Ventas",
      widgets: [{ kind: "kpi", label: "Total", column: "ventas", aggregation: "sum", format: "number" }],
    };
    const revise = buildTurnPrompt(input({ mode: "revise", dashboard }));
    const create = buildTurnPrompt(input({ mode: "create", dashboard }));

    expect(revise).toContain("## Dashboard actual\n");
    expect(revise).toContain("Modo: revisar el dashboard actual segun el pedido");
    expect(create).not.toContain("## Dashboard actual");
  });

  it("indica la aclaracion pendiente y el objetivo", () => {
    const prompt = buildTurnPrompt(
      input({ userGoal: "ver ventas", pendingQuestion: "¿Por region o por producto?" })
    );
    expect(prompt).toContain("Objetivo del usuario: ver ventas");
    expect(prompt).toContain('Aclaracion pendiente: "¿Por region o por producto?"');
    expect(prompt).toContain("No vuelvas a preguntar lo mismo.");
  });
});

describe("getSystemPrompt", () => {
  it("describe ambos formatos de respuesta", () => {
    const system = getSystemPrompt();
    expect(system).toContain("```dashboard");
    expect(system).toContain("```clarification");
  });
});
