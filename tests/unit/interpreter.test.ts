import { describe, it, expect } from "vitest";
import { interpretResponse } from "@/lib/ai/interpreter";
import { fenced } from "./helpers";

const COLUMNS = ["region", "producto", "ventas", "unidades"];

describe("interpretResponse", () => {
  it("texto sin bloque es un insight", () => {
    expect(interpretResponse("Las ventas crecieron en el Norte.")).toEqual({
      kind: "insight",
      text: "Las ventas crecieron en el Norte.",
      reason: "no_block",
    });
  });

  it("respuesta vacia es un insight vacio", () => {
    expect(interpretResponse("   \n")).toEqual({ kind: "insight", text: "", reason: "empty" });
  });

  it("extrae la aclaracion con sus opciones", () => {
    const raw = `Antes de seguir:\n${fenced("clarification", {
      question: "¿Qué métrica querés ver?",
      options: ["ventas", "unidades"],
    })}`;

    expect(interpretResponse(raw)).toEqual({
      kind: "clarification",
      question: "¿Qué métrica querés ver?",
      options: ["ventas", "unidades"],
    });
  });

  it("acepta una aclaracion en texto plano", () => {
    const raw = "```clarification\n¿Por región o por producto?\n```";
    expect(interpretResponse(raw)).toEqual({
      kind: "clarification",
      question: "¿Por región o por producto?",
      options: [],
    });
  });

  it("aclaracion con JSON invalido para el contrato es un insight", () => {
    const raw = fenced("clarification", { options: ["a"] });
    const response = interpretResponse(raw);
    expect(response).toEqual({ kind: "insight", text: raw, reason: "invalid_clarification" });
  });

  it("parsea el dashboard aplicando defaults y alias de agregacion", () => {
    const raw = `Armé el tablero.\n${fenced("dashboard", {
      title: "Ventas",
      widgets: [
        { kind: "chart", type: "bar", title: "Ventas por region", x: "region", y: "ventas", aggregation: "avg" },
        { kind: "kpi", label: "Total", column: "ventas" },
      ],
    })}`;

    const response = interpretResponse(raw, { columns: COLUMNS });

    expect(response).toEqual({
      kind: "dashboard",
      text: "Armé el tablero.",
      warnings: [],
      spec: {
        title: "Ventas",
        conclusion: "Armé el tablero.",
        widgets: [
          {
            kind: "chart",
            type: "bar",
            title: "Ventas por region",
            x: "region",
            y: "ventas",
            aggregation: "mean",
          },
          { kind: "kpi", label: "Total", column: "ventas", aggregation: "sum", format: "number" },
        ],
      },
    });
  });

  it("reconoce la etiqueta del bloque sin importar mayusculas", () => {
    const raw = "```Dashboard\n" + JSON.stringify({
      title: "T",
      widgets: [{ kind: "kpi", label: "Filas", aggregation: "count" }],
    }) + "\n```";
    expect(interpretResponse(raw).kind).toBe("dashboard");
  });

  it("JSON roto en el bloque dashboard es un insight", () => {
    const raw = "```dashboard\n{\"title\": \"Ventas\", \n```";
    expect(interpretResponse(raw)).toEqual({
      kind: "insight",
      text: raw,
      reason: "invalid_dashboard",
    });
  });

  it("un grafico sin medida y sin count es invalido", () => {
    const raw = fenced("dashboard", {
      title: "Ventas",
      widgets: [{ kind: "chart", type: "bar", title: "Sin medida", x: "region" }],
    });
    const response = interpretResponse(raw);
    expect(response.kind).toBe("insight");
    expect(response.kind === "insight" && response.reason).toBe("invalid_dashboard");
  });

  it("descarta widgets con columnas inexistentes y avisa", () => {
    const raw = fenced("dashboard", {
      title: "Ventas",
      widgets: [
        { kind: "chart", type: "pie", title: "Por zona", x: "zona", y: "ventas" },
        { kind: "kpi", label: "Unidades", column: "unidades" },
      ],
    });

    const response = interpretResponse(raw, { columns: COLUMNS });

    expect(response.kind).toBe("dashboard");
    if (response.kind !== "dashboard") return;
    expect(response.spec.widgets).toHaveLength(1);
    expect(response.warnings).toEqual([
      'Se omitio "Por zona": columnas inexistentes (zona)',
    ]);
  });

  it("si ningun widget sobrevive responde con un insight", () => {
    const raw = fenced("dashboard", {
      title: "Ventas",
      widgets: [{ kind: "table", title: "Detalle", columns: ["zona"] }],
    });
    const response = interpretResponse(raw, { columns: COLUMNS });
    expect(response).toEqual({ kind: "insight", text: raw, reason: "unknown_columns" });
  });
});
