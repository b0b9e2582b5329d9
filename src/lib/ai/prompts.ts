import { readFileSync } from "fs";
import { join } from "path";
import type { ColumnSummary, DashboardSpec, DatasetSummary, Message } from "@/lib/types";

export const DEFAULT_CONTEXT_CHARS = 8000;

const SEPARATOR = "\n\n";
const MAX_MESSAGE_CHARS = 600;
const MAX_SAMPLE_ROW_CHARS = 400;
const MAX_STATE_LINE_CHARS = 300;

let cachedSystemPrompt: string | null = null;

export function getSystemPrompt(): string {
  if (cachedSystemPrompt) return cachedSystemPrompt;
  cachedSystemPrompt = readFileSync(join(process.cwd(), "prompts", "analyst.md"), "utf-8");
  return cachedSystemPrompt;
}

export type TurnMode = "create" | "revise";

export interface TurnPromptInput {
  userMessage: string;
  summary: DatasetSummary;
  /** Mensajes anteriores al turno actual, en orden cronologico. */
  history: readonly Message[];
  mode: TurnMode;
  dashboard?: DashboardSpec | null;
  userGoal?: string | null;
  pendingQuestion?: string | null;
  historyLimit?: number;
}

export function truncate(text: string, max: number): string {
  if (max <= 0) return "";
  if (text.length <= max) return text;
  if (max === 1) return "…";
  return `${text.slice(0, max - 1)}…`;
}

function section(title: string, body: string): string {
  return `## ${title}\n${body}`;
}

function formatColumn(c: ColumnSummary): string {
  const parts = [`- ${c.name} (${c.type})`, `nulos: ${c.nulls}`, `distintos: ${c.unique}`];
  if (c.min !== undefined && c.max !== undefined) parts.push(`rango: ${c.min} a ${c.max}`);
  if (c.mean !== undefined) parts.push(`media: ${c.mean}`);
  if (c.range) parts.push(`desde ${c.range[0]} hasta ${c.range[1]}`);
  if (c.topValues?.length) parts.push(`frecuentes: ${c.topValues.join(", ")}`);
  return parts.join(" | ");
}

export function formatSchema(summary: DatasetSummary): string {
  return [
    `Archivo: ${summary.fileName} (${summary.rowCount} filas, ${summary.columnCount} columnas)`,
    ...summary.columns.map(formatColumn),
  ].join("\n");
}

function formatMessage(message: Message): string {
  const who = message.role === "user" ? "Usuario" : "Asistente";
  const text = message.content.replace(/\s+/g, " ").trim();
  return `${who}: ${truncate(text, MAX_MESSAGE_CHARS)}`;
}

function formatState(input: TurnPromptInput): string {
  const lines = [
    input.mode === "revise"
      ? "Modo: revisar el dashboard actual segun el pedido"
      : "Modo: proponer un dashboard nuevo",
  ];
  if (input.userGoal) {
    lines.push(truncate(`Objetivo del usuario: ${input.userGoal}`, MAX_STATE_LINE_CHARS));
  }
  if (input.pendingQuestion) {
    lines.push(
      truncate(`Aclaracion pendiente: "${input.pendingQuestion}"`, MAX_STATE_LINE_CHARS),
      "El mensaje del usuario responde esa aclaracion. No vuelvas a preguntar lo mismo."
    );
  }
  return lines.join("\n");
}

/**
 * Arma una seccion con tantas lineas como entren en `room` caracteres.
 * Con `newestFirst` prioriza las ultimas lineas pero conserva el orden original.
 */
function fitLines(title: string, lines: string[], room: number, newestFirst = false): string {
  const header = `## ${title}\n`;
  let used = header.length + SEPARATOR.length;
  if (lines.length === 0 || used >= room) return "";

  const ordered = newestFirst ? [...lines].reverse() : lines;
  const kept: string[] = [];
  for (const line of ordered) {
    const cost = line.length + (kept.length > 0 ? 1 : 0);
    if (used + cost > room) break;
    kept.push(line);
    used += cost;
  }
  if (kept.length === 0) return "";
  if (newestFirst) kept.reverse();
  return header + kept.join("\n");
}

/**
 * Prompt del turno: esquema, filas de ejemplo, dashboard actual, historial
 * reciente, estado y mensaje del usuario. Deterministico y nunca mas largo
 * que `budget` caracteres.
 */
export function buildTurnPrompt(
  input: TurnPromptInput,
  budget: number = DEFAULT_CONTEXT_CHARS
): string {
  // Cuotas fijas: 80% del limite en cuerpos, el resto cubre encabezados y separadores
  const request = section(
    "Mensaje del usuario",
    truncate(input.userMessage.trim(), Math.floor(budget * 0.25))
  );
  const schema = section(
    "Esquema del dataset",
    truncate(formatSchema(input.summary), Math.floor(budget * 0.3))
  );
  const current =
    input.mode === "revise" && input.dashboard
      ? section(
          "Dashboard actual",
          truncate(JSON.stringify(input.dashboard), Math.floor(budget * 0.15))
        )
      : "";
  const state = section("Estado", truncate(formatState(input), Math.floor(budget * 0.1)));

  const fixed = [schema, current, state, request].filter(Boolean);
  let remaining = budget - fixed.reduce((n, s) => n + s.length + SEPARATOR.length, 0);

  const samples = fitLines(
    "Filas de ejemplo",
    input.summary.sampleRows.map((row) => truncate(JSON.stringify(row), MAX_SAMPLE_ROW_CHARS)),
    remaining
  );
  if (samples) remaining -= samples.length + SEPARATOR.length;

  const limit = input.historyLimit ?? 12;
  const recent = limit > 0 ? input.history.slice(-limit) : [];
  const history = fitLines("Conversacion reciente", recent.map(formatMessage), remaining, true);

  const prompt = [schema, samples, current, history, state, request]
    .filter(Boolean)
    .join(SEPARATOR);
  return truncate(prompt, budget);
}
