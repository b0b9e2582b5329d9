import {
  CLARIFICATION_FENCE,
  DASHBOARD_FENCE,
  clarificationBlockSchema,
  dashboardBlockSchema,
  referencedColumns,
} from "@/lib/ai/contract";
import type { AgentResponse, DashboardSpec, InsightReason } from "@/lib/types";

// ```dashboard ... ``` o ```clarification ... ```
const FENCED_BLOCK = new RegExp(
  "```[ \\t]*(" + DASHBOARD_FENCE + "|" + CLARIFICATION_FENCE + ")[ \\t]*\\r?\\n([\\s\\S]*?)```",
  "i"
);

interface InterpretOptions {
  /** Columnas del dataset activo; los widgets que nombren otras se descartan. */
  columns?: string[];
}

function insight(text: string, reason: InsightReason): AgentResponse {
  return { kind: "insight", text, reason };
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function outsideText(raw: string, block: string): string {
  return raw.replace(block, "").replace(/\n{3,}/g, "\n\n").trim();
}

function interpretClarification(raw: string, body: string, block: string): AgentResponse {
  const trimmed = body.trim();
  const json = parseJson(trimmed);

  if (json !== undefined) {
    const parsed = clarificationBlockSchema.safeParse(json);
    if (!parsed.success) return insight(raw.trim(), "invalid_clarification");
    return { kind: "clarification", question: parsed.data.question, options: parsed.data.options };
  }

  // Cuerpo en texto plano: la pregunta es el cuerpo
  if (trimmed) return { kind: "clarification", question: trimmed, options: [] };

  const around = outsideText(raw, block);
  return around
    ? { kind: "clarification", question: around, options: [] }
    : insight(raw.trim(), "invalid_clarification");
}

function interpretDashboard(
  raw: string,
  body: string,
  block: string,
  options: InterpretOptions
): AgentResponse {
  const json = parseJson(body.trim());
  const parsed = dashboardBlockSchema.safeParse(json);
  if (!parsed.success) return insight(raw.trim(), "invalid_dashboard");

  const warnings: string[] = [];
  let widgets = parsed.data.widgets;

  if (options.columns) {
    const known = new Set(options.columns);
    widgets = widgets.filter((widget) => {
      const missing = referencedColumns(widget).filter((c) => !known.has(c));
      if (missing.length === 0) return true;
      const name = widget.kind === "kpi" ? widget.label : widget.title;
      warnings.push(`Se omitio "${name}": columnas inexistentes (${missing.join(", ")})`);
      return false;
    });
    if (widgets.length === 0) return insight(raw.trim(), "unknown_columns");
  }

  const text = outsideText(raw, block);
  const spec: DashboardSpec = {
    title: parsed.data.title,
    conclusion: parsed.data.conclusion ?? (text || undefined),
    widgets,
    narrative: parsed.data.narrative,
  };
  return { kind: "dashboard", spec, text, warnings };
}

/**
 * Clasifica la respuesta cruda del modelo en aclaracion, dashboard o insight.
 * Nunca lanza: cualquier cosa no reconocida vuelve como insight con el texto crudo.
 */
export function interpretResponse(raw: string, options: InterpretOptions = {}): AgentResponse {
  try {
    if (!raw.trim()) return insight("", "empty");

    const match = FENCED_BLOCK.exec(raw);
    if (!match) return insight(raw.trim(), "no_block");

    const [block, tag, body] = match;
    return tag.toLowerCase() === CLARIFICATION_FENCE
      ? interpretClarification(raw, body, block)
      : interpretDashboard(raw, body, block, options);
  } catch {
    return insight(typeof raw === "string" ? raw.trim() : "", "no_block");
  }
}
