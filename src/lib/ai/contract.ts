import { z } from "zod/v3";
import type { Aggregation, ChartWidget, KpiWidget, WidgetDescriptor } from "@/lib/types";

/** Etiquetas de los bloques cercados que el modelo debe usar. */
export const DASHBOARD_FENCE = "dashboard";
export const CLARIFICATION_FENCE = "clarification";

const AGGREGATION_ALIASES: Record<string, Aggregation> = {
  sum: "sum",
  total: "sum",
  suma: "sum",
  mean: "mean",
  avg: "mean",
  average: "mean",
  promedio: "mean",
  count: "count",
  conteo: "count",
  min: "min",
  minimum: "min",
  max: "max",
  maximum: "max",
  median: "median",
  mediana: "median",
};

const aggregationSchema = z.preprocess(
  (value) =>
    typeof value === "string" ? (AGGREGATION_ALIASES[value.trim().toLowerCase()] ?? value) : value,
  z.enum(["sum", "mean", "count", "min", "max", "median"])
);

const chartWidgetSchema = z.object({
  kind: z.literal("chart"),
  type: z.enum(["bar", "line", "pie", "scatter", "treemap"]),
  title: z.string().min(1),
  x: z.string().min(1).describe("Columna de agrupacion o eje X"),
  y: z.string().min(1).optional().describe("Columna medida; omitir solo con count"),
  aggregation: aggregationSchema.default("sum"),
  layout: z.enum(["horizontal", "vertical"]).optional(),
  limit: z.number().int().positive().max(50).optional(),
});

const kpiWidgetSchema = z.object({
  kind: z.literal("kpi"),
  label: z.string().min(1),
  column: z.string().min(1).optional(),
  aggregation: aggregationSchema.default("sum"),
  format: z.enum(["number", "percent", "currency"]).default("number"),
});

const tableWidgetSchema = z.object({
  kind: z.literal("table"),
  title: z.string().min(1),
  columns: z.array(z.string().min(1)).min(1),
  limit: z.number().int().positive().max(200).default(20),
  downloadable: z.boolean().default(true),
});

export const widgetSchema = z.discriminatedUnion("kind", [
  chartWidgetSchema,
  kpiWidgetSchema,
  tableWidgetSchema,
]);

export const narrativeSchema = z.object({
  headline: z.string().min(1),
  summary: z.string().optional(),
  insights: z.array(z.string()).default([]),
  assumptions: z.array(z.string()).optional(),
});

function needsMeasure(widget: ChartWidget | KpiWidget): boolean {
  if (widget.kind === "chart" && widget.type === "scatter") return true;
  return widget.aggregation !== "count";
}

export const dashboardBlockSchema = z
  .object({
    title: z.string().min(1),
    conclusion: z.string().optional(),
    widgets: z.array(widgetSchema).min(1).max(12),
    narrative: narrativeSchema.optional(),
  })
  .superRefine((block, ctx) => {
    block.widgets.forEach((widget, i) => {
      if (widget.kind === "chart" && needsMeasure(widget) && !widget.y) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["widgets", i, "y"],
          message: `El grafico "${widget.title}" necesita una columna "y"`,
        });
      }
      if (widget.kind === "kpi" && needsMeasure(widget) && !widget.column) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["widgets", i, "column"],
          message: `El KPI "${widget.label}" necesita una columna`,
        });
      }
    });
  });

export const clarificationBlockSchema = z.object({
  question: z.string().min(1),
  options: z.array(z.string().min(1)).max(6).default([]),
});

/** Columnas del dataset que un widget referencia. */
export function referencedColumns(widget: WidgetDescriptor): string[] {
  switch (widget.kind) {
    case "chart":
      return widget.y ? [widget.x, widget.y] : [widget.x];
    case "kpi":
      return widget.column ? [widget.column] : [];
    case "table":
      return widget.columns;
  }
}
