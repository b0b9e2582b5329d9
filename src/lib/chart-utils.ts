import type { CellValue, ChartConfig, KpiFormat } from "@/lib/types";

const LOCALE = "es-AR";

/**
 * Formatea un numero en forma compacta (1,2 K · 3,4 M · 5,6 B).
 */
export function formatCompact(value: number): string {
  const abs = Math.abs(value);
  if (abs >= 1_000_000_000) {
    return `${(value / 1_000_000_000).toLocaleString(LOCALE, { maximumFractionDigits: 1 })} B`;
  }
  if (abs >= 1_000_000) {
    return `${(value / 1_000_000).toLocaleString(LOCALE, { maximumFractionDigits: 1 })} M`;
  }
  if (abs >= 1_000) {
    return `${(value / 1_000).toLocaleString(LOCALE, { maximumFractionDigits: 1 })} K`;
  }
  return value.toLocaleString(LOCALE, { maximumFractionDigits: 2 });
}

export function formatKpiValue(value: number | null, format: KpiFormat): string {
  if (value === null) return "-";
  if (format === "percent") {
    return `${value.toLocaleString(LOCALE, { maximumFractionDigits: 1 })}%`;
  }
  if (format === "currency") {
    if (Math.abs(value) >= 1_000_000) return `$${formatCompact(value)}`;
    return `$${value.toLocaleString(LOCALE, { maximumFractionDigits: 0 })}`;
  }
  return value.toLocaleString(LOCALE, { maximumFractionDigits: 1 });
}

export function formatCell(value: CellValue): string {
  if (value === null) return "-";
  if (typeof value === "number") return value.toLocaleString(LOCALE, { maximumFractionDigits: 2 });
  if (typeof value === "boolean") return value ? "si" : "no";
  return value;
}

/**
 * Valida que un chart tenga data renderizable.
 * Si no, retorna el motivo para mostrar tabla en vez de chart roto.
 */
export function validateChartData(chart: ChartConfig): {
  valid: boolean;
  fallbackReason?: string;
} {
  switch (chart.type) {
    case "error":
      return { valid: false, fallbackReason: chart.reason };
    case "bar":
    case "pie":
      if (chart.data.length === 0) return { valid: false, fallbackReason: "Sin datos para agrupar" };
      break;
    case "line":
    case "scatter":
      if (!chart.data[0]?.data.length) return { valid: false, fallbackReason: "Serie vacia" };
      break;
    case "treemap":
      if (chart.data.children.length === 0) return { valid: false, fallbackReason: "Treemap sin children" };
      break;
  }
  return { valid: true };
}

/** Filas planas para la tabla de respaldo cuando el grafico no se puede dibujar. */
export function chartRows(chart: ChartConfig): Record<string, string | number>[] {
  switch (chart.type) {
    case "bar":
      return chart.data;
    case "pie":
      return chart.data.map(({ label, value }) => ({ categoria: label, valor: value }));
    case "treemap":
      return chart.data.children.map(({ name, value }) => ({ categoria: name, valor: value }));
    case "line":
      return chart.data.flatMap((serie) => serie.data.map(({ x, y }) => ({ x, y })));
    case "scatter":
      return chart.data.flatMap((serie) => serie.data.map(({ x, y }) => ({ x, y })));
    case "error":
      return [];
  }
}
