import type {
  Aggregation,
  CellValue,
  ChartConfig,
  ChartWidget,
  ColumnSchema,
  DashboardState,
  Dataset,
  KpiWidget,
  RenderedDashboard,
  RenderedWidget,
  TableWidget,
} from "@/lib/types";

const BAR_LIMIT = 15;
const PIE_LIMIT = 8;
const TREEMAP_LIMIT = 20;
const SCATTER_LIMIT = 500;
const MISSING_LABEL = "(vacio)";
const OTHERS_LABEL = "Otros";

export function aggregate(values: number[], aggregation: Aggregation): number | null {
  if (aggregation === "count") return values.length;
  if (values.length === 0) return aggregation === "sum" ? 0 : null;

  switch (aggregation) {
    case "sum":
      return values.reduce((a, b) => a + b, 0);
    case "mean":
      return values.reduce((a, b) => a + b, 0) / values.length;
    case "min":
      return Math.min(...values);
    case "max":
      return Math.max(...values);
    case "median": {
      const sorted = [...values].sort((a, b) => a - b);
      const mid = Math.floor(sorted.length / 2);
      return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
    }
  }
}

export function measureLabel(measure: string | undefined, aggregation: Aggregation): string {
  return `${measure ?? "registros"} (${aggregation})`;
}

function findColumn(dataset: Dataset, name: string): ColumnSchema | undefined {
  return dataset.columns.find((c) => c.name === name);
}

/** Error de columna, o null si todas existen y las medidas son numericas. */
function checkColumns(
  dataset: Dataset,
  dimension: string | undefined,
  measure: string | undefined,
  aggregation: Aggregation
): string | null {
  for (const name of [dimension, measure]) {
    if (name && !findColumn(dataset, name)) return `La columna "${name}" no existe`;
  }
  if (aggregation !== "count") {
    if (!measure) return "Falta la columna a medir";
    if (findColumn(dataset, measure)?.type !== "number") {
      return `La columna "${measure}" no es numerica`;
    }
  }
  return null;
}

function numeric(value: CellValue): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

interface Group {
  key: string;
  raw: CellValue;
  values: number[];
  rows: number;
  present: number;
}

function groupBy(dataset: Dataset, dimension: string, measure: string | undefined): Group[] {
  const groups = new Map<string, Group>();
  for (const row of dataset.rows) {
    const raw = row[dimension] ?? null;
    const key = raw === null ? MISSING_LABEL : String(raw);
    let group = groups.get(key);
    if (!group) {
      group = { key, raw, values: [], rows: 0, present: 0 };
      groups.set(key, group);
    }
    group.rows++;
    if (measure) {
      const cell = row[measure] ?? null;
      if (cell !== null) group.present++;
      const n = numeric(cell);
      if (n !== null) group.values.push(n);
    }
  }
  return [...groups.values()];
}

interface Point {
  key: string;
  raw: CellValue;
  value: number;
}

function aggregateGroups(dataset: Dataset, widget: ChartWidget): Point[] {
  const points: Point[] = [];
  for (const group of groupBy(dataset, widget.x, widget.y)) {
    // count sin medida cuenta filas; con medida cuenta valores no nulos
    const value =
      widget.aggregation === "count"
        ? widget.y
          ? group.present
          : group.rows
        : aggregate(group.values, widget.aggregation);
    if (value !== null) points.push({ key: group.key, raw: group.raw, value });
  }
  return points;
}

function compareKeys(a: Point, b: Point): number {
  if (typeof a.raw === "number" && typeof b.raw === "number") return a.raw - b.raw;
  if (a.raw === null) return 1;
  if (b.raw === null) return -1;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

/** Categorias de texto por valor descendente; numeros y fechas por clave. */
function orderPoints(points: Point[], dimension: ColumnSchema | undefined): Point[] {
  const ordinal = dimension?.type === "number" || dimension?.type === "date";
  return [...points].sort(ordinal ? compareKeys : (a, b) => b.value - a.value);
}

function foldRest(points: Point[], limit: number): Point[] {
  if (points.length <= limit) return points;
  const head = points.slice(0, limit - 1);
  const rest = points.slice(limit - 1).reduce((sum, p) => sum + p.value, 0);
  return [...head, { key: OTHERS_LABEL, raw: OTHERS_LABEL, value: rest }];
}

function round(n: number): number {
  return Math.round(n * 100) / 100;
}

function renderChart(widget: ChartWidget, dataset: Dataset): ChartConfig {
  const type = widget.type;
  if (type === "scatter") {
    return renderScatter(widget, dataset);
  }

  const problem = checkColumns(dataset, widget.x, widget.y, widget.aggregation);
  if (problem) return { type: "error", title: widget.title, reason: problem };

  const dimension = findColumn(dataset, widget.x);
  const points = aggregateGroups(dataset, widget);
  const valueKey = measureLabel(widget.y, widget.aggregation);

  switch (type) {
    case "bar": {
      const ordered = orderPoints(points, dimension).slice(0, widget.limit ?? BAR_LIMIT);
      return {
        type: "bar",
        title: widget.title,
        indexBy: widget.x,
        keys: [valueKey],
        layout: widget.layout ?? (ordered.length > 5 ? "horizontal" : "vertical"),
        data: ordered.map((p) => ({ [widget.x]: p.key, [valueKey]: round(p.value) })),
      };
    }
    case "line": {
      const ordered = [...points].sort(compareKeys);
      return {
        type: "line",
        title: widget.title,
        data: [
          {
            id: valueKey,
            data: ordered.map((p) => ({
              x: typeof p.raw === "number" ? p.raw : p.key,
              y: round(p.value),
            })),
          },
        ],
      };
    }
    case "pie": {
      const ordered = foldRest(
        [...points].sort((a, b) => b.value - a.value),
        widget.limit ?? PIE_LIMIT
      );
      return {
        type: "pie",
        title: widget.title,
        data: ordered.map((p) => ({ id: p.key, label: p.key, value: round(p.value) })),
      };
    }
    case "treemap": {
      const ordered = foldRest(
        [...points].sort((a, b) => b.value - a.value),
        Math.min(widget.limit ?? TREEMAP_LIMIT, TREEMAP_LIMIT)
      );
      return {
        type: "treemap",
        title: widget.title,
        data: {
          name: widget.title,
          children: ordered.map((p) => ({ name: p.key, value: round(p.value) })),
        },
      };
    }
  }
}

function renderScatter(widget: ChartWidget, dataset: Dataset): ChartConfig {
  const y = widget.y;
  if (!y) return { type: "error", title: widget.title, reason: "Falta la columna Y" };
  for (const name of [widget.x, y]) {
    const column = findColumn(dataset, name);
    if (!column) return { type: "error", title: widget.title, reason: `La columna "${name}" no existe` };
    if (column.type !== "number") {
      return { type: "error", title: widget.title, reason: `La columna "${name}" no es numerica` };
    }
  }

  const points: { x: number; y: number }[] = [];
  for (const row of dataset.rows) {
    const px = numeric(row[widget.x] ?? null);
    const py = numeric(row[y] ?? null);
    if (px !== null && py !== null) points.push({ x: px, y: py });
    if (points.length >= (widget.limit ?? SCATTER_LIMIT)) break;
  }

  return {
    type: "scatter",
    title: widget.title,
    xLabel: widget.x,
    yLabel: y,
    data: [{ id: `${y} vs ${widget.x}`, data: points }],
  };
}

function renderKpi(widget: KpiWidget, dataset: Dataset): RenderedWidget {
  const problem = checkColumns(dataset, undefined, widget.column, widget.aggregation);
  if (problem) {
    return { kind: "kpi", kpi: { label: widget.label, value: null, format: widget.format, detail: problem } };
  }

  const column = widget.column;
  let value: number | null;
  if (!column) {
    value = dataset.rows.length;
  } else {
    const values = dataset.rows
      .map((row) => numeric(row[column] ?? null))
      .filter((v): v is number => v !== null);
    value =
      widget.aggregation === "count"
        ? dataset.rows.filter((row) => (row[column] ?? null) !== null).length
        : aggregate(values, widget.aggregation);
  }

  return {
    kind: "kpi",
    kpi: {
      label: widget.label,
      value: value === null ? null : round(value),
      format: widget.format,
      detail: measureLabel(column, widget.aggregation),
    },
  };
}

function renderTable(widget: TableWidget, dataset: Dataset): RenderedWidget {
  const columns = widget.columns.filter((c) => findColumn(dataset, c));
  return {
    kind: "table",
    table: {
      title: widget.title,
      columns,
      rows: dataset.rows.slice(0, widget.limit).map((row) =>
        Object.fromEntries(columns.map((c) => [c, row[c] ?? null]))
      ),
      downloadable: widget.downloadable,
    },
  };
}

/**
 * Resuelve cada widget del spec contra el dataset. Puro: no guarda estado
 * entre renders y un widget invalido no rompe a los demas.
 */
export function renderDashboard(state: DashboardState, dataset: Dataset): RenderedDashboard {
  const { spec } = state;
  const widgets = spec.widgets.map((widget): RenderedWidget => {
    switch (widget.kind) {
      case "kpi":
        return renderKpi(widget, dataset);
      case "table":
        return renderTable(widget, dataset);
      case "chart":
        return { kind: "chart", chart: renderChart(widget, dataset) };
    }
  });

  return {
    title: spec.title,
    conclusion: spec.conclusion,
    revision: state.revision,
    widgets,
    narrative: spec.narrative,
  };
}
