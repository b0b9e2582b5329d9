// DashboardSpec: contrato entre el LLM y la UI

export type CellValue = string | number | boolean | null;
export type DataRow = Record<string, CellValue>;

export type ColumnType = "number" | "string" | "date" | "boolean";

export interface ColumnSchema {
  name: string;
  type: ColumnType;
  nonNull: number;
  unique: number;
}

export interface Dataset {
  id: string;
  fileName: string;
  format: "csv" | "xlsx";
  columns: ColumnSchema[];
  rows: DataRow[];
  loadedAt: number;
}

export interface ColumnSummary extends ColumnSchema {
  nulls: number;
  min?: number;
  max?: number;
  mean?: number;
  topValues?: string[];
  range?: [string, string];
}

/** Lo que el modelo ve del dataset. */
export interface DatasetSummary {
  fileName: string;
  rowCount: number;
  columnCount: number;
  columns: ColumnSummary[];
  sampleRows: DataRow[];
}

export type Aggregation = "sum" | "mean" | "count" | "min" | "max" | "median";
export type ChartType = "bar" | "line" | "pie" | "scatter" | "treemap";
export type KpiFormat = "number" | "percent" | "currency";

export interface ChartWidget {
  kind: "chart";
  type: ChartType;
  title: string;
  x: string;
  y?: string;
  aggregation: Aggregation;
  layout?: "horizontal" | "vertical";
  limit?: number;
}

export interface KpiWidget {
  kind: "kpi";
  label: string;
  column?: string;
  aggregation: Aggregation;
  format: KpiFormat;
}

export interface TableWidget {
  kind: "table";
  title: string;
  columns: string[];
  limit: number;
  downloadable: boolean;
}

export type WidgetDescriptor = ChartWidget | KpiWidget | TableWidget;

export interface Narrative {
  headline: string;
  summary?: string;
  insights: string[];
  assumptions?: string[];
}

export interface DashboardSpec {
  title: string;
  conclusion?: string;
  widgets: WidgetDescriptor[];
  narrative?: Narrative;
}

export interface DashboardState {
  spec: DashboardSpec;
  revision: number;
  timestamp: number;
}

export type InsightReason =
  | "no_block"
  | "empty"
  | "invalid_dashboard"
  | "invalid_clarification"
  | "unknown_columns";

export type AgentResponse =
  | { kind: "clarification"; question: string; options: string[] }
  | { kind: "dashboard"; spec: DashboardSpec; text: string; warnings: string[] }
  | { kind: "insight"; text: string; reason?: InsightReason };

export type MessageKind = "clarification" | "dashboard" | "insight" | "error" | "info";

export interface Message {
  readonly id: string;
  readonly role: "user" | "assistant";
  readonly content: string;
  readonly createdAt: number;
  readonly kind?: MessageKind;
}

// Dashboard resuelto contra el dataset, listo para Nivo

export interface KpiCardData {
  label: string;
  value: number | null;
  format: KpiFormat;
  detail?: string;
}

export interface BarChartData {
  type: "bar";
  title: string;
  data: Record<string, string | number>[];
  keys: string[];
  indexBy: string;
  layout: "horizontal" | "vertical";
}

export interface LineChartData {
  type: "line";
  title: string;
  data: { id: string; data: { x: string | number; y: number }[] }[];
}

export interface PieChartData {
  type: "pie";
  title: string;
  data: { id: string; label: string; value: number }[];
}

export interface TreemapChartData {
  type: "treemap";
  title: string;
  data: { name: string; children: { name: string; value: number }[] };
}

export interface ScatterChartData {
  type: "scatter";
  title: string;
  xLabel: string;
  yLabel: string;
  data: { id: string; data: { x: number; y: number }[] }[];
}

export interface ChartError {
  type: "error";
  title: string;
  reason: string;
}

export type ChartConfig =
  | BarChartData
  | LineChartData
  | PieChartData
  | TreemapChartData
  | ScatterChartData
  | ChartError;

export interface TableConfig {
  title: string;
  columns: string[];
  rows: DataRow[];
  downloadable: boolean;
}

export type RenderedWidget =
  | { kind: "kpi"; kpi: KpiCardData }
  | { kind: "chart"; chart: ChartConfig }
  | { kind: "table"; table: TableConfig };

export interface RenderedDashboard {
  title: string;
  conclusion?: string;
  revision: number;
  widgets: RenderedWidget[];
  narrative?: Narrative;
}

export interface DatasetPreview {
  fileName: string;
  format: Dataset["format"];
  rowCount: number;
  columns: ColumnSchema[];
  preview: DataRow[];
}

export interface SessionSnapshot {
  id: string;
  messages: Message[];
  dataset: DatasetPreview | null;
  dashboard: DashboardState | null;
  userGoal: string | null;
  awaitingClarification: boolean;
  pendingQuestion: string | null;
  latestInsight: string | null;
  assumptions: string[];
}
