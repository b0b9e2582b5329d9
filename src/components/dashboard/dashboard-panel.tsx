"use client";

import { motion } from "framer-motion";
import { Sparkles } from "lucide-react";
import { ProvenanceBanner } from "./provenance-banner";
import { KpiCardGrid } from "./kpi-card-grid";
import { ChartRenderer } from "./chart-renderer";
import { DataTableExport } from "./data-table-export";
import type {
  ChartConfig,
  DashboardSpec,
  DatasetPreview,
  KpiCardData,
  RenderedDashboard,
  TableConfig,
} from "@/lib/types";

interface DashboardPanelProps {
  dashboard: RenderedDashboard | null;
  dataset: DatasetPreview | null;
  spec?: DashboardSpec;
}

interface WidgetGroups {
  kpis: KpiCardData[];
  charts: ChartConfig[];
  tables: TableConfig[];
}

function groupWidgets(dashboard: RenderedDashboard): WidgetGroups {
  const groups: WidgetGroups = { kpis: [], charts: [], tables: [] };
  for (const widget of dashboard.widgets) {
    if (widget.kind === "kpi") groups.kpis.push(widget.kpi);
    else if (widget.kind === "chart") groups.charts.push(widget.chart);
    else groups.tables.push(widget.table);
  }
  return groups;
}

export function DashboardPanel({ dashboard, dataset, spec }: DashboardPanelProps) {
  if (!dashboard) {
    return (
      <div className="flex h-full flex-col items-center justify-center px-8 py-16 text-center">
        <div className="mx-auto mb-4 flex h-14 w-14 items-center justify-center rounded-2xl bg-zinc-800/50">
          <Sparkles className="h-7 w-7 text-zinc-600" />
        </div>
        <h2 className="text-lg font-semibold text-zinc-400">Dashboard</h2>
        <p className="mt-2 max-w-sm text-sm text-zinc-600">
          {dataset
            ? "Contá qué querés analizar y el dashboard aparecerá acá con gráficos y KPIs."
            : "Subí un dataset para empezar."}
        </p>
      </div>
    );
  }

  const { kpis, charts, tables } = groupWidgets(dashboard);

  return (
    <div className="flex h-full flex-col overflow-hidden">
      <ProvenanceBanner dataset={dataset} revision={dashboard.revision} spec={spec} />

      <div className="flex-1 overflow-y-auto px-6 py-5 space-y-5">
        <motion.div
          key={dashboard.revision}
          initial={{ opacity: 0, y: 8 }}
          animate={{ opacity: 1, y: 0 }}
          transition={{ duration: 0.3 }}
        >
          <div className="flex items-center gap-2 mb-1">
            <Sparkles className="h-4 w-4 text-violet-400" />
            <h1 className="text-lg font-bold text-white">{dashboard.title}</h1>
          </div>
          {dashboard.conclusion && (
            <p className="rounded-lg bg-gradient-to-r from-violet-500/10 to-pink-500/5 px-3 py-2 text-sm font-medium text-violet-300">
              {dashboard.conclusion}
            </p>
          )}
        </motion.div>

        <KpiCardGrid kpis={kpis} />

        {charts.length > 0 && (
          <div className={charts.length === 1 ? "" : "grid grid-cols-1 gap-4 lg:grid-cols-2"}>
            {charts.map((chart, idx) => (
              <motion.div
                key={`${dashboard.revision}-${idx}`}
                initial={{ opacity: 0, y: 12 }}
                animate={{ opacity: 1, y: 0 }}
                transition={{ duration: 0.4, delay: 0.1 + idx * 0.1 }}
              >
                <ChartRenderer chart={chart} />
              </motion.div>
            ))}
          </div>
        )}

        {tables.map((table, idx) => (
          <motion.div
            key={`${dashboard.revision}-table-${idx}`}
            initial={{ opacity: 0, y: 12 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.4, delay: 0.3 }}
          >
            <DataTableExport table={table} />
          </motion.div>
        ))}
      </div>
    </div>
  );
}
