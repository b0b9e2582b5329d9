"use client";

import dynamic from "next/dynamic";
import { chartRows, formatCell, validateChartData } from "@/lib/chart-utils";
import { ChartErrorBoundary } from "@/components/dashboard/chart-error-boundary";
import type { ChartConfig } from "@/lib/types";

// Nivo solo en el cliente
const BarChart = dynamic(() => import("@/components/charts/bar-chart"), { ssr: false });
const LineChart = dynamic(() => import("@/components/charts/line-chart"), { ssr: false });
const PieChart = dynamic(() => import("@/components/charts/pie-chart"), { ssr: false });
const TreemapChart = dynamic(() => import("@/components/charts/treemap-chart"), { ssr: false });
const ScatterChart = dynamic(() => import("@/components/charts/scatter-chart"), { ssr: false });

interface ChartRendererProps {
  chart: ChartConfig;
}

function DataFallback({ chart, reason }: { chart: ChartConfig; reason: string }) {
  const rows = chartRows(chart).slice(0, 20);
  const columns = rows.length > 0 ? Object.keys(rows[0]) : [];

  return (
    <div className="rounded-lg border border-zinc-800 bg-zinc-900/50 p-4" role="alert">
      <h3 className="mb-2 text-base font-semibold text-white">{chart.title}</h3>
      <p className="mb-3 text-xs text-amber-400">Grafico no disponible: {reason}</p>
      {rows.length > 0 && (
        <div className="max-h-[300px] overflow-auto">
          <table className="w-full text-xs text-zinc-300">
            <thead>
              <tr className="border-b border-zinc-700">
                {columns.map((key) => (
                  <th key={key} className="px-2 py-1 text-left font-medium text-zinc-400">
                    {key}
                  </th>
                ))}
              </tr>
            </thead>
            <tbody>
              {rows.map((row, i) => (
                <tr key={i} className="border-b border-zinc-800/50">
                  {columns.map((key) => (
                    <td key={key} className="px-2 py-1">
                      {formatCell(row[key] ?? null)}
                    </td>
                  ))}
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}
    </div>
  );
}

function renderChart(chart: ChartConfig) {
  switch (chart.type) {
    case "bar":
      return <BarChart chart={chart} />;
    case "line":
      return <LineChart chart={chart} />;
    case "pie":
      return <PieChart chart={chart} />;
    case "treemap":
      return <TreemapChart chart={chart} />;
    case "scatter":
      return <ScatterChart chart={chart} />;
    case "error":
      return null;
  }
}

export function ChartRenderer({ chart }: ChartRendererProps) {
  const validation = validateChartData(chart);
  if (!validation.valid) {
    return <DataFallback chart={chart} reason={validation.fallbackReason ?? "Sin datos"} />;
  }

  return (
    <ChartErrorBoundary chartTitle={chart.title}>
      {renderChart(chart)}
    </ChartErrorBoundary>
  );
}
