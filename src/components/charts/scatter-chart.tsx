"use client";

import { memo } from "react";
import { ResponsiveScatterPlot } from "@nivo/scatterplot";
import { formatCompact } from "@/lib/chart-utils";
import type { ScatterChartData } from "@/lib/types";
import { ChartFrame } from "./chart-frame";
import { CHART_COLORS, chartTheme } from "./theme";

interface ScatterChartProps {
  chart: ScatterChartData;
}

function ScatterChartInner({ chart }: ScatterChartProps) {
  return (
    <ChartFrame title={chart.title}>
      <ResponsiveScatterPlot
        data={chart.data}
        margin={{ top: 20, right: 30, bottom: 60, left: 80 }}
        xScale={{ type: "linear", min: "auto", max: "auto" }}
        yScale={{ type: "linear", min: "auto", max: "auto" }}
        nodeSize={7}
        colors={CHART_COLORS}
        animate={false}
        axisBottom={{
          tickSize: 0,
          tickPadding: 8,
          legend: chart.xLabel,
          legendPosition: "middle",
          legendOffset: 42,
          format: (v) => formatCompact(Number(v)),
        }}
        axisLeft={{
          tickSize: 0,
          tickPadding: 8,
          legend: chart.yLabel,
          legendPosition: "middle",
          legendOffset: -64,
          format: (v) => formatCompact(Number(v)),
        }}
        useMesh
        theme={chartTheme}
      />
    </ChartFrame>
  );
}

export const ScatterChart = memo(ScatterChartInner);
export default ScatterChart;
