"use client";

import { memo } from "react";
import { ResponsiveBar } from "@nivo/bar";
import { formatCompact } from "@/lib/chart-utils";
import type { BarChartData } from "@/lib/types";
import { ChartFrame } from "./chart-frame";
import { CHART_COLORS, chartTheme } from "./theme";

interface BarChartProps {
  chart: BarChartData;
}

function BarChartInner({ chart }: BarChartProps) {
  const { layout } = chart;

  return (
    <ChartFrame title={chart.title}>
      <ResponsiveBar
        data={chart.data}
        keys={chart.keys}
        indexBy={chart.indexBy}
        layout={layout}
        margin={
          layout === "horizontal"
            ? { top: 10, right: 20, bottom: 40, left: 160 }
            : { top: 10, right: 20, bottom: 80, left: 60 }
        }
        padding={0.3}
        valueScale={{ type: "linear" }}
        indexScale={{ type: "band", round: true }}
        colors={CHART_COLORS}
        borderRadius={3}
        borderColor={{ from: "color", modifiers: [["darker", 1.6]] }}
        animate={false}
        axisBottom={
          layout === "vertical"
            ? { tickSize: 0, tickPadding: 8, tickRotation: -45 }
            : { tickSize: 0, tickPadding: 8, format: (v) => formatCompact(Number(v)) }
        }
        axisLeft={{
          tickSize: 0,
          tickPadding: 8,
          ...(layout === "horizontal" ? {} : { format: (v) => formatCompact(Number(v)) }),
        }}
        enableGridY={layout === "vertical"}
        enableGridX={layout === "horizontal"}
        enableLabel={false}
        theme={chartTheme}
      />
    </ChartFrame>
  );
}

export const BarChart = memo(BarChartInner);
export default BarChart;
