"use client";

import { memo } from "react";
import { ResponsiveLine } from "@nivo/line";
import { formatCompact } from "@/lib/chart-utils";
import type { LineChartData } from "@/lib/types";
import { ChartFrame } from "./chart-frame";
import { CHART_COLORS, chartTheme } from "./theme";

interface LineChartProps {
  chart: LineChartData;
}

function LineChartInner({ chart }: LineChartProps) {
  return (
    <ChartFrame title={chart.title}>
      <ResponsiveLine
        data={chart.data}
        margin={{ top: 20, right: 30, bottom: 70, left: 70 }}
        xScale={{ type: "point" }}
        yScale={{ type: "linear", min: "auto", max: "auto", stacked: false }}
        curve="monotoneX"
        animate={false}
        axisBottom={{ tickSize: 0, tickPadding: 8, tickRotation: -45 }}
        axisLeft={{ tickSize: 0, tickPadding: 8, format: (v) => formatCompact(Number(v)) }}
        enableGridX={false}
        colors={CHART_COLORS}
        lineWidth={2}
        pointSize={6}
        pointColor={{ theme: "background" }}
        pointBorderWidth={2}
        pointBorderColor={{ from: "color" }}
        enableArea
        areaOpacity={0.1}
        useMesh
        theme={chartTheme}
      />
    </ChartFrame>
  );
}

export const LineChart = memo(LineChartInner);
export default LineChart;
