"use client";

import { memo } from "react";
import { ResponsivePie } from "@nivo/pie";
import type { PieChartData } from "@/lib/types";
import { ChartFrame } from "./chart-frame";
import { CHART_COLORS, chartTheme } from "./theme";

interface PieChartProps {
  chart: PieChartData;
}

function PieChartInner({ chart }: PieChartProps) {
  return (
    <ChartFrame title={chart.title}>
      <ResponsivePie
        data={chart.data}
        margin={{ top: 30, right: 120, bottom: 30, left: 20 }}
        innerRadius={0.5}
        padAngle={0.7}
        cornerRadius={3}
        activeOuterRadiusOffset={8}
        colors={CHART_COLORS}
        borderWidth={1}
        borderColor={{ from: "color", modifiers: [["darker", 0.2]] }}
        arcLinkLabelsSkipAngle={10}
        arcLinkLabelsTextColor="#a1a1aa"
        arcLinkLabelsThickness={2}
        arcLinkLabelsColor={{ from: "color" }}
        arcLabelsSkipAngle={10}
        arcLabelsTextColor={{ from: "color", modifiers: [["darker", 2]] }}
        legends={[
          {
            anchor: "right",
            direction: "column",
            justify: false,
            translateX: 100,
            translateY: 0,
            itemsSpacing: 4,
            itemWidth: 80,
            itemHeight: 18,
            itemTextColor: "#a1a1aa",
            itemDirection: "left-to-right",
            symbolSize: 12,
            symbolShape: "circle",
          },
        ]}
        theme={chartTheme}
      />
    </ChartFrame>
  );
}

export const PieChart = memo(PieChartInner);
export default PieChart;
