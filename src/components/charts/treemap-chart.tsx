"use client";

import { memo } from "react";
import { ResponsiveTreeMap } from "@nivo/treemap";
import { formatCompact } from "@/lib/chart-utils";
import type { TreemapChartData } from "@/lib/types";
import { ChartFrame } from "./chart-frame";
import { CHART_COLORS, chartTheme } from "./theme";

interface TreemapChartProps {
  chart: TreemapChartData;
}

function TreemapChartInner({ chart }: TreemapChartProps) {
  return (
    <ChartFrame title={chart.title}>
      <ResponsiveTreeMap
        data={chart.data}
        identity="name"
        value="value"
        margin={{ top: 10, right: 10, bottom: 10, left: 10 }}
        labelSkipSize={32}
        label={(node) => `${node.id} (${formatCompact(node.value)})`}
        labelTextColor={{ from: "color", modifiers: [["darker", 2.5]] }}
        parentLabelPosition="left"
        parentLabelTextColor={{ from: "color", modifiers: [["darker", 3]] }}
        colors={CHART_COLORS}
        borderColor={{ from: "color", modifiers: [["darker", 0.3]] }}
        borderWidth={1}
        nodeOpacity={1}
        animate={false}
        theme={chartTheme}
      />
    </ChartFrame>
  );
}

export const TreemapChart = memo(TreemapChartInner);
export default TreemapChart;
