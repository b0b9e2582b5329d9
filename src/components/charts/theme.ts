export const CHART_COLORS = { scheme: "purple_orange" } as const;

export const chartTheme = {
  text: { fill: "#a1a1aa", fontSize: 11 },
  axis: {
    ticks: { text: { fill: "#a1a1aa", fontSize: 10 } },
    legend: { text: { fill: "#d4d4d8", fontSize: 11 } },
  },
  grid: { line: { stroke: "#27272a" } },
  crosshair: { line: { stroke: "#a1a1aa", strokeWidth: 1 } },
  tooltip: {
    container: {
      background: "#18181b",
      color: "#fafafa",
      fontSize: 12,
      borderRadius: 8,
      boxShadow: "0 4px 12px rgba(0,0,0,0.5)",
    },
  },
};
