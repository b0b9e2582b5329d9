import { describe, it, expect } from "vitest";
import {
  chartRows,
  formatCell,
  formatCompact,
  formatKpiValue,
  validateChartData,
} from "@/lib/chart-utils";

describe("formato de valores", () => {
  it("KPIs segun su formato", () => {
    expect(formatKpiValue(null, "number")).toBe("-");
    expect(formatKpiValue(12.5, "percent")).toBe("12,5%");
    expect(formatKpiValue(25000, "currency")).toBe("$25.000");
    expect(formatKpiValue(2_500_000, "currency")).toBe("$2,5 M");
    expect(formatKpiValue(12345.67, "number")).toBe("12.345,7");
  });

  it("numeros compactos", () => {
    expect(formatCompact(950)).toBe("950");
    expect(formatCompact(1200)).toBe("1,2 K");
    expect(formatCompact(3_000_000_000)).toBe("3 B");
  });

  it("celdas de tabla", () => {
    expect(formatCell(null)).toBe("-");
    expect(formatCell(true)).toBe("si");
    expect(formatCell("Norte")).toBe("Norte");
  });
});

describe("validateChartData", () => {
  it("un error de render usa su motivo", () => {
    expect(validateChartData({ type: "error", title: "T", reason: "Falta la columna Y" })).toEqual({
      valid: false,
      fallbackReason: "Falta la columna Y",
    });
  });

  it("series vacias no se dibujan", () => {
    expect(validateChartData({ type: "line", title: "T", data: [{ id: "s", data: [] }] }).valid).toBe(
      false
    );
    expect(validateChartData({ type: "pie", title: "T", data: [{ id: "a", label: "a", value: 1 }] })).toEqual({
      valid: true,
    });
  });

  it("filas de respaldo para la tabla", () => {
    expect(
      chartRows({ type: "pie", title: "T", data: [{ id: "a", label: "a", value: 3 }] })
    ).toEqual([{ categoria: "a", valor: 3 }]);
  });
});
