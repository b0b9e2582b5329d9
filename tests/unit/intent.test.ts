import { describe, it, expect } from "vitest";
import { detectIntent, wantsNewDashboard } from "@/lib/agent/intent";

describe("detectIntent", () => {
  it("sin dashboard todo pedido crea uno", () => {
    expect(detectIntent("mostrame el dashboard", false)).toBe("create");
    expect(detectIntent("mejoralo", false)).toBe("create");
  });

  it("pedir ver el dashboard actual solo lo vuelve a mostrar", () => {
    expect(detectIntent("Mostrame el dashboard", true)).toBe("render");
    expect(detectIntent("ver tablero actual", true)).toBe("render");
    expect(detectIntent("show the dashboard again", true)).toBe("render");
  });

  it("con dashboard activo los pedidos lo revisan salvo que pidan uno nuevo", () => {
    expect(detectIntent("mostrame el dashboard por region", true)).toBe("revise");
    expect(detectIntent("agregá un KPI de unidades", true)).toBe("revise");
    expect(detectIntent("armá otro dashboard de productos", true)).toBe("create");
    expect(wantsNewDashboard("empecemos desde cero")).toBe(true);
  });
});
