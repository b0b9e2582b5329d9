export type TurnIntent = "render" | "revise" | "create";

// "mostrame el dashboard", "show the dashboard again"
const RENDER_REQUEST =
  /^(?:mostra(?:me)?|ver|volver a ver|show(?: me)?|display)\s+(?:el\s+|the\s+)?(?:dashboard|tablero)(?:\s+(?:actual|de nuevo|again))?\s*[.!?]*$/i;

const NEW_DASHBOARD =
  /\b(?:nuevo|otro|de cero|desde cero|new|another|from scratch|start over)\b/i;

export function wantsNewDashboard(text: string): boolean {
  return NEW_DASHBOARD.test(text);
}

/**
 * Decide que hace el turno antes de llamar al modelo. Sin dashboard activo
 * todo pedido es "create".
 */
export function detectIntent(text: string, hasDashboard: boolean): TurnIntent {
  if (!hasDashboard) return "create";
  if (RENDER_REQUEST.test(text.trim())) return "render";
  return wantsNewDashboard(text) ? "create" : "revise";
}
