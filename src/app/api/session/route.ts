import { getSessionStore } from "@/lib/agent/runtime";
import { errorResponse } from "@/lib/api/errors";
import { renderDashboard } from "@/lib/dashboard/render";
import { createLogger } from "@/lib/logger";

export const runtime = "nodejs";

const log = createLogger("session");

function sessionId(req: Request): string | null {
  return new URL(req.url).searchParams.get("id");
}

export async function GET(req: Request) {
  const id = sessionId(req);
  if (!id) return Response.json({ error: "Falta el parametro id" }, { status: 400 });

  try {
    const session = getSessionStore().require(id);
    const { dashboard, dataset } = session;
    return Response.json({
      session: session.snapshot(),
      dashboard: dashboard && dataset ? renderDashboard(dashboard, dataset) : null,
    });
  } catch (error) {
    return errorResponse(error, log);
  }
}

export async function DELETE(req: Request) {
  const id = sessionId(req);
  if (!id) return Response.json({ error: "Falta el parametro id" }, { status: 400 });

  if (!getSessionStore().delete(id)) {
    return Response.json({ error: `Sesion no encontrada: ${id}` }, { status: 404 });
  }
  log.info("Sesion descartada", { session: id });
  return Response.json({ deleted: true });
}
