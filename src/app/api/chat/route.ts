import { z } from "zod/v3";
import { runTurn } from "@/lib/agent/run-turn";
import { getLlmClient, getSessionStore } from "@/lib/agent/runtime";
import { errorResponse, formatIssues } from "@/lib/api/errors";
import { getConfig } from "@/lib/config";
import { createLogger } from "@/lib/logger";

export const runtime = "nodejs";
export const maxDuration = 60;

const log = createLogger("chat");

const chatRequestSchema = z.object({
  sessionId: z.string().min(1),
  message: z.string().trim().min(1, "El mensaje esta vacio").max(4000),
});

export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return Response.json({ error: "El cuerpo no es JSON valido" }, { status: 400 });
  }

  const parsed = chatRequestSchema.safeParse(body);
  if (!parsed.success) {
    return Response.json(
      { error: "Pedido invalido", issues: formatIssues(parsed.error) },
      { status: 400 }
    );
  }

  try {
    const session = getSessionStore().require(parsed.data.sessionId);
    const outcome = await runTurn(session, parsed.data.message, {
      client: getLlmClient(),
      prompt: getConfig().prompt,
      logger: log,
    });

    return Response.json({
      reply: outcome.reply,
      responseKind: outcome.response?.kind ?? null,
      intent: outcome.intent,
      dashboard: outcome.dashboard,
      failure: outcome.error ?? null,
      session: session.snapshot(),
    });
  } catch (error) {
    return errorResponse(error, log);
  }
}
