import { ZodError } from "zod/v3";
import { TurnInputError } from "@/lib/agent/run-turn";
import { DatasetLoadError, type DatasetErrorCode } from "@/lib/data/dataset-loader";
import type { Logger } from "@/lib/logger";
import { SessionNotFoundError } from "@/lib/session/session-store";

const DATASET_STATUS: Record<DatasetErrorCode, number> = {
  unsupported_format: 400,
  empty: 422,
  malformed: 422,
  too_large: 413,
};

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`);
}

/** Traduce un error de dominio a una respuesta JSON `{ error }`. */
export function errorResponse(error: unknown, log: Logger): Response {
  if (error instanceof DatasetLoadError) {
    log.warn("Dataset rechazado", { code: error.code, error: error.message });
    return Response.json(
      { error: error.message, code: error.code },
      { status: DATASET_STATUS[error.code] }
    );
  }
  if (error instanceof SessionNotFoundError) {
    return Response.json({ error: error.message }, { status: 404 });
  }
  if (error instanceof TurnInputError) {
    return Response.json({ error: error.message }, { status: 400 });
  }
  if (error instanceof ZodError) {
    return Response.json(
      { error: "Pedido invalido", issues: formatIssues(error) },
      { status: 400 }
    );
  }

  log.error("Error inesperado", {
    error: error instanceof Error ? error.message : String(error),
  });
  return Response.json({ error: "Error interno del servidor" }, { status: 500 });
}
