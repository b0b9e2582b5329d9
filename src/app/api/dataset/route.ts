import { getSessionStore } from "@/lib/agent/runtime";
import { errorResponse } from "@/lib/api/errors";
import { getConfig } from "@/lib/config";
import { checkSize, detectFormat, loadDataset, previewDataset } from "@/lib/data/dataset-loader";
import { createLogger } from "@/lib/logger";

export const runtime = "nodejs";

const log = createLogger("dataset");

export async function POST(req: Request) {
  let form: FormData;
  try {
    form = await req.formData();
  } catch {
    return Response.json({ error: "Se esperaba multipart/form-data" }, { status: 400 });
  }

  const file = form.get("file");
  if (!(file instanceof File)) {
    return Response.json({ error: "Falta el archivo (campo \"file\")" }, { status: 400 });
  }
  const sessionId = form.get("sessionId");

  try {
    const t0 = performance.now();
    const limits = getConfig().dataset;
    detectFormat(file.name);
    checkSize(file.size, limits);
    const dataset = loadDataset(
      { fileName: file.name, data: new Uint8Array(await file.arrayBuffer()) },
      limits
    );

    const store = getSessionStore();
    const existing = typeof sessionId === "string" && sessionId ? store.get(sessionId) : undefined;
    const session = existing ?? store.create();
    session.setDataset(dataset);
    session.appendMessage(
      "assistant",
      `Cargué "${dataset.fileName}": ${dataset.rows.length} filas y ${dataset.columns.length} columnas. ¿Qué querés analizar?`,
      "info"
    );

    log.info("Dataset cargado", {
      session: session.id,
      file: dataset.fileName,
      format: dataset.format,
      rows: dataset.rows.length,
      columns: dataset.columns.length,
      t_total_ms: Math.round(performance.now() - t0),
    });

    return Response.json({
      sessionId: session.id,
      dataset: previewDataset(dataset),
      session: session.snapshot(),
    });
  } catch (error) {
    return errorResponse(error, log);
  }
}
