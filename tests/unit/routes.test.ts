import { describe, it, expect, vi } from "vitest";
import type { CompletionResult } from "@/lib/ai/client";
import { SALES_CSV, fenced, ok } from "./helpers";

const model = vi.hoisted(() => ({ results: [] as CompletionResult[] }));

vi.mock("@/lib/agent/runtime", async () => {
  const { SessionStore } = await import("@/lib/session/session-store");
  const store = new SessionStore();
  return {
    getSessionStore: () => store,
    getLlmClient: () => ({
      modelId: "fake-model",
      complete: async (): Promise<CompletionResult> =>
        model.results.shift() ?? {
          ok: false,
          error: { kind: "unreachable", message: "sin respuestas" },
          latencyMs: 0,
        },
    }),
  };
});

vi.mock("@/lib/config", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/lib/config")>();
  return {
    ...actual,
    getConfig: () => {
      const config = actual.getConfig();
      return { ...config, dataset: { ...config.dataset, maxBytes: 1024 } };
    },
  };
});

import { POST as postChat } from "@/app/api/chat/route";
import { POST as postDataset } from "@/app/api/dataset/route";
import { DELETE as deleteSession, GET as getSession } from "@/app/api/session/route";

function upload(file?: File, sessionId?: string): Promise<Response> {
  const form = new FormData();
  if (file) form.append("file", file);
  if (sessionId) form.append("sessionId", sessionId);
  return postDataset(new Request("http://localhost/api/dataset", { method: "POST", body: form }));
}

function chat(body: unknown): Promise<Response> {
  return postChat(
    new Request("http://localhost/api/chat", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    })
  );
}

async function uploadSales(): Promise<string> {
  const res = await upload(new File([SALES_CSV], "ventas.csv", { type: "text/csv" }));
  const body = await res.json();
  return body.sessionId;
}

describe("POST /api/dataset", () => {
  it("carga el archivo y crea la sesion", async () => {
    const res = await upload(new File([SALES_CSV], "ventas.csv", { type: "text/csv" }));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(typeof body.sessionId).toBe("string");
    expect(body.dataset.fileName).toBe("ventas.csv");
    expect(body.dataset.rowCount).toBe(5);
    expect(body.dataset.columns).toHaveLength(4);
    expect(body.session.messages[0].content).toBe(
      'Cargué "ventas.csv": 5 filas y 4 columnas. ¿Qué querés analizar?'
    );
  });

  it("reutiliza la sesion indicada", async () => {
    const sessionId = await uploadSales();
    const res = await upload(new File(["a,b\n1,2"], "otro.csv"), sessionId);
    const body = await res.json();

    expect(body.sessionId).toBe(sessionId);
    expect(body.session.messages).toHaveLength(2);
  });

  it("responde 400 sin archivo o con formato no soportado", async () => {
    expect((await upload()).status).toBe(400);

    const res = await upload(new File(["{}"], "datos.json"));
    expect(res.status).toBe(400);
    expect((await res.json()).code).toBe("unsupported_format");
  });

  it("responde 422 con un archivo sin filas", async () => {
    const res = await upload(new File(["a,b\n"], "vacio.csv"));
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: "El archivo no tiene filas de datos.",
      code: "empty",
    });
  });
});

describe("POST /api/dataset con archivos grandes", () => {
  it("responde 413 cuando el archivo supera el limite", async () => {
    const big = ["a,b", ...Array.from({ length: 300 }, (_, i) => `${i},${i}`)].join("\n");
    const file = new File([big], "grande.csv", { type: "text/csv" });

    const res = await upload(file);

    expect(file.size).toBeGreaterThan(1024);
    expect(res.status).toBe(413);
    expect((await res.json()).code).toBe("too_large");
  });
});

describe("POST /api/chat", () => {
  it("ejecuta un turno y devuelve el dashboard renderizado", async () => {
    const sessionId = await uploadSales();
    model.results.push(
      ok(
        fenced("dashboard", {
          title: "Unidades",
          widgets: [{ kind: "kpi", label: "Unidades", column: "unidades" }],
        })
      )
    );

    const res = await chat({ sessionId, message: "total de unidades" });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.responseKind).toBe("dashboard");
    expect(body.failure).toBeNull();
    expect(body.dashboard.revision).toBe(1);
    expect(body.dashboard.widgets[0].kpi.value).toBe(11);
  });

  it("un fallo del modelo se informa dentro de una respuesta 200", async () => {
    const sessionId = await uploadSales();
    const res = await chat({ sessionId, message: "hola" });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.failure.kind).toBe("unreachable");
    expect(body.reply.kind).toBe("error");
  });

  it("responde 400 con un cuerpo invalido y 404 con una sesion desconocida", async () => {
    expect((await chat({ sessionId: "x" })).status).toBe(400);
    expect((await chat({ sessionId: "x", message: "   " })).status).toBe(400);
    expect((await chat({ sessionId: "no-existe", message: "hola" })).status).toBe(404);
  });
});

describe("/api/session", () => {
  it("devuelve la foto de la sesion y permite descartarla", async () => {
    const sessionId = await uploadSales();
    const url = `http://localhost/api/session?id=${sessionId}`;

    const res = await getSession(new Request(url));
    const body = await res.json();
    expect(res.status).toBe(200);
    expect(body.session.id).toBe(sessionId);
    expect(body.dashboard).toBeNull();

    expect((await deleteSession(new Request(url, { method: "DELETE" }))).status).toBe(200);
    expect((await getSession(new Request(url))).status).toBe(404);
    expect((await deleteSession(new Request(url, { method: "DELETE" }))).status).toBe(404);
  });

  it("exige el parametro id", async () => {
    expect((await getSession(new Request("http://localhost/api/session"))).status).toBe(400);
  });
});
