import type {
  CompletionFailureKind,
} from "@/lib/ai/client";
import type {
  AgentResponse,
  DatasetPreview,
  Message,
  RenderedDashboard,
  SessionSnapshot,
} from "@/lib/types";

export interface UploadResponse {
  sessionId: string;
  dataset: DatasetPreview;
  session: SessionSnapshot;
}

export interface ChatResponse {
  reply: Message;
  responseKind: AgentResponse["kind"] | null;
  dashboard: RenderedDashboard | null;
  failure: { kind: CompletionFailureKind; message: string } | null;
  session: SessionSnapshot;
}

export interface SessionResponse {
  session: SessionSnapshot;
  dashboard: RenderedDashboard | null;
}

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function errorMessage(body: unknown, status: number): string {
  if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
    return body.error;
  }
  return `Error ${status}`;
}

async function request<T>(input: string, init?: RequestInit): Promise<T> {
  const res = await fetch(input, init);
  const body = await res.json().catch(() => null);
  if (!res.ok) throw new ApiError(res.status, errorMessage(body, res.status));
  return body;
}

export function uploadDataset(file: File, sessionId?: string | null): Promise<UploadResponse> {
  const form = new FormData();
  form.append("file", file);
  if (sessionId) form.append("sessionId", sessionId);
  return request<UploadResponse>("/api/dataset", { method: "POST", body: form });
}

export function sendChatMessage(sessionId: string, message: string): Promise<ChatResponse> {
  return request<ChatResponse>("/api/chat", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ sessionId, message }),
  });
}

export function fetchSession(sessionId: string): Promise<SessionResponse> {
  return request<SessionResponse>(`/api/session?id=${encodeURIComponent(sessionId)}`);
}

export function deleteSession(sessionId: string): Promise<{ deleted: boolean }> {
  return request<{ deleted: boolean }>(`/api/session?id=${encodeURIComponent(sessionId)}`, {
    method: "DELETE",
  });
}
