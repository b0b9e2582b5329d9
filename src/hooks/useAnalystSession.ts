"use client";

import { useState, useEffect, useCallback, useMemo } from "react";
import {
  deleteSession,
  fetchSession,
  sendChatMessage,
  uploadDataset,
} from "@/lib/api/client";
import type { Message, RenderedDashboard, SessionSnapshot } from "@/lib/types";

const STORAGE_KEY = "dashboard_analyst_session_id";

export type SessionStatus = "idle" | "uploading" | "thinking";

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : "Error inesperado";
}

export function useAnalystSession() {
  const [session, setSession] = useState<SessionSnapshot | null>(null);
  const [dashboard, setDashboard] = useState<RenderedDashboard | null>(null);
  const [pendingText, setPendingText] = useState<string | null>(null);
  const [status, setStatus] = useState<SessionStatus>("idle");
  const [error, setError] = useState<string | null>(null);
  const [isRestoring, setIsRestoring] = useState(true);

  useEffect(() => {
    const savedId = localStorage.getItem(STORAGE_KEY);
    if (!savedId) {
      setIsRestoring(false);
      return;
    }

    let cancelled = false;
    void fetchSession(savedId)
      .then(
        (res) => {
          if (cancelled) return;
          setSession(res.session);
          setDashboard(res.dashboard);
        },
        (err: unknown) => {
          // El server se reinicio: la sesion ya no existe
          console.warn(`[session] No se pudo restaurar ${savedId}: ${errorText(err)}`);
          localStorage.removeItem(STORAGE_KEY);
        }
      )
      .finally(() => {
        if (!cancelled) setIsRestoring(false);
      });

    return () => {
      cancelled = true;
    };
  }, []);

  const upload = useCallback(
    async (file: File) => {
      setStatus("uploading");
      setError(null);
      try {
        const res = await uploadDataset(file, session?.id);
        localStorage.setItem(STORAGE_KEY, res.sessionId);
        setSession(res.session);
        setDashboard(null);
      } catch (err) {
        setError(errorText(err));
      } finally {
        setStatus("idle");
      }
    },
    [session?.id]
  );

  const send = useCallback(
    async (text: string) => {
      const message = text.trim();
      if (!message) return;
      if (!session) {
        setError("Subí un dataset (CSV o Excel) para empezar.");
        return;
      }

      setStatus("thinking");
      setError(null);
      setPendingText(message);
      try {
        const res = await sendChatMessage(session.id, message);
        setSession(res.session);
        setDashboard(res.dashboard);
      } catch (err) {
        setError(errorText(err));
      } finally {
        setPendingText(null);
        setStatus("idle");
      }
    },
    [session]
  );

  const reset = useCallback(async () => {
    const id = session?.id;
    localStorage.removeItem(STORAGE_KEY);
    setSession(null);
    setDashboard(null);
    setError(null);
    if (!id) return;
    try {
      await deleteSession(id);
    } catch (err) {
      console.warn(`[session] No se pudo descartar ${id}: ${errorText(err)}`);
    }
  }, [session?.id]);

  // Mensaje del usuario visible mientras el server responde
  const messages = useMemo<Message[]>(() => {
    const history = session?.messages ?? [];
    if (!pendingText) return history;
    return [
      ...history,
      { id: "pending", role: "user", content: pendingText, createdAt: Date.now() },
    ];
  }, [session?.messages, pendingText]);

  return {
    session,
    dashboard,
    messages,
    status,
    error,
    isRestoring,
    upload,
    send,
    reset,
  };
}
