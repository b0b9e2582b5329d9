"use client";

import { useState, useRef, useEffect } from "react";
import { motion } from "framer-motion";
import { RotateCcw, Send } from "lucide-react";
import { MessageList } from "@/components/ai/message-list";
import { SuggestedQuestions } from "@/components/ai/suggested-questions";
import { DashboardPanel } from "@/components/dashboard/dashboard-panel";
import { NarrativePanel } from "@/components/dashboard/narrative-panel";
import { DatasetPanel } from "@/components/dataset/dataset-panel";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Tabs, TabsContent, TabsList, TabsTrigger } from "@/components/ui/tabs";
import { useAnalystSession } from "@/hooks/useAnalystSession";

type PanelTab = "dataset" | "dashboard" | "insights";

function isPanelTab(value: string): value is PanelTab {
  return value === "dataset" || value === "dashboard" || value === "insights";
}

export default function HomePage() {
  const { session, dashboard, messages, status, error, isRestoring, upload, send, reset } =
    useAnalystSession();

  const [input, setInput] = useState("");
  const [tab, setTab] = useState<PanelTab>("dataset");
  const scrollRef = useRef<HTMLDivElement>(null);
  const isBusy = status !== "idle";
  const hasDataset = Boolean(session?.dataset);

  // Auto-scroll chat
  useEffect(() => {
    if (scrollRef.current) {
      scrollRef.current.scrollTop = scrollRef.current.scrollHeight;
    }
  }, [messages]);

  // Nuevo dashboard → pasar a su pestaña
  const revision = dashboard?.revision;
  useEffect(() => {
    if (revision !== undefined) setTab("dashboard");
  }, [revision]);

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    if (!input.trim() || isBusy) return;
    const text = input.trim();
    setInput("");
    await send(text);
  };

  const handleUpload = async (file: File) => {
    await upload(file);
    setTab("dataset");
  };

  if (isRestoring) {
    return (
      <div className="flex h-screen items-center justify-center bg-zinc-950">
        <div className="flex items-center gap-2 text-zinc-500">
          <div className="h-2 w-2 animate-pulse rounded-full bg-violet-500" />
          <span className="text-sm">Cargando...</span>
        </div>
      </div>
    );
  }

  return (
    <div className="flex h-screen flex-col md:flex-row bg-zinc-950 overflow-hidden">
      {/* CHAT PANEL */}
      <div className="flex h-1/2 w-full md:h-auto md:w-[380px] flex-col border-r border-zinc-800/50 bg-zinc-900/30">
        <div className="flex h-14 items-center justify-between border-b border-zinc-800/50 px-4">
          <div className="flex items-center gap-2">
            <div className="h-7 w-7 rounded-lg bg-gradient-to-br from-violet-600 to-pink-600" />
            <span className="text-sm font-semibold text-white">
              Dashboard<span className="text-zinc-400"> Analyst</span>
            </span>
          </div>
          <Button
            variant="ghost"
            size="sm"
            onClick={() => void reset()}
            disabled={isBusy || !session}
            aria-label="Nueva sesión"
          >
            <RotateCcw className="h-3.5 w-3.5" />
            Nueva
          </Button>
        </div>

        <div className="flex-1 overflow-y-auto" ref={scrollRef}>
          {messages.length === 0 ? (
            <div className="flex flex-col items-center justify-center h-full px-4">
              <motion.div
                initial={{ opacity: 0, y: 12 }}
                animate={{ opacity: 1, y: 0 }}
                transition={{ duration: 0.4 }}
                className="text-center"
              >
                <h2 className="mb-1 text-base font-bold text-white">Analista de datos</h2>
                <p className="mb-4 text-xs text-zinc-500">
                  {hasDataset
                    ? "Preguntá lo que quieras sobre tus datos"
                    : "Subí un CSV o Excel en la pestaña Dataset"}
                </p>
              </motion.div>
            </div>
          ) : (
            <div className="px-3 py-4">
              <MessageList messages={messages} isLoading={status === "thinking"} />
              {hasDataset && (
                <SuggestedQuestions
                  messages={messages}
                  disabled={isBusy}
                  onSelect={(question) => void send(question)}
                />
              )}
            </div>
          )}
        </div>

        <div className="border-t border-zinc-800/50 p-3">
          {error && (
            <p role="alert" className="mb-2 text-xs text-red-400">
              {error}
            </p>
          )}
          <form onSubmit={handleSubmit} className="flex items-center gap-2">
            <Input
              value={input}
              onChange={(e) => setInput(e.target.value)}
              placeholder={
                session?.awaitingClarification
                  ? "Respondé la aclaración..."
                  : "Preguntá sobre tus datos..."
              }
              aria-label="Mensaje para el analista"
              disabled={isBusy}
              className="flex-1 border-zinc-800 bg-zinc-900/50 text-sm text-white placeholder:text-zinc-600 focus-visible:ring-violet-600"
            />
            <Button
              type="submit"
              disabled={isBusy || !input.trim()}
              size="sm"
              aria-label="Enviar mensaje"
              className="bg-gradient-to-r from-violet-600 to-pink-600 text-white hover:from-violet-700 hover:to-pink-700"
            >
              <Send className="h-4 w-4" />
            </Button>
          </form>
        </div>
      </div>

      {/* RIGHT PANEL */}
      <div className="flex flex-1 flex-col min-h-0 overflow-hidden bg-zinc-950">
        <Tabs
          value={tab}
          onValueChange={(value) => {
            if (isPanelTab(value)) setTab(value);
          }}
          className="flex h-full flex-col"
        >
          <div className="flex h-14 items-center border-b border-zinc-800/50 px-6">
            <TabsList>
              <TabsTrigger value="dataset">Dataset</TabsTrigger>
              <TabsTrigger value="dashboard">Dashboard</TabsTrigger>
              <TabsTrigger value="insights">Insights</TabsTrigger>
            </TabsList>
          </div>
          <TabsContent value="dataset" className="overflow-y-auto">
            <DatasetPanel
              dataset={session?.dataset ?? null}
              onUpload={handleUpload}
              uploading={status === "uploading"}
              disabled={isBusy}
            />
          </TabsContent>
          <TabsContent value="dashboard" className="overflow-hidden">
            <DashboardPanel
              dashboard={dashboard}
              dataset={session?.dataset ?? null}
              spec={session?.dashboard?.spec}
            />
          </TabsContent>
          <TabsContent value="insights" className="overflow-y-auto px-6 py-5">
            <NarrativePanel
              narrative={dashboard?.narrative ?? null}
              latestInsight={session?.latestInsight}
              assumptions={session?.assumptions}
            />
          </TabsContent>
        </Tabs>
      </div>
    </div>
  );
}
