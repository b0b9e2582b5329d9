"use client";

import { motion } from "framer-motion";
import type { Message, MessageKind } from "@/lib/types";

interface MessageListProps {
  messages: Message[];
  isLoading?: boolean;
}

const KIND_LABELS: Partial<Record<MessageKind, string>> = {
  clarification: "Necesito una aclaración",
  dashboard: "Dashboard actualizado",
  error: "Error",
};

function kindClass(kind: MessageKind | undefined): string {
  switch (kind) {
    case "error":
      return "border-l-2 border-red-500/60 pl-2 text-red-300";
    case "clarification":
      return "border-l-2 border-amber-500/60 pl-2 text-zinc-300";
    case "info":
      return "text-zinc-500";
    default:
      return "text-zinc-300";
  }
}

export function MessageList({ messages, isLoading }: MessageListProps) {
  if (messages.length === 0) return null;

  return (
    <div className="space-y-3 pb-4">
      {messages.map((message, idx) => {
        const isUser = message.role === "user";
        const label = isUser || !message.kind ? undefined : KIND_LABELS[message.kind];
        return (
          <motion.div
            key={message.id}
            initial={{ opacity: 0, y: 8 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.2, delay: Math.min(idx, 10) * 0.03 }}
            className={`flex ${isUser ? "justify-end" : "justify-start"}`}
            data-role={message.role}
            data-kind={message.kind}
          >
            <div
              className={`max-w-[90%] ${
                isUser
                  ? "rounded-2xl rounded-br-sm bg-violet-600/20 px-3 py-2 text-violet-100"
                  : "space-y-1"
              }`}
            >
              {label && (
                <p className="text-[10px] font-medium uppercase tracking-wider text-zinc-500">
                  {label}
                </p>
              )}
              <div
                className={`text-sm leading-relaxed ${isUser ? "" : kindClass(message.kind)}`}
              >
                {message.content.split("\n").map((line, i) => (
                  <p key={i} className="mb-1 last:mb-0">
                    {line}
                  </p>
                ))}
              </div>
            </div>
          </motion.div>
        );
      })}

      {isLoading && (
        <div className="flex justify-start" aria-label="Pensando">
          <div className="flex items-center gap-1.5 px-2 py-1">
            <div className="h-1.5 w-1.5 animate-bounce rounded-full bg-violet-500 [animation-delay:0ms]" />
            <div className="h-1.5 w-1.5 animate-bounce rounded-full bg-violet-500 [animation-delay:150ms]" />
            <div className="h-1.5 w-1.5 animate-bounce rounded-full bg-violet-500 [animation-delay:300ms]" />
          </div>
        </div>
      )}
    </div>
  );
}
