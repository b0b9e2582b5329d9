"use client";

import { motion } from "framer-motion";
import type { Message } from "@/lib/types";

export const SUGGESTED_QUESTIONS = [
  "¿Qué columnas tiene el dataset y qué puedo analizar?",
  "Mostrame un resumen general con los KPIs principales",
  "¿Cómo se distribuyen los registros por categoría?",
];

interface SuggestedQuestionsProps {
  messages: readonly Message[];
  disabled?: boolean;
  onSelect: (question: string) => void;
}

// Solo hasta la primera pregunta del usuario
export function SuggestedQuestions({ messages, disabled, onSelect }: SuggestedQuestionsProps) {
  if (messages.some((m) => m.role === "user")) return null;

  return (
    <div className="mt-2 space-y-1.5">
      {SUGGESTED_QUESTIONS.map((question, i) => (
        <motion.button
          key={question}
          type="button"
          initial={{ opacity: 0, x: -8 }}
          animate={{ opacity: 1, x: 0 }}
          transition={{ duration: 0.2, delay: 0.1 + i * 0.04 }}
          disabled={disabled}
          onClick={() => onSelect(question)}
          className="w-full rounded-lg border border-zinc-800 bg-zinc-900/50 px-3 py-2 text-left text-xs text-zinc-400 transition-colors hover:border-violet-600/50 hover:text-zinc-200 disabled:pointer-events-none disabled:opacity-50"
        >
          {question}
        </motion.button>
      ))}
    </div>
  );
}
