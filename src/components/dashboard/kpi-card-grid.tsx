"use client";

import { motion } from "framer-motion";
import { AlertTriangle } from "lucide-react";
import { formatKpiValue } from "@/lib/chart-utils";
import type { KpiCardData } from "@/lib/types";

interface KpiCardGridProps {
  kpis: KpiCardData[];
}

export function KpiCardGrid({ kpis }: KpiCardGridProps) {
  if (kpis.length === 0) return null;

  const cols =
    kpis.length <= 2 ? "grid-cols-2" : kpis.length === 3 ? "grid-cols-3" : "grid-cols-2 md:grid-cols-4";

  return (
    <div className={`grid ${cols} gap-3`}>
      {kpis.map((kpi, idx) => {
        const unavailable = kpi.value === null;
        return (
          <motion.div
            key={`${kpi.label}-${idx}`}
            initial={{ opacity: 0, y: 10 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.3, delay: idx * 0.05 }}
            className="relative overflow-hidden rounded-xl border border-zinc-800 bg-zinc-900/50 p-4 backdrop-blur-sm transition-colors hover:border-zinc-700"
          >
            <p className="text-xs font-medium uppercase tracking-wider text-zinc-500">
              {kpi.label}
            </p>
            <p className={`mt-1 text-2xl font-bold ${unavailable ? "text-zinc-500" : "text-white"}`}>
              {formatKpiValue(kpi.value, kpi.format)}
            </p>
            {kpi.detail && (
              <div
                className={`mt-1 flex items-center gap-1 text-xs ${
                  unavailable ? "text-amber-400" : "text-zinc-500"
                }`}
              >
                {unavailable && <AlertTriangle className="h-3 w-3" />}
                <span>{kpi.detail}</span>
              </div>
            )}
          </motion.div>
        );
      })}
    </div>
  );
}
