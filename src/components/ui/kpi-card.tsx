"use client";

import { Card, CardContent } from "@/components/ui/card";

interface KPICardProps {
  title: string;
  value: string | number;
  subtitle?: string;
  tone?: "default" | "muted" | "warning";
}

export function KPICard({ title, value, subtitle, tone = "default" }: KPICardProps) {
  const toneColor =
    tone === "warning"
      ? "text-amber-400"
      : tone === "muted"
        ? "text-zinc-400"
        : "text-white";

  return (
    <Card className="border-zinc-800 bg-zinc-900/50">
      <CardContent className="p-4">
        <p className="text-xs font-medium uppercase tracking-wider text-zinc-500">
          {title}
        </p>
        <p className={`mt-1 text-2xl font-bold ${toneColor}`}>
          {typeof value === "number"
            ? value.toLocaleString("es-AR")
            : value}
        </p>
        {subtitle && (
          <p className="mt-1 text-xs text-zinc-500">{subtitle}</p>
        )}
      </CardContent>
    </Card>
  );
}
