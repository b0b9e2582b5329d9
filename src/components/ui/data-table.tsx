"use client";

import { ScrollArea } from "@/components/ui/scroll-area";
import { formatCell } from "@/lib/chart-utils";
import type { CellValue } from "@/lib/types";

interface DataTableProps {
  columns: string[];
  rows: Record<string, CellValue>[];
  title?: string;
  caption?: string;
}

export function DataTable({ columns, rows, title, caption }: DataTableProps) {
  if (rows.length === 0 || columns.length === 0) {
    return (
      <div className="rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
        <p className="text-sm text-zinc-400">Sin resultados</p>
      </div>
    );
  }

  return (
    <div className="w-full rounded-lg border border-zinc-800 bg-zinc-900/50">
      {title && (
        <div className="border-b border-zinc-800 px-4 py-3">
          <h3 className="text-sm font-medium text-zinc-300">{title}</h3>
          <p className="text-xs text-zinc-500">{caption ?? `${rows.length} registros`}</p>
        </div>
      )}
      <ScrollArea className="max-h-[400px]">
        <table className="w-full text-sm">
          <thead className="sticky top-0 bg-zinc-900">
            <tr>
              {columns.map((col) => (
                <th
                  key={col}
                  className="whitespace-nowrap px-3 py-2 text-left text-xs font-medium uppercase tracking-wider text-zinc-400"
                >
                  {col.replace(/_/g, " ")}
                </th>
              ))}
            </tr>
          </thead>
          <tbody className="divide-y divide-zinc-800/50">
            {rows.map((row, i) => (
              <tr key={i} className="hover:bg-zinc-800/30 transition-colors">
                {columns.map((col) => {
                  const value = row[col] ?? null;
                  return (
                    <td
                      key={col}
                      className={`whitespace-nowrap px-3 py-2 ${
                        typeof value === "number"
                          ? "text-right font-mono text-emerald-400"
                          : "text-zinc-300"
                      }`}
                    >
                      {formatCell(value)}
                    </td>
                  );
                })}
              </tr>
            ))}
          </tbody>
        </table>
      </ScrollArea>
    </div>
  );
}
