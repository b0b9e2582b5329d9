"use client";

import Papa from "papaparse";
import { Download } from "lucide-react";
import { DataTable } from "@/components/ui/data-table";
import type { TableConfig } from "@/lib/types";

export function tableToCSV(table: TableConfig): string {
  return Papa.unparse({
    fields: table.columns,
    data: table.rows.map((row) => table.columns.map((col) => row[col] ?? "")),
  });
}

function handleDownloadCSV(table: TableConfig) {
  const blob = new Blob(["\ufeff" + tableToCSV(table)], {
    type: "text/csv;charset=utf-8;",
  });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = `${table.title.replace(/\s+/g, "_")}_${new Date().toISOString().slice(0, 10)}.csv`;
  document.body.appendChild(link);
  link.click();
  document.body.removeChild(link);
  URL.revokeObjectURL(url);
}

interface DataTableExportProps {
  table: TableConfig;
}

export function DataTableExport({ table }: DataTableExportProps) {
  const canDownload = table.downloadable && table.rows.length > 0;

  return (
    <div className="space-y-2">
      {canDownload && (
        <div className="flex justify-end">
          <button
            onClick={() => handleDownloadCSV(table)}
            className="flex items-center gap-1.5 rounded-lg border border-zinc-700 px-3 py-1.5 text-xs text-zinc-300 transition-colors hover:bg-zinc-800"
          >
            <Download className="h-3 w-3" />
            CSV
          </button>
        </div>
      )}
      <DataTable title={table.title} columns={table.columns} rows={table.rows} />
    </div>
  );
}
