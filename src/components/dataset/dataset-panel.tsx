"use client";

import { KPICard } from "@/components/ui/kpi-card";
import { DataTable } from "@/components/ui/data-table";
import { DatasetUpload } from "./dataset-upload";
import type { ColumnType, DatasetPreview } from "@/lib/types";

const TYPE_LABELS: Record<ColumnType, string> = {
  number: "numérica",
  string: "texto",
  date: "fecha",
  boolean: "booleana",
};

interface DatasetPanelProps {
  dataset: DatasetPreview | null;
  onUpload: (file: File) => void | Promise<void>;
  uploading?: boolean;
  disabled?: boolean;
}

export function DatasetPanel({ dataset, onUpload, uploading, disabled }: DatasetPanelProps) {
  return (
    <div className="space-y-5 px-6 py-5">
      <DatasetUpload
        onUpload={onUpload}
        disabled={disabled || uploading}
        uploading={uploading}
        hasDataset={dataset !== null}
      />

      {dataset && (
        <>
          <div className="grid grid-cols-3 gap-3">
            <KPICard title="Filas" value={dataset.rowCount} subtitle={dataset.fileName} />
            <KPICard title="Columnas" value={dataset.columns.length} />
            <KPICard
              title="Numéricas"
              value={dataset.columns.filter((c) => c.type === "number").length}
              tone="muted"
            />
          </div>

          <div className="rounded-lg border border-zinc-800 bg-zinc-900/50">
            <div className="border-b border-zinc-800 px-4 py-3">
              <h3 className="text-sm font-medium text-zinc-300">Columnas</h3>
            </div>
            <ul className="divide-y divide-zinc-800/50">
              {dataset.columns.map((column) => (
                <li key={column.name} className="flex items-center justify-between px-4 py-2 text-sm">
                  <span className="font-mono text-zinc-300">{column.name}</span>
                  <span className="text-xs text-zinc-500">
                    {TYPE_LABELS[column.type]} &middot; {column.nonNull} no nulos &middot;{" "}
                    {column.unique} distintos
                  </span>
                </li>
              ))}
            </ul>
          </div>

          <DataTable
            title="Vista previa"
            caption={`Primeras ${dataset.preview.length} de ${dataset.rowCount.toLocaleString("es-AR")} filas`}
            columns={dataset.columns.map((c) => c.name)}
            rows={dataset.preview}
          />
        </>
      )}
    </div>
  );
}
