"use client";

import { useRef, useState } from "react";
import { Upload } from "lucide-react";
import { Button } from "@/components/ui/button";

const ACCEPT = ".csv,.tsv,.txt,.xlsx,.xls";

interface DatasetUploadProps {
  onUpload: (file: File) => void | Promise<void>;
  /** Bloquea la carga, por ejemplo mientras el analista responde. */
  disabled?: boolean;
  uploading?: boolean;
  hasDataset?: boolean;
}

export function DatasetUpload({ onUpload, disabled, uploading, hasDataset }: DatasetUploadProps) {
  const inputRef = useRef<HTMLInputElement>(null);
  const [dragging, setDragging] = useState(false);

  const handleFiles = (files: FileList | null) => {
    const file = files?.[0];
    if (file) void onUpload(file);
  };

  return (
    <div
      onDragOver={(e) => {
        e.preventDefault();
        setDragging(true);
      }}
      onDragLeave={() => setDragging(false)}
      onDrop={(e) => {
        e.preventDefault();
        setDragging(false);
        if (!disabled) handleFiles(e.dataTransfer.files);
      }}
      className={`flex items-center justify-between gap-3 rounded-xl border border-dashed px-4 py-3 transition-colors ${
        dragging ? "border-violet-500 bg-violet-500/10" : "border-zinc-700 bg-zinc-900/30"
      }`}
    >
      <div>
        <p className="text-sm text-zinc-300">
          {hasDataset ? "Reemplazar dataset" : "Subí un archivo CSV o Excel"}
        </p>
        <p className="text-xs text-zinc-500">Arrastralo acá o elegilo desde tu equipo</p>
      </div>
      <input
        ref={inputRef}
        type="file"
        accept={ACCEPT}
        className="hidden"
        aria-label="Archivo de datos"
        disabled={disabled}
        onChange={(e) => {
          handleFiles(e.target.files);
          e.target.value = "";
        }}
      />
      <Button
        type="button"
        size="sm"
        variant="outline"
        disabled={disabled}
        onClick={() => inputRef.current?.click()}
      >
        <Upload className="h-3.5 w-3.5" />
        {uploading ? "Cargando..." : "Elegir archivo"}
      </Button>
    </div>
  );
}
