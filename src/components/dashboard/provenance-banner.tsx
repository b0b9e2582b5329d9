"use client";

import { useState } from "react";
import type { DashboardSpec, DatasetPreview } from "@/lib/types";

interface ProvenanceBannerProps {
  dataset: DatasetPreview | null;
  revision: number;
  spec?: DashboardSpec;
}

export function ProvenanceBanner({ dataset, revision, spec }: ProvenanceBannerProps) {
  const [showSpec, setShowSpec] = useState(false);

  return (
    <div className="py-2 px-4">
      <div className="flex items-center gap-1 text-[11px] text-zinc-500">
        {dataset && (
          <span>
            Fuente: {dataset.fileName} &middot; {dataset.rowCount.toLocaleString("es-AR")} filas
          </span>
        )}
        <span>&middot; revisión {revision}</span>
        {spec && (
          <button
            onClick={() => setShowSpec((prev) => !prev)}
            className="ml-1 rounded px-1.5 py-0.5 text-[11px] text-violet-400 transition-colors hover:bg-zinc-800 hover:text-violet-300"
          >
            {showSpec ? "Ocultar spec" : "Ver spec"}
          </button>
        )}
      </div>
      {showSpec && spec && (
        <pre className="mt-2 max-h-60 overflow-y-auto rounded-lg bg-zinc-900/80 p-3 font-mono text-xs text-zinc-400 whitespace-pre-wrap">
          {JSON.stringify(spec, null, 2)}
        </pre>
      )}
    </div>
  );
}
