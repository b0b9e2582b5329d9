"use client";

import React from "react";
import { AlertTriangle, RotateCcw } from "lucide-react";

interface ChartErrorBoundaryProps {
  children: React.ReactNode;
  chartTitle: string;
}

interface ChartErrorBoundaryState {
  error: Error | null;
}

/** Un grafico que falla al dibujarse no tira abajo el resto del dashboard. */
export class ChartErrorBoundary extends React.Component<
  ChartErrorBoundaryProps,
  ChartErrorBoundaryState
> {
  constructor(props: ChartErrorBoundaryProps) {
    super(props);
    this.state = { error: null };
  }

  static getDerivedStateFromError(error: Error): ChartErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error) {
    console.warn(`[chart] Fallo al renderizar "${this.props.chartTitle}": ${error.message}`);
  }

  handleRetry = () => {
    this.setState({ error: null });
  };

  render() {
    if (this.state.error) {
      return (
        <div className="rounded-lg border border-red-500/30 bg-zinc-900 p-6" role="alert">
          <div className="flex flex-col items-center gap-3 text-center">
            <AlertTriangle className="h-8 w-8 text-red-400/70" />
            <p className="text-sm text-zinc-400">
              Error al renderizar:{" "}
              <span className="font-medium text-zinc-300">{this.props.chartTitle}</span>
            </p>
            <p className="text-xs text-zinc-600">{this.state.error.message}</p>
            <button
              onClick={this.handleRetry}
              className="mt-1 inline-flex items-center gap-1.5 rounded-md bg-zinc-800 px-3 py-1.5 text-xs font-medium text-zinc-300 transition-colors hover:bg-zinc-700 hover:text-white"
            >
              <RotateCcw className="h-3 w-3" />
              Reintentar
            </button>
          </div>
        </div>
      );
    }

    return this.props.children;
  }
}
