import type { ReactNode } from "react";

interface ChartFrameProps {
  title: string;
  children: ReactNode;
}

export function ChartFrame({ title, children }: ChartFrameProps) {
  return (
    <div className="w-full rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
      <h3 className="mb-3 text-base font-semibold text-white">{title}</h3>
      <div className="h-[420px]">{children}</div>
    </div>
  );
}
