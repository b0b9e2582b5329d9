import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Dashboard Analyst",
  description:
    "Subí un CSV o Excel, conversá con el analista y obtené dashboards con gráficos, KPIs e insights.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="es" className="dark">
      <body className="antialiased bg-zinc-950 text-white font-sans">{children}</body>
    </html>
  );
}
