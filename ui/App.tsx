import { useEffect } from "react";
import { Header } from "@/components/Header";
import { BOMPanel, KiCadPanel } from "@/components/panels";
import { useRunSocket } from "@/hooks/useRunSocket";
import { useToolbenchStore } from "@/hooks/useToolbenchStore";

export default function App() {
  const connected = useToolbenchStore((state) => state.connected);
  const loadPanels = useToolbenchStore((state) => state.loadPanels);

  useRunSocket();

  // Pre-fill the CLI path and pick up any run already in progress
  useEffect(() => {
    void loadPanels();
  }, [loadPanels]);

  return (
    <div className="h-screen flex flex-col bg-background-primary">
      <Header connected={connected} />

      <main className="flex-1 min-h-0 grid grid-cols-1 lg:grid-cols-2 gap-4 p-4 overflow-auto">
        <BOMPanel />
        <KiCadPanel />
      </main>
    </div>
  );
}
