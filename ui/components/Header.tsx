import { Cpu, Wifi, WifiOff } from "lucide-react";
import { cn } from "@/lib/utils";

interface HeaderProps {
  connected: boolean;
}

export function Header({ connected }: HeaderProps) {
  return (
    <header className="h-14 border-b border-slate-700 bg-surface-primary flex items-center justify-between px-4">
      {/* Logo and Title */}
      <div className="flex items-center gap-3">
        <div className="flex items-center justify-center w-8 h-8 rounded-lg bg-primary-600">
          <Cpu className="w-5 h-5 text-white" />
        </div>
        <div>
          <h1 className="text-lg font-semibold text-white">PCB Toolbench</h1>
          <p className="text-xs text-slate-400">BOM transform and KiCad export</p>
        </div>
      </div>

      {/* Connection Indicator */}
      <div
        className={cn(
          "flex items-center gap-1.5 text-sm",
          connected ? "text-success-light" : "text-slate-500"
        )}
        title={connected ? "Live output connected" : "Live output disconnected"}
      >
        {connected ? <Wifi className="w-4 h-4" /> : <WifiOff className="w-4 h-4" />}
        <span>{connected ? "Connected" : "Offline"}</span>
      </div>
    </header>
  );
}
