import { useEffect, useRef } from "react";
import { Eraser, Terminal as TerminalIcon } from "lucide-react";
import type { LogEntry, PanelRunView } from "@server/types/run";
import { cn } from "@/lib/utils";

interface RunLogProps {
  view: PanelRunView;
  onClear: () => void;
}

function entryStyle(entry: LogEntry): string {
  switch (entry.kind) {
    case "command":
      return "text-primary-300";
    case "status":
      return entry.ok ? "text-success-light font-semibold" : "text-error-light font-semibold";
    default:
      return entry.stream === "stderr" ? "text-warning-light" : "text-slate-300";
  }
}

/**
 * Read-only log of one panel's most recent run.
 */
export function RunLog({ view, onClear }: RunLogProps) {
  const logRef = useRef<HTMLDivElement>(null);

  // Auto-scroll to bottom when the log changes
  useEffect(() => {
    if (logRef.current) {
      logRef.current.scrollTop = logRef.current.scrollHeight;
    }
  }, [view.log]);

  const running = view.state === "running";

  return (
    <div className="flex flex-col min-h-0 flex-1 rounded-lg border border-slate-700 bg-background-primary">
      <div className="flex items-center justify-between px-3 py-1.5 border-b border-slate-700 bg-surface-primary rounded-t-lg">
        <div className="flex items-center gap-2 text-xs text-slate-400">
          <TerminalIcon className="w-3.5 h-3.5" />
          <span>Output</span>
        </div>
        <button
          type="button"
          onClick={onClear}
          disabled={running || view.log.length === 0}
          className="p-1 rounded text-slate-400 hover:text-white hover:bg-surface-secondary disabled:opacity-40 disabled:hover:bg-transparent"
          title="Clear output"
        >
          <Eraser className="w-3.5 h-3.5" />
        </button>
      </div>
      <div
        ref={logRef}
        role="log"
        aria-live="polite"
        aria-readonly="true"
        className="flex-1 overflow-auto p-3 font-mono text-xs leading-relaxed whitespace-pre-wrap break-all"
      >
        {view.log.length === 0 ? (
          <span className="text-slate-600">No output yet.</span>
        ) : (
          view.log.map((entry) => (
            <div key={entry.id} className={cn(entryStyle(entry))}>
              {entry.text}
            </div>
          ))
        )}
      </div>
    </div>
  );
}
