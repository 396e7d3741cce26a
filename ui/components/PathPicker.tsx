import { useCallback, useEffect, useState } from "react";
import { ArrowUp, File, Folder, Loader2, X } from "lucide-react";
import { apiClient, ApiError, type DirectoryListing, type PathEntry } from "@/lib/api-client";
import { cn } from "@/lib/utils";

export interface PathPickerProps {
  title: string;
  mode: "file" | "directory";
  /** Lower-case extensions without the dot, e.g. ["csv"] */
  extensions?: string[];
  /** A file or directory to start from; blank starts in the home directory */
  initialPath?: string;
  onSelect: (selectedPath: string) => void;
  onClose: () => void;
}

function startDirectory(initialPath: string | undefined, mode: "file" | "directory"): string {
  if (!initialPath) return "";
  if (mode === "directory") return initialPath;
  const cut = Math.max(initialPath.lastIndexOf("/"), initialPath.lastIndexOf("\\"));
  return cut > 0 ? initialPath.slice(0, cut) : "";
}

/**
 * Modal browser over the server's filesystem.
 */
export function PathPicker({ title, mode, extensions, initialPath, onSelect, onClose }: PathPickerProps) {
  const [listing, setListing] = useState<DirectoryListing | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const open = useCallback(
    async (dirPath: string) => {
      setLoading(true);
      setError(null);
      try {
        setListing(
          await apiClient.listDirectory(dirPath, { extensions, directoriesOnly: mode === "directory" })
        );
      } catch (err) {
        setError(err instanceof ApiError ? err.message : "Could not list directory");
      } finally {
        setLoading(false);
      }
    },
    [extensions, mode]
  );

  // Only the first listing depends on initialPath
  useEffect(() => {
    void open(startDirectory(initialPath, mode));
  }, []);

  const choose = (entry: PathEntry) => {
    if (entry.type === "directory") {
      void open(entry.path);
    } else {
      onSelect(entry.path);
    }
  };

  return (
    <div className="fixed inset-0 z-50 flex items-center justify-center bg-black/60 animate-fade-in" onClick={onClose}>
      <div
        role="dialog"
        aria-label={title}
        className="w-[36rem] max-h-[80vh] flex flex-col rounded-lg border border-slate-700 bg-surface-primary shadow-xl"
        onClick={(e) => e.stopPropagation()}
      >
        <div className="flex items-center justify-between px-4 py-3 border-b border-slate-700">
          <h2 className="text-sm font-semibold text-white">{title}</h2>
          <button type="button" onClick={onClose} className="text-slate-400 hover:text-white">
            <X className="w-4 h-4" />
          </button>
        </div>

        <div className="flex items-center gap-2 px-4 py-2 border-b border-slate-700 text-xs">
          <button
            type="button"
            disabled={!listing?.parent || loading}
            onClick={() => listing?.parent && void open(listing.parent)}
            className="p-1 rounded text-slate-300 hover:bg-surface-secondary disabled:opacity-40"
            title="Up"
          >
            <ArrowUp className="w-4 h-4" />
          </button>
          <span className="font-mono text-slate-300 truncate">{listing?.path ?? "…"}</span>
          {loading && <Loader2 className="w-3.5 h-3.5 animate-spin text-primary-400" />}
        </div>

        <div className="flex-1 overflow-auto py-1 min-h-[16rem]">
          {error && <p className="px-4 py-2 text-xs text-error-light">{error}</p>}
          {listing?.entries.length === 0 && !error && (
            <p className="px-4 py-2 text-xs text-slate-500">Nothing here.</p>
          )}
          {listing?.entries.map((entry) => (
            <button
              key={entry.path}
              type="button"
              onClick={() => choose(entry)}
              className="w-full flex items-center gap-2 px-4 py-1.5 text-left text-sm text-slate-200 hover:bg-surface-secondary"
            >
              {entry.type === "directory" ? (
                <Folder className="w-4 h-4 text-primary-400 flex-shrink-0" />
              ) : (
                <File className="w-4 h-4 text-slate-400 flex-shrink-0" />
              )}
              <span className="truncate">{entry.name}</span>
            </button>
          ))}
        </div>

        <div className="flex justify-end gap-2 px-4 py-3 border-t border-slate-700">
          <button
            type="button"
            onClick={onClose}
            className="px-3 py-1.5 rounded text-sm text-slate-300 hover:bg-surface-secondary"
          >
            Cancel
          </button>
          {mode === "directory" && (
            <button
              type="button"
              disabled={!listing}
              onClick={() => listing && onSelect(listing.path)}
              className={cn(
                "px-3 py-1.5 rounded text-sm font-medium text-white bg-primary-600 hover:bg-primary-500",
                "disabled:opacity-50"
              )}
            >
              Select this folder
            </button>
          )}
        </div>
      </div>
    </div>
  );
}
