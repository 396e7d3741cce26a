import { CircuitBoard, Loader2, ScanSearch } from "lucide-react";
import { useToolbenchStore } from "@/hooks/useToolbenchStore";
import { Checkbox, Notice, PathField, RunButton } from "@/components/FormControls";
import { RunLog } from "@/components/RunLog";

export function KiCadPanel() {
  const form = useToolbenchStore((state) => state.kicadForm);
  const view = useToolbenchStore((state) => state.panels.kicad);
  const errors = useToolbenchStore((state) => state.fieldErrors.kicad);
  const notice = useToolbenchStore((state) => state.notices.kicad);
  const submitting = useToolbenchStore((state) => state.submitting.kicad);
  const cli = useToolbenchStore((state) => state.cli);
  const updateForm = useToolbenchStore((state) => state.updateKicadForm);
  const suggestOutputDir = useToolbenchStore((state) => state.suggestOutputDir);
  const detectCli = useToolbenchStore((state) => state.detectCli);
  const submit = useToolbenchStore((state) => state.submitKicad);
  const clearLog = useToolbenchStore((state) => state.clearLog);

  const running = view.state === "running";

  const setProject = (projectPath: string) => {
    updateForm({ projectPath });
    void suggestOutputDir("kicad", projectPath);
  };

  const cliHint = cli.version
    ? `kicad-cli ${cli.version}`
    : "Blank lets the export script look for kicad-cli itself";

  return (
    <section className="flex flex-col gap-4 min-h-0 rounded-xl border border-slate-700 bg-surface-primary p-4">
      <header className="flex items-center gap-2">
        <CircuitBoard className="w-5 h-5 text-primary-400" />
        <h2 className="text-base font-semibold text-white">KiCad Export &amp; Checks</h2>
      </header>

      <div className="grid gap-3">
        <PathField
          id="kicad-project"
          label="KiCad project"
          value={form.projectPath}
          onChange={setProject}
          error={errors.projectPath}
          placeholder="/path/to/widget.kicad_pro"
          disabled={running}
          picker={{ title: "Select KiCad project", mode: "file", extensions: ["kicad_pro"] }}
        />
        <PathField
          id="kicad-output"
          label="Output directory"
          value={form.outputDir}
          onChange={(outputDir) => updateForm({ outputDir })}
          error={errors.outputDir}
          hint="Blank uses an outputs folder next to the project"
          disabled={running}
          picker={{ title: "Select output directory", mode: "directory" }}
        />
        <PathField
          id="kicad-cli"
          label="kicad-cli"
          value={form.cliPath}
          onChange={(cliPath) => updateForm({ cliPath })}
          error={errors.cliPath}
          hint={cliHint}
          placeholder="Not detected"
          disabled={running}
          picker={{ title: "Select kicad-cli", mode: "file" }}
          actions={
            <button
              type="button"
              onClick={() => void detectCli()}
              disabled={running || cli.detecting}
              className="flex items-center gap-1.5 rounded-md border border-slate-700 px-2.5 text-xs text-slate-300 hover:bg-surface-secondary disabled:opacity-50"
            >
              {cli.detecting ? <Loader2 className="w-3.5 h-3.5 animate-spin" /> : <ScanSearch className="w-3.5 h-3.5" />}
              Detect
            </button>
          }
        />
        <div className="flex flex-wrap gap-x-6 gap-y-2">
          <Checkbox
            id="kicad-skip-checks"
            label="Skip ERC/DRC"
            checked={form.skipChecks}
            onChange={(skipChecks) => updateForm({ skipChecks })}
            disabled={running}
          />
          <Checkbox
            id="kicad-skip-exports"
            label="Skip exports"
            checked={form.skipExports}
            onChange={(skipExports) => updateForm({ skipExports })}
            disabled={running}
          />
          <Checkbox
            id="kicad-export-mode"
            label="Export only"
            checked={form.exportMode}
            onChange={(exportMode) => updateForm({ exportMode })}
            disabled={running}
          />
        </div>
        {errors.skipExports && <p className="text-xs text-error-light">{errors.skipExports}</p>}
      </div>

      <Notice message={notice} />
      <RunButton label="Run KiCad export" running={running} submitting={submitting} onClick={() => void submit()} />
      <RunLog view={view} onClear={() => void clearLog("kicad")} />
    </section>
  );
}
