import { FileSpreadsheet } from "lucide-react";
import { useToolbenchStore } from "@/hooks/useToolbenchStore";
import { Checkbox, Notice, PathField, RunButton, TextField } from "@/components/FormControls";
import { RunLog } from "@/components/RunLog";

export function BOMPanel() {
  const form = useToolbenchStore((state) => state.bomForm);
  const view = useToolbenchStore((state) => state.panels.bom);
  const errors = useToolbenchStore((state) => state.fieldErrors.bom);
  const notice = useToolbenchStore((state) => state.notices.bom);
  const submitting = useToolbenchStore((state) => state.submitting.bom);
  const updateForm = useToolbenchStore((state) => state.updateBomForm);
  const suggestOutputDir = useToolbenchStore((state) => state.suggestOutputDir);
  const submit = useToolbenchStore((state) => state.submitBom);
  const clearLog = useToolbenchStore((state) => state.clearLog);

  const running = view.state === "running";

  const setInput = (inputPath: string) => {
    updateForm({ inputPath });
    void suggestOutputDir("bom", inputPath);
  };

  return (
    <section className="flex flex-col gap-4 min-h-0 rounded-xl border border-slate-700 bg-surface-primary p-4">
      <header className="flex items-center gap-2">
        <FileSpreadsheet className="w-5 h-5 text-primary-400" />
        <h2 className="text-base font-semibold text-white">BOM Transform</h2>
      </header>

      <div className="grid gap-3">
        <PathField
          id="bom-input"
          label="Input CSV"
          value={form.inputPath}
          onChange={setInput}
          error={errors.inputPath}
          placeholder="/path/to/board.csv"
          disabled={running}
          picker={{ title: "Select BOM CSV", mode: "file", extensions: ["csv"] }}
        />
        <PathField
          id="bom-output"
          label="Output directory"
          value={form.outputDir}
          onChange={(outputDir) => updateForm({ outputDir })}
          error={errors.outputDir}
          hint="Blank uses an outputs folder next to the input file"
          disabled={running}
          picker={{ title: "Select output directory", mode: "directory" }}
        />
        <div className="grid grid-cols-2 gap-3">
          <TextField
            id="bom-project"
            label="Project name"
            value={form.projectName}
            onChange={(projectName) => updateForm({ projectName })}
            error={errors.projectName}
            placeholder="Derived from the input file"
            disabled={running}
          />
          <TextField
            id="bom-encoding"
            label="Encoding"
            value={form.encoding}
            onChange={(encoding) => updateForm({ encoding })}
            error={errors.encoding}
            placeholder="auto"
            disabled={running}
          />
        </div>
        <PathField
          id="bom-mapping"
          label="Mapping file"
          value={form.mappingPath}
          onChange={(mappingPath) => updateForm({ mappingPath })}
          error={errors.mappingPath}
          hint="Optional YAML column mapping"
          disabled={running}
          picker={{ title: "Select mapping file", mode: "file", extensions: ["yml", "yaml"] }}
        />
        <Checkbox
          id="bom-quiet"
          label="Silent (only errors)"
          checked={form.quiet}
          onChange={(quiet) => updateForm({ quiet })}
          disabled={running}
        />
      </div>

      <Notice message={notice} />
      <RunButton label="Transform BOM" running={running} submitting={submitting} onClick={() => void submit()} />
      <RunLog view={view} onClear={() => void clearLog("bom")} />
    </section>
  );
}
