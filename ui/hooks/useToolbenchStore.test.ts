import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { apiClient, ApiError } from "@/lib/api-client";
import { useToolbenchStore } from "./useToolbenchStore";

const pristine = useToolbenchStore.getState();

/** `<dir>/outputs` for a POSIX path, as the server suggests it */
async function outputsBeside(forPath: string): Promise<string> {
  return `${forPath.slice(0, forPath.lastIndexOf("/"))}/outputs`;
}

describe("useToolbenchStore", () => {
  beforeEach(() => {
    useToolbenchStore.setState(pristine, true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("follows a run from started to finished", () => {
    const { applyMessage } = useToolbenchStore.getState();

    applyMessage({
      kind: "started",
      panel: "bom",
      runId: "r1",
      command: "python3",
      args: ["bom_transform.py", "--input", "/work/board.csv"],
      cwd: "/work",
      startedAt: "2026-01-01T00:00:00.000Z",
    });
    expect(useToolbenchStore.getState().panels.bom.state).toBe("running");

    applyMessage({ kind: "line", panel: "bom", runId: "r1", seq: 1, stream: "stdout", text: "42 parts" });
    applyMessage({
      kind: "finished",
      panel: "bom",
      runId: "r1",
      outcome: { status: "success", exitCode: 0 },
      statusLine: "✓ Finished successfully (exit code 0)",
      finishedAt: "2026-01-01T00:00:02.000Z",
      durationMs: 2000,
    });

    const { panels } = useToolbenchStore.getState();
    expect(panels.bom.state).toBe("idle");
    expect(panels.bom.log.map((entry) => entry.text)).toEqual([
      "$ python3 bom_transform.py --input /work/board.csv",
      "42 parts",
      "✓ Finished successfully (exit code 0)",
    ]);
    expect(panels.kicad.log).toEqual([]);
  });

  it("shows field errors from a rejected submit", async () => {
    vi.spyOn(apiClient, "runBom").mockRejectedValue(
      new ApiError("VALIDATION_ERROR", "Select an input CSV file", 400, { inputPath: "Select an input CSV file" })
    );

    await useToolbenchStore.getState().submitBom();

    const state = useToolbenchStore.getState();
    expect(state.fieldErrors.bom).toEqual({ inputPath: "Select an input CSV file" });
    expect(state.notices.bom).toBeNull();
    expect(state.submitting.bom).toBe(false);
  });

  it("shows a busy panel as a notice without changing its run state", async () => {
    vi.spyOn(apiClient, "runKicad").mockRejectedValue(
      new ApiError("RUN_IN_PROGRESS", "A kicad run is already in progress", 409)
    );

    await useToolbenchStore.getState().submitKicad();

    const state = useToolbenchStore.getState();
    expect(state.notices.kicad).toBe("A kicad run is already in progress");
    expect(state.panels.kicad.state).toBe("idle");
  });

  it("clears a field error when the field is edited", () => {
    useToolbenchStore.setState((state) => {
      state.fieldErrors.bom = { inputPath: "Select an input CSV file", encoding: "Unsupported encoding name: x y" };
    });

    useToolbenchStore.getState().updateBomForm({ inputPath: "/work/board.csv" });

    const state = useToolbenchStore.getState();
    expect(state.bomForm.inputPath).toBe("/work/board.csv");
    expect(state.fieldErrors.bom).toEqual({ encoding: "Unsupported encoding name: x y" });
  });

  it("keeps a finished run idle when the panel list arrives late", async () => {
    const { applyMessage } = useToolbenchStore.getState();
    applyMessage({
      kind: "started",
      panel: "kicad",
      runId: "r7",
      command: "python3",
      args: ["kicad_export.py", "/work/widget.kicad_pro"],
      cwd: "/work",
      startedAt: "2026-01-01T00:00:00.000Z",
    });
    applyMessage({
      kind: "finished",
      panel: "kicad",
      runId: "r7",
      outcome: { status: "success", exitCode: 0 },
      statusLine: "✓ Finished successfully (exit code 0)",
      finishedAt: "2026-01-01T00:00:05.000Z",
      durationMs: 5000,
    });
    vi.spyOn(apiClient, "getPanels").mockResolvedValue({
      panels: [{ panel: "kicad", state: "running", runId: "r7", log: [], lastOutcome: null }],
      kicadCli: { location: { found: false, searched: [] }, defaultPath: "" },
    });

    await useToolbenchStore.getState().loadPanels();

    const { panels } = useToolbenchStore.getState();
    expect(panels.kicad.state).toBe("idle");
    expect(panels.kicad.log).toHaveLength(2);
  });

  it("pre-fills the CLI path from the server default", async () => {
    vi.spyOn(apiClient, "getPanels").mockResolvedValue({
      panels: [],
      kicadCli: {
        location: { found: true, path: "/usr/bin/kicad-cli", source: "search-path" },
        defaultPath: "/usr/bin/kicad-cli",
      },
    });

    await useToolbenchStore.getState().loadPanels();

    expect(useToolbenchStore.getState().kicadForm.cliPath).toBe("/usr/bin/kicad-cli");
  });

  it("blanks the CLI path when detection finds nothing", async () => {
    useToolbenchStore.getState().updateKicadForm({ cliPath: "/old/kicad-cli" });
    vi.spyOn(apiClient, "detectKicadCli").mockResolvedValue({
      location: { found: false, searched: ["/usr/bin/kicad-cli"] },
      defaultPath: "",
      version: null,
    });

    await useToolbenchStore.getState().detectCli();

    const state = useToolbenchStore.getState();
    expect(state.kicadForm.cliPath).toBe("");
    expect(state.cli.detecting).toBe(false);
    expect(state.notices.kicad).toBe("kicad-cli was not found. Enter its path or leave it blank.");
  });

  it("suggests an output directory only when the field is blank", async () => {
    const suggest = vi.spyOn(apiClient, "getDefaultOutputDir").mockResolvedValue("/work/outputs");

    await useToolbenchStore.getState().suggestOutputDir("bom", "/work/board.csv");
    expect(useToolbenchStore.getState().bomForm.outputDir).toBe("/work/outputs");

    useToolbenchStore.getState().updateKicadForm({ outputDir: "/fab" });
    await useToolbenchStore.getState().suggestOutputDir("kicad", "/work/widget.kicad_pro");
    expect(useToolbenchStore.getState().kicadForm.outputDir).toBe("/fab");
    expect(suggest).toHaveBeenCalledTimes(2);
  });

  it("follows a typed input path with the output suggestion", async () => {
    vi.spyOn(apiClient, "getDefaultOutputDir").mockImplementation(outputsBeside);
    const { updateBomForm, suggestOutputDir } = useToolbenchStore.getState();

    const typed = "/work/board.csv";
    for (let end = 1; end <= typed.length; end += 1) {
      updateBomForm({ inputPath: typed.slice(0, end) });
      await suggestOutputDir("bom", typed.slice(0, end));
    }

    expect(useToolbenchStore.getState().bomForm.outputDir).toBe("/work/outputs");
  });

  it("leaves an output directory the user chose alone", async () => {
    vi.spyOn(apiClient, "getDefaultOutputDir").mockImplementation(outputsBeside);
    const { updateKicadForm, suggestOutputDir } = useToolbenchStore.getState();

    await suggestOutputDir("kicad", "/work/widget.kicad_pro");
    expect(useToolbenchStore.getState().kicadForm.outputDir).toBe("/work/outputs");

    updateKicadForm({ outputDir: "/fab/widget" });
    await suggestOutputDir("kicad", "/rev-b/widget.kicad_pro");

    expect(useToolbenchStore.getState().kicadForm.outputDir).toBe("/fab/widget");
  });
});
