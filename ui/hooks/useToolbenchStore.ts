/**
 * PCB Toolbench - State Management Store
 *
 * Panel run state changes only by folding RunMessages and snapshots from the
 * server, so the Run buttons follow the server's Idle/Running state.
 */

import { create } from "zustand";
import { immer } from "zustand/middleware/immer";
import { current } from "immer";
import {
  applyRunMessage,
  createPanelRunView,
  type PanelId,
  type PanelRunView,
  type RunMessage,
} from "@server/types/run";
import type { CliLocation } from "@server/services/cli-locator/kicad-cli-locator";
import {
  apiClient,
  ApiError,
  type BomFormValues,
  type KicadFormValues,
} from "@/lib/api-client";

// ============================================================================
// Types
// ============================================================================

export type FieldErrors = Record<string, string>;

/** Entries kept per panel in the browser */
export const BROWSER_LOG_LIMIT = 5000;

export interface CliState {
  location: CliLocation | null;
  version: string | null;
  detecting: boolean;
}

export interface ToolbenchState {
  connected: boolean;
  panels: Record<PanelId, PanelRunView>;
  bomForm: BomFormValues;
  kicadForm: KicadFormValues;
  fieldErrors: Record<PanelId, FieldErrors>;
  notices: Record<PanelId, string | null>;
  /** HTTP submit in flight; the run itself is tracked in `panels` */
  submitting: Record<PanelId, boolean>;
  /** Last output directory filled in automatically; replaced while the field still holds it */
  suggestedOutputDirs: Record<PanelId, string | null>;
  cli: CliState;

  // Socket feed
  setConnected: (connected: boolean) => void;
  applyMessage: (message: RunMessage) => void;
  applySnapshot: (view: PanelRunView) => void;

  // Forms
  updateBomForm: (patch: Partial<BomFormValues>) => void;
  updateKicadForm: (patch: Partial<KicadFormValues>) => void;
  suggestOutputDir: (panel: PanelId, forPath: string) => Promise<void>;

  // Server actions
  loadPanels: () => Promise<void>;
  submitBom: () => Promise<void>;
  submitKicad: () => Promise<void>;
  clearLog: (panel: PanelId) => Promise<void>;
  detectCli: () => Promise<void>;
}

// ============================================================================
// Initial State
// ============================================================================

export const initialBomForm: BomFormValues = {
  inputPath: "",
  outputDir: "",
  projectName: "",
  mappingPath: "",
  encoding: "",
  quiet: false,
};

export const initialKicadForm: KicadFormValues = {
  projectPath: "",
  outputDir: "",
  cliPath: "",
  skipChecks: false,
  skipExports: false,
  exportMode: false,
};

function describeError(error: unknown, fallback: string): string {
  return error instanceof ApiError || error instanceof Error ? error.message : fallback;
}

// ============================================================================
// Store
// ============================================================================

export const useToolbenchStore = create<ToolbenchState>()(
  immer((set, get) => {
    // Only the latest suggestion request per panel may write the field
    const suggestionSeq: Record<PanelId, number> = { bom: 0, kicad: 0 };

    const submit = async (panel: PanelId, send: () => Promise<unknown>): Promise<void> => {
      set((state) => {
        state.submitting[panel] = true;
        state.fieldErrors[panel] = {};
        state.notices[panel] = null;
      });

      try {
        await send();
      } catch (error) {
        set((state) => {
          if (error instanceof ApiError && error.statusCode === 400) {
            state.fieldErrors[panel] = error.fieldErrors;
            if (Object.keys(error.fieldErrors).length === 0) {
              state.notices[panel] = error.message;
            }
          } else {
            state.notices[panel] = describeError(error, "Could not start the run");
          }
        });
      } finally {
        set((state) => {
          state.submitting[panel] = false;
        });
      }
    };

    return {
      connected: false,
      panels: {
        bom: createPanelRunView("bom"),
        kicad: createPanelRunView("kicad"),
      },
      bomForm: { ...initialBomForm },
      kicadForm: { ...initialKicadForm },
      fieldErrors: { bom: {}, kicad: {} },
      notices: { bom: null, kicad: null },
      submitting: { bom: false, kicad: false },
      suggestedOutputDirs: { bom: null, kicad: null },
      cli: { location: null, version: null, detecting: false },

      // ======================================================================
      // Socket Feed
      // ======================================================================

      setConnected: (connected) => {
        set((state) => {
          state.connected = connected;
        });
      },

      applyMessage: (message) => {
        set((state) => {
          const view = current(state.panels[message.panel]);
          state.panels[message.panel] = applyRunMessage(view, message, BROWSER_LOG_LIMIT);
        });
      },

      applySnapshot: (view) => {
        set((state) => {
          state.panels[view.panel] = view;
        });
      },

      // ======================================================================
      // Forms
      // ======================================================================

      updateBomForm: (patch) => {
        set((state) => {
          Object.assign(state.bomForm, patch);
          for (const field of Object.keys(patch)) {
            delete state.fieldErrors.bom[field];
          }
        });
      },

      updateKicadForm: (patch) => {
        set((state) => {
          Object.assign(state.kicadForm, patch);
          for (const field of Object.keys(patch)) {
            delete state.fieldErrors.kicad[field];
          }
        });
      },

      suggestOutputDir: async (panel, forPath) => {
        const seq = ++suggestionSeq[panel];
        const replaceSuggestion = (outputDir: string) => {
          set((state) => {
            const form = panel === "bom" ? state.bomForm : state.kicadForm;
            const previous = state.suggestedOutputDirs[panel];
            if (form.outputDir && form.outputDir !== previous) return;
            form.outputDir = outputDir;
            state.suggestedOutputDirs[panel] = outputDir || null;
          });
        };

        if (!forPath.trim()) {
          replaceSuggestion("");
          return;
        }
        try {
          const outputDir = await apiClient.getDefaultOutputDir(forPath);
          if (seq === suggestionSeq[panel]) replaceSuggestion(outputDir);
        } catch (error) {
          console.warn("[Toolbench] No output suggestion:", describeError(error, "unknown error"));
        }
      },

      // ======================================================================
      // Server Actions
      // ======================================================================

      loadPanels: async () => {
        try {
          // Run state is owned by the socket feed
          const { kicadCli } = await apiClient.getPanels();
          set((state) => {
            state.cli.location = kicadCli.location;
            if (!state.kicadForm.cliPath) {
              state.kicadForm.cliPath = kicadCli.defaultPath;
            }
          });
        } catch (error) {
          set((state) => {
            state.notices.bom = describeError(error, "Could not load panel state");
          });
        }
      },

      submitBom: () => submit("bom", () => apiClient.runBom(get().bomForm)),

      submitKicad: () => submit("kicad", () => apiClient.runKicad(get().kicadForm)),

      clearLog: async (panel) => {
        try {
          await apiClient.clearLog(panel);
        } catch (error) {
          set((state) => {
            state.notices[panel] = describeError(error, "Could not clear the log");
          });
        }
      },

      detectCli: async () => {
        set((state) => {
          state.cli.detecting = true;
          state.notices.kicad = null;
        });
        try {
          const detected = await apiClient.detectKicadCli();
          set((state) => {
            state.cli.location = detected.location;
            state.cli.version = detected.version;
            state.kicadForm.cliPath = detected.defaultPath;
            delete state.fieldErrors.kicad.cliPath;
            if (!detected.location.found) {
              state.notices.kicad = "kicad-cli was not found. Enter its path or leave it blank.";
            }
          });
        } catch (error) {
          set((state) => {
            state.notices.kicad = describeError(error, "CLI detection failed");
          });
        } finally {
          set((state) => {
            state.cli.detecting = false;
          });
        }
      },
    };
  })
);
