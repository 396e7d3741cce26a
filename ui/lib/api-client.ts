/**
 * PCB Toolbench - API Client
 *
 * Thin typed wrapper over the toolbench HTTP API. The server is always the
 * page's own origin unless VITE_API_URL says otherwise.
 */

import type { PanelId, PanelRunView, RunRequest } from "@server/types/run";
import type { CliLocation } from "@server/services/cli-locator/kicad-cli-locator";

const API_BASE_URL = import.meta.env.VITE_API_URL ?? "";

// ============================================================================
// Types
// ============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    fieldErrors?: Record<string, string>;
    context?: Record<string, unknown>;
  };
  metadata?: {
    requestId: string;
    timestamp: string;
  };
}

export interface BomFormValues {
  inputPath: string;
  outputDir: string;
  projectName: string;
  mappingPath: string;
  encoding: string;
  quiet: boolean;
}

export interface KicadFormValues {
  projectPath: string;
  outputDir: string;
  cliPath: string;
  skipChecks: boolean;
  skipExports: boolean;
  exportMode: boolean;
}

export interface CliInfo {
  location: CliLocation;
  defaultPath: string;
}

export interface DetectedCli extends CliInfo {
  version: string | null;
}

export interface RunAccepted {
  runId: string;
  request: RunRequest;
}

export interface PathEntry {
  name: string;
  path: string;
  type: "file" | "directory";
}

export interface DirectoryListing {
  path: string;
  parent: string | null;
  entries: PathEntry[];
}

// ============================================================================
// Error Classes
// ============================================================================

export class ApiError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode?: number,
    public readonly fieldErrors: Record<string, string> = {}
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export class NetworkError extends ApiError {
  constructor(message: string) {
    super("NETWORK_ERROR", message);
    this.name = "NetworkError";
  }
}

// ============================================================================
// API Client Implementation
// ============================================================================

class ToolbenchApiClient {
  private baseUrl: string;

  constructor(baseUrl: string = API_BASE_URL) {
    this.baseUrl = `${baseUrl}/api/v1`;
  }

  /**
   * Core fetch wrapper; resolves with `data` or throws ApiError
   */
  private async request<T>(
    method: "GET" | "POST",
    endpoint: string,
    body?: unknown,
    options?: { timeout?: number }
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options?.timeout ?? 30000);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${endpoint}`, {
        method,
        headers: { "Content-Type": "application/json" },
        body: method === "POST" ? JSON.stringify(body ?? {}) : undefined,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof DOMException && error.name === "AbortError") {
        throw new NetworkError("Request timed out. The toolbench server took too long to respond.");
      }
      throw new NetworkError("Unable to reach the toolbench server. Is it still running?");
    } finally {
      clearTimeout(timeoutId);
    }

    const payload: ApiResponse<T> = await response.json();

    if (!response.ok || !payload.success || payload.data === undefined) {
      throw new ApiError(
        payload.error?.code ?? "API_ERROR",
        payload.error?.message ?? `HTTP ${response.status}: ${response.statusText}`,
        response.status,
        payload.error?.fieldErrors ?? {}
      );
    }

    return payload.data;
  }

  // ==========================================================================
  // Panels
  // ==========================================================================

  getPanels(): Promise<{ panels: PanelRunView[]; kicadCli: CliInfo }> {
    return this.request("GET", "/panels");
  }

  runBom(form: BomFormValues): Promise<RunAccepted> {
    return this.request("POST", "/panels/bom/run", form);
  }

  runKicad(form: KicadFormValues): Promise<RunAccepted> {
    return this.request("POST", "/panels/kicad/run", form);
  }

  clearLog(panel: PanelId): Promise<PanelRunView> {
    return this.request("POST", `/panels/${panel}/log/clear`);
  }

  // ==========================================================================
  // KiCad CLI
  // ==========================================================================

  detectKicadCli(): Promise<DetectedCli> {
    return this.request("POST", "/kicad-cli/detect", {}, { timeout: 15000 });
  }

  // ==========================================================================
  // Paths
  // ==========================================================================

  listDirectory(
    dirPath: string,
    options: { extensions?: string[]; directoriesOnly?: boolean } = {}
  ): Promise<DirectoryListing> {
    const params = new URLSearchParams({ path: dirPath });
    if (options.extensions?.length) params.set("extensions", options.extensions.join(","));
    if (options.directoriesOnly) params.set("directoriesOnly", "true");
    return this.request("GET", `/fs/list?${params.toString()}`);
  }

  async getDefaultOutputDir(forPath: string): Promise<string> {
    const params = new URLSearchParams({ for: forPath });
    const data = await this.request<{ outputDir: string }>("GET", `/paths/default-output?${params.toString()}`);
    return data.outputDir;
  }
}

export const apiClient = new ToolbenchApiClient();

export default apiClient;
