/**
 * PCB Toolbench - Run Socket Hook
 *
 * Subscribes to both panels on the `/runs` namespace and feeds every
 * snapshot and RunMessage into the store. This is the only path by which
 * run output reaches the page.
 */

import { useEffect } from "react";
import { io, type Socket } from "socket.io-client";
import { PANEL_IDS, type PanelRunView, type RunMessage } from "@server/types/run";
import { useToolbenchStore } from "./useToolbenchStore";

// ============================================================================
// Constants
// ============================================================================

const WS_PATH = "/ws";
const RUNS_NAMESPACE = "/runs";
const RECONNECTION_DELAY = 1000;
const RECONNECTION_DELAY_MAX = 5000;
const HEARTBEAT_INTERVAL = 25000;

export function useRunSocket(baseUrl: string = import.meta.env.VITE_API_URL ?? ""): void {
  // Zustand actions are stable references
  const setConnected = useToolbenchStore((state) => state.setConnected);
  const applyMessage = useToolbenchStore((state) => state.applyMessage);
  const applySnapshot = useToolbenchStore((state) => state.applySnapshot);

  useEffect(() => {
    const socket: Socket = io(`${baseUrl}${RUNS_NAMESPACE}`, {
      path: WS_PATH,
      transports: ["websocket", "polling"],
      reconnection: true,
      reconnectionDelay: RECONNECTION_DELAY,
      reconnectionDelayMax: RECONNECTION_DELAY_MAX,
    });

    socket.on("connect", () => {
      setConnected(true);
      // Snapshots on every (re)connect replace whatever was missed
      for (const panel of PANEL_IDS) {
        socket.emit("subscribe:panel", panel);
      }
    });

    socket.on("disconnect", (reason) => {
      console.log("[RunSocket] Disconnected:", reason);
      setConnected(false);
    });

    socket.on("connect_error", (error) => {
      console.error("[RunSocket] Connection error:", error.message);
    });

    socket.on("run:snapshot", (view: PanelRunView) => applySnapshot(view));
    socket.on("run:message", (message: RunMessage) => applyMessage(message));

    const heartbeat = setInterval(() => {
      if (socket.connected) socket.emit("heartbeat");
    }, HEARTBEAT_INTERVAL);

    return () => {
      clearInterval(heartbeat);
      socket.disconnect();
    };
  }, [baseUrl, setConnected, applyMessage, applySnapshot]);
}
