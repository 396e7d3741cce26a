/**
 * Run WebSocket Manager
 *
 * Forwards RunMessages to browsers on the `/runs` namespace. Each panel has
 * its own room; a client that subscribes first receives the panel's current
 * view, then every message published after it.
 */

import type { Server as SocketIOServer, Namespace, Socket } from 'socket.io';
import { isPanelId, type PanelId, type RunMessage } from '../types/run.js';
import type { BackgroundTaskController, RunChannel } from '../services/tasks/index.js';
import { log } from '../utils/logger.js';

export const RUNS_NAMESPACE = '/runs';

const wsLogger = log.child({ service: 'run-ws' });

function panelRoom(panel: PanelId): string {
  return `panel:${panel}`;
}

export class RunWebSocketManager {
  protected namespace: Namespace;
  private readonly unsubscribe: () => void;

  constructor(
    io: SocketIOServer,
    private readonly controller: BackgroundTaskController,
    channel: RunChannel
  ) {
    this.namespace = io.of(RUNS_NAMESPACE);
    this.setupNamespace();
    this.unsubscribe = channel.subscribe((message) => this.forward(message));

    wsLogger.info('Run WebSocket manager initialized', { namespace: RUNS_NAMESPACE });
  }

  protected setupNamespace(): void {
    this.namespace.on('connection', (socket: Socket) => {
      wsLogger.info('Client connected', { socketId: socket.id });

      socket.on('subscribe:panel', (panel: unknown) => {
        if (!isPanelId(panel)) {
          wsLogger.warn('Subscribe for unknown panel', { socketId: socket.id, panel: String(panel) });
          return;
        }
        void socket.join(panelRoom(panel));
        socket.emit('run:snapshot', this.controller.getView(panel));
        wsLogger.debug('Client subscribed to panel', { socketId: socket.id, panel });
      });

      socket.on('unsubscribe:panel', (panel: unknown) => {
        if (!isPanelId(panel)) return;
        void socket.leave(panelRoom(panel));
        wsLogger.debug('Client unsubscribed from panel', { socketId: socket.id, panel });
      });

      socket.on('heartbeat', () => {
        socket.emit('heartbeat:ack', { timestamp: new Date().toISOString() });
      });

      socket.on('disconnect', (reason: string) => {
        wsLogger.info('Client disconnected', { socketId: socket.id, reason });
      });
    });
  }

  private forward(message: RunMessage): void {
    this.namespace.to(panelRoom(message.panel)).emit('run:message', message);
  }

  close(): void {
    this.unsubscribe();
    this.namespace.disconnectSockets(true);
  }
}
