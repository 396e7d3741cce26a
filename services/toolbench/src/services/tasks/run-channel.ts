/**
 * Run Channel
 *
 * One-way hand-off of RunMessages from the task controller to whoever renders
 * them (the WebSocket manager, tests). Subscribers receive messages in
 * publish order.
 */

import type { RunMessage } from '../../types/run.js';
import { log } from '../../utils/logger.js';

export type RunMessageListener = (message: RunMessage) => void;

const channelLogger = log.child({ service: 'run-channel' });

export class RunChannel {
  private readonly listeners = new Set<RunMessageListener>();

  publish(message: RunMessage): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(message);
      } catch (error) {
        // Listener errors stay with the listener
        channelLogger.error(
          'Run message listener failed',
          error instanceof Error ? error : new Error(String(error)),
          { panel: message.panel, runId: message.runId, kind: message.kind }
        );
      }
    }
  }

  /**
   * Returns an unsubscribe function.
   */
  subscribe(listener: RunMessageListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
