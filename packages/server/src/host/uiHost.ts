import type { SyncSummary, WSMessage } from '@script-menu/shared';

type Listener = (msg: WSMessage) => void;

/** What scripts see as `gui` */
export interface GuiHandle {
  /** Post a line of text to every connected client */
  notify(text: string): void;
  /** Force an immediate resynchronization pass */
  refresh(): Promise<SyncSummary>;
}

/**
 * Fan-out point between the command tree, running scripts and the
 * WebSocket clients that render the menu.
 */
export class UiHost implements GuiHandle {
  private listeners: Set<Listener> = new Set();
  private refreshHandler: (() => Promise<SyncSummary>) | null = null;

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  broadcast(msg: WSMessage) {
    for (const listener of this.listeners) {
      try {
        listener(msg);
      } catch (err) {
        console.warn('[ui] Listener error:', err instanceof Error ? err.message : err);
      }
    }
  }

  onRefresh(handler: () => Promise<SyncSummary>) {
    this.refreshHandler = handler;
  }

  notify(text: string): void {
    this.broadcast({ type: 'script_notice', data: { text: String(text), timestamp: Date.now() } });
  }

  refresh(): Promise<SyncSummary> {
    if (!this.refreshHandler) {
      return Promise.reject(new Error('UI host is not attached to a command tree'));
    }
    return this.refreshHandler();
  }
}
