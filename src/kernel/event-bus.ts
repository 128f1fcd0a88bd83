import type { Alert, Severity } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('event-bus');

/**
 * EventMap interface defining event name to payload mappings.
 * Subscribers (CLI output, tests) observe the monitor only through this map.
 */
export interface EventMap {
  // ── Monitor lifecycle ──────────────────────────────────────────────────
  'monitor:started': { entityCount: number; intervalMs: number; timestamp: Date };
  'monitor:stopped': { reason: 'cancelled' | 'completed' | 'auth_failed' | 'failed'; cycles: number; timestamp: Date };
  'monitor:cycle_started': { cycle: number; startedAt: Date };
  'monitor:cycle_complete': { cycle: number; checked: number; alerts: number; unknown: number; duration: number };

  // ── Per-entity ─────────────────────────────────────────────────────────
  'monitor:entity_checked': {
    cycle: number;
    entityId: string;
    displayName: string;
    severity: Severity;
    previous: Severity | undefined;
    summary: string;
    alert: 'none' | 'suppressed' | 'delivered' | 'disabled' | 'failed';
  };
  'monitor:alert_fired': { entityId: string; alert: Alert };
  'monitor:alert_failed': { entityId: string; alert: Alert; error: string };

  // ── Bus internals ──────────────────────────────────────────────────────
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };
}

export class EventBus {
  private listeners: Map<string, Set<(payload: never) => void>> = new Map();
  private handlerErrors: number = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }
    handlers.add(handler);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  /**
   * Emit an event to all subscribers. A throwing handler is logged and
   * reported on `system:handler_error`; the remaining handlers still run.
   */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event) as Set<(payload: EventMap[K]) => void> | undefined;
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        handler(payload);
      } catch (error) {
        this.handlerErrors++;
        const errorMsg = error instanceof Error ? error.message : String(error);

        log.error({ event: String(event), err: error }, 'Error in event handler');

        // guard against recursion from handler_error handlers
        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event: String(event),
            error: errorMsg,
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }

  once<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): () => void {
    const wrappedHandler = (payload: EventMap[K]): void => {
      this.off(event, wrappedHandler);
      handler(payload);
    };

    return this.on(event, wrappedHandler);
  }

  clear(): void {
    this.listeners.clear();
    this.handlerErrors = 0;
  }

  listenerCount(event: keyof EventMap): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }
}
