import { createLogger } from './logger.js';

const log = createLogger('event-bus');

/**
 * EventMap interface defining event name to payload mappings.
 * Pipeline, cache and playback publish here; the CLI and tests subscribe.
 */
export interface EventMap {
  // ── Pipeline events ────────────────────────────────────────────────────
  'speech:state': { requestId: string; state: string; timestamp: string };
  'speech:retry': { requestId: string; segmentIndex: number; attempt: number; delayMs: number; error: string };
  'speech:segment_synthesized': { requestId: string; segmentIndex: number; bytes: number; fromCache: boolean };
  'speech:delivered': { requestId: string; cacheHit: boolean; synthesisCalls: number; artifactPath: string };
  'speech:failed': { requestId: string; stage: string; code: string; message: string };

  // ── Cache events ───────────────────────────────────────────────────────
  'cache:stored': { key: string; sizeBytes: number };
  'cache:evicted': { key: string; reason: 'expired' | 'capacity' | 'missing_file' | 'cleared' };
  'cache:io_error': { operation: string; error: string };

  // ── Playback events ────────────────────────────────────────────────────
  'playback:started': { filePath: string };
  'playback:finished': { filePath: string; outcome: string };

  // ── System events ──────────────────────────────────────────────────────
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };
}

export class EventBus {
  private listeners: Map<string, Set<(payload: never) => void>> = new Map();
  private handlerErrors: number = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }
    handlers.add(handler);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  /**
   * Emit an event to all subscribers. A throwing handler never breaks the others.
   */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event) as Set<(payload: EventMap[K]) => void> | undefined;
    if (!handlers) return;

    for (const handler of handlers) {
      try {
        handler(payload);
      } catch (error) {
        this.handlerErrors++;
        const errorMsg = error instanceof Error ? error.message : String(error);

        log.error({ event, err: error }, 'Error in event handler');

        // Guard against recursion from handler_error handlers
        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event,
            error: errorMsg,
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }

  once<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): () => void {
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
    const handlers = this.listeners.get(event);
    return handlers ? handlers.size : 0;
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }
}
