/**
 * Event Bus
 *
 * In-process publish/subscribe for run events.
 *
 * - Handlers run in registration order; async handlers are awaited
 * - Handler failures are reported and never reach the run or other handlers
 * - '*' subscribes to every event
 *
 * @example
 * ```ts
 * const bus = new EventBus();
 * bus.on('node.completed', (event) => {
 *   console.log('Node done:', event.nodeId);
 * });
 * ```
 */

import type { EngineEvent, EngineEventType } from './EngineEvents.js';

export type EventHandler = (event: EngineEvent) => void | Promise<void>;

export type HandlerErrorReporter = (error: unknown, event: EngineEvent) => void;

export class EventBus {
  private readonly listeners = new Map<string, EventHandler[]>();
  private wildcardListeners: EventHandler[] = [];

  /**
   * @param onHandlerError - Receives handler failures (defaults to stderr)
   */
  constructor(private onHandlerError: HandlerErrorReporter = defaultReporter) {}

  /**
   * Subscribe to one event type, or '*' for all
   *
   * @returns Unsubscribe function
   */
  on(eventType: EngineEventType | `${EngineEventType}` | '*', handler: EventHandler): () => void {
    const list = eventType === '*' ? this.wildcardListeners : this.handlersFor(eventType);
    list.push(handler);

    return () => {
      const index = list.indexOf(handler);
      if (index !== -1) {
        list.splice(index, 1);
      }
    };
  }

  /**
   * Subscribe for a single delivery
   */
  once(eventType: EngineEventType | `${EngineEventType}`, handler: EventHandler): void {
    const unsubscribe = this.on(eventType, (event) => {
      unsubscribe();
      return handler(event);
    });
  }

  async emit(event: EngineEvent): Promise<void> {
    const handlers = [...(this.listeners.get(event.type) ?? []), ...this.wildcardListeners];

    for (const handler of handlers) {
      try {
        await handler(event);
      } catch (error) {
        this.onHandlerError(error, event);
      }
    }
  }

  /**
   * Replace the reporter used for handler failures
   */
  setErrorReporter(reporter: HandlerErrorReporter): void {
    this.onHandlerError = reporter;
  }

  off(eventType: EngineEventType | `${EngineEventType}`): void {
    this.listeners.delete(eventType);
  }

  clear(): void {
    this.listeners.clear();
    this.wildcardListeners = [];
  }

  listenerCount(eventType: EngineEventType | `${EngineEventType}`): number {
    return (this.listeners.get(eventType) ?? []).length;
  }

  private handlersFor(eventType: string): EventHandler[] {
    let list = this.listeners.get(eventType);
    if (!list) {
      list = [];
      this.listeners.set(eventType, list);
    }
    return list;
  }
}

function defaultReporter(error: unknown, event: EngineEvent): void {
  console.error(`[EventBus] Handler error for event '${event.type}':`, error);
}
