import { EventEmitter } from 'events';
import { IEventBus, EventHandler } from '../../domain/events/IEventBus';
import { EventName, TypedEventMap } from '../../domain/events/DomainEvents';
import { ILogger } from '../../domain/common/ILogger';

/**
 * Process-local event bus over a Node EventEmitter.
 *
 * `emit` waits for every handler, sync or async. A handler that throws or
 * rejects is logged; the remaining handlers still run and the emitter
 * never sees the failure.
 */
export class InMemoryEventBus implements IEventBus {
  private readonly emitter = new EventEmitter();

  constructor(private readonly logger: ILogger) {
    // one listener per event for the WebSocket bridge, plus tests and plugins
    this.emitter.setMaxListeners(100);
  }

  async emit<K extends EventName>(event: K, data: TypedEventMap[K]): Promise<void> {
    // rawListeners keeps the once() wrappers, which unregister themselves when called
    const handlers = this.emitter.rawListeners(event);
    if (handlers.length === 0) return;

    const results = await Promise.allSettled(handlers.map(async (handler) => handler(data)));

    for (const result of results) {
      if (result.status === 'rejected') {
        const reason: unknown = result.reason;
        this.logger.error(
          `Error in event handler for ${event}:`,
          reason instanceof Error ? reason : new Error(String(reason))
        );
      }
    }
  }

  on<K extends EventName>(event: K, handler: EventHandler<TypedEventMap[K]>): void {
    this.emitter.on(event, handler);
  }

  off<K extends EventName>(event: K, handler: EventHandler<TypedEventMap[K]>): void {
    this.emitter.off(event, handler);
  }

  once<K extends EventName>(event: K, handler: EventHandler<TypedEventMap[K]>): void {
    this.emitter.once(event, handler);
  }

  removeAllListeners(event?: EventName): void {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
  }

  listenerCount(event: EventName): number {
    return this.emitter.listenerCount(event);
  }
}
