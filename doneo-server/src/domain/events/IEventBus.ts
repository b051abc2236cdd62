import { EventName, TypedEventMap } from './DomainEvents';

export type EventHandler<T> = (data: T) => void | Promise<void>;

/**
 * Publish/subscribe port for domain events. Payload types are fixed per
 * event name by TypedEventMap.
 */
export interface IEventBus {
  /** Resolves once every handler has settled. */
  emit<K extends EventName>(event: K, data: TypedEventMap[K]): Promise<void>;
  on<K extends EventName>(event: K, handler: EventHandler<TypedEventMap[K]>): void;
  off<K extends EventName>(event: K, handler: EventHandler<TypedEventMap[K]>): void;
  once<K extends EventName>(event: K, handler: EventHandler<TypedEventMap[K]>): void;
  /** Without an event name every subscription is dropped. */
  removeAllListeners(event?: EventName): void;
  listenerCount?(event: EventName): number;
}
