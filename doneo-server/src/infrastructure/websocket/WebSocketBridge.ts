import { WebSocketServer, WebSocket, RawData } from 'ws';
import { z } from 'zod';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { ALL_EVENT_NAMES, EventName, TypedEventMap } from '../../domain/events/DomainEvents';

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('subscribe'), projectIds: z.array(z.string()) }),
  z.object({ type: z.literal('unsubscribe') }),
]);

/**
 * Project an event belongs to. Every domain event is scoped to one.
 */
export function projectIdOf(data: TypedEventMap[EventName]): string {
  if ('projectId' in data) return data.projectId;
  return data.id;
}

/**
 * Bridges domain events to WebSocket clients.
 *
 * Clients can send a `subscribe` message with `projectIds` to receive only
 * events of those projects. Clients without a subscription receive all
 * events.
 */
export class WebSocketBridge {
  private logger: ILogger;
  /** Per-client project filters. Clients not in this map get all events. */
  private subscriptions = new Map<WebSocket, Set<string>>();

  constructor(
    private wss: WebSocketServer,
    private eventBus: IEventBus,
    logger: ILogger
  ) {
    this.logger = logger;
    this.setupEventHandlers();
    this.setupConnectionHandlers();
  }

  private setupConnectionHandlers(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      ws.on('close', () => {
        this.subscriptions.delete(ws);
      });

      ws.on('error', (error) => {
        this.logger.error('WebSocket client error:', error);
      });

      ws.on('message', (data: RawData) => {
        this.handleClientMessage(ws, data);
      });
    });
  }

  private handleClientMessage(ws: WebSocket, data: RawData): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data.toString());
    } catch (err) {
      this.logger.warn('Failed to parse WebSocket message', { error: err instanceof Error ? err.message : String(err) });
      return;
    }

    const result = clientMessageSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.debug('Ignoring unknown WebSocket message');
      return;
    }

    const message = result.data;
    switch (message.type) {
      case 'ping':
        ws.send(JSON.stringify({ type: 'pong', timestamp: Date.now() }));
        return;
      case 'subscribe': {
        const ids = new Set(message.projectIds);
        this.subscriptions.set(ws, ids);
        ws.send(JSON.stringify({ type: 'subscribed', projectIds: [...ids], timestamp: Date.now() }));
        return;
      }
      case 'unsubscribe':
        this.subscriptions.delete(ws);
        ws.send(JSON.stringify({ type: 'unsubscribed', timestamp: Date.now() }));
        return;
    }
  }

  private setupEventHandlers(): void {
    for (const event of ALL_EVENT_NAMES) {
      this.subscribe(event);
    }

    this.logger.info(`WebSocket bridge subscribed to ${ALL_EVENT_NAMES.length} events`);
  }

  private subscribe<K extends EventName>(event: K): void {
    this.eventBus.on(event, (data: TypedEventMap[K]) => {
      this.broadcast(event, projectIdOf(data), data);
    });
  }

  /**
   * Broadcast to open clients whose subscription (if any) includes the project.
   */
  private broadcast(event: EventName, projectId: string, data: unknown): void {
    const message = JSON.stringify({
      type: event,
      event,
      data,
      timestamp: Date.now()
    });

    this.wss.clients.forEach((client) => {
      if (client.readyState !== WebSocket.OPEN) return;

      const sub = this.subscriptions.get(client);
      if (sub && !sub.has(projectId)) return;

      client.send(message);
    });
  }

  getClientCount(): number {
    return this.wss.clients.size;
  }

  getClientStatus(): Array<{ readyState: number; readyStateText: string }> {
    const clients: Array<{ readyState: number; readyStateText: string }> = [];
    this.wss.clients.forEach((client) => {
      clients.push({
        readyState: client.readyState,
        readyStateText: ['CONNECTING', 'OPEN', 'CLOSING', 'CLOSED'][client.readyState]
      });
    });
    return clients;
  }
}
