import type { StoreEvent } from "../../shared/events.js";
import type { Logger } from "../logger.js";
import type { EventStream } from "./eventStream.js";
import type { StateStore } from "./stateStore.js";

/** A live real-time connection as the gateway sees it. */
export interface GatewayConnection {
  readonly id: string;
  send(event: StoreEvent): void;
}

export interface EventGatewayOptions {
  store: StateStore;
  channels: readonly string[];
  log: Logger;
}

/**
 * Bridges store channels to registered connections. Each channel is
 * subscribed once; every event goes to every connection on that channel and
 * clients filter by the session key the event carries.
 */
export class EventGateway {
  private readonly store: StateStore;
  private readonly log: Logger;
  private readonly connections = new Map<string, Map<string, GatewayConnection>>();
  private readonly streams: EventStream[] = [];
  private loops: Promise<void>[] = [];
  private started = false;

  constructor(options: EventGatewayOptions) {
    this.store = options.store;
    this.log = options.log;
    for (const channel of options.channels) {
      this.connections.set(channel, new Map());
    }
  }

  get channels(): string[] {
    return [...this.connections.keys()];
  }

  hasChannel(channel: string): boolean {
    return this.connections.has(channel);
  }

  /** Subscribes every channel or, on failure, none of them; a failed start can be retried. */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    try {
      for (const channel of this.connections.keys()) {
        const stream = await this.store.subscribe(channel);
        this.streams.push(stream);
        this.loops.push(this.forward(stream));
      }
    } catch (error) {
      await this.stop();
      throw error;
    }
    this.log.info({ channels: this.channels, backend: this.store.kind }, "event gateway started");
  }

  async stop(): Promise<void> {
    for (const stream of this.streams) stream.close();
    this.streams.length = 0;
    const loops = this.loops;
    this.loops = [];
    await Promise.all(loops);
    this.started = false;
  }

  register(channel: string, connection: GatewayConnection) {
    const registered = this.connections.get(channel);
    if (!registered) {
      throw new Error(`Unknown channel "${channel}"`);
    }
    registered.set(connection.id, connection);
    this.log.debug({ channel, connection: connection.id }, "connection registered");
  }

  unregister(channel: string, connectionId: string): boolean {
    const removed = this.connections.get(channel)?.delete(connectionId) ?? false;
    if (removed) {
      this.log.debug({ channel, connection: connectionId }, "connection unregistered");
    }
    return removed;
  }

  unregisterAll(connectionId: string) {
    for (const channel of this.connections.keys()) {
      this.unregister(channel, connectionId);
    }
  }

  stats(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const [channel, registered] of this.connections) {
      counts[channel] = registered.size;
    }
    return counts;
  }

  private async forward(stream: EventStream): Promise<void> {
    try {
      for await (const event of stream) {
        this.fanOut(event);
      }
    } catch (error) {
      this.log.error({ err: error, channel: stream.channel }, "event gateway loop failed");
    }
  }

  private fanOut(event: StoreEvent) {
    const registered = this.connections.get(event.channel);
    if (!registered || registered.size === 0) return;
    // snapshot so a connection leaving mid fan-out does not disturb iteration
    for (const connection of [...registered.values()]) {
      try {
        connection.send(event);
      } catch (error) {
        this.log.warn(
          { err: error, channel: event.channel, connection: connection.id, sequence: event.sequence },
          "delivery failed"
        );
      }
    }
  }
}
