import { parseJsonValue } from "../../shared/events.js";
import { BackendUnavailableError } from "../errors.js";
import type { Logger } from "../logger.js";
import { EventStream } from "./eventStream.js";
import {
  deserializeSnapshot,
  serializeSnapshot,
  type CommitResult,
  type JsonValue,
  type StateStore,
  type StoredSnapshot
} from "./stateStore.js";

/**
 * Single-process backend. Snapshots are kept serialized so a caller mutating a
 * value it read can never reach into the stored copy. Lost on restart.
 */
export class LocalStateStore implements StateStore {
  readonly kind = "local" as const;

  private readonly data = new Map<string, string>();
  private readonly sequences = new Map<string, number>();
  private readonly streams = new Map<string, Set<EventStream>>();
  private closed = false;

  constructor(
    private readonly log?: Logger,
    private readonly now: () => number = Date.now
  ) {}

  async get(key: string): Promise<StoredSnapshot | undefined> {
    this.assertOpen("get");
    const raw = this.data.get(key);
    return raw === undefined ? undefined : deserializeSnapshot(raw);
  }

  async set(key: string, value: JsonValue): Promise<StoredSnapshot> {
    this.assertOpen("set");
    return this.write(key, value);
  }

  // both steps are synchronous, so no failure can fall between them
  async commit(
    key: string,
    value: JsonValue,
    channel: string,
    sessionKey: string,
    payload: JsonValue
  ): Promise<CommitResult> {
    this.assertOpen("commit");
    const snapshot = this.write(key, value);
    const sequence = this.deliver(channel, sessionKey, payload);
    return { snapshot, sequence };
  }

  async discard(
    key: string,
    channel: string,
    sessionKey: string,
    payload: JsonValue
  ): Promise<number | undefined> {
    this.assertOpen("discard");
    if (!this.data.delete(key)) return undefined;
    return this.deliver(channel, sessionKey, payload);
  }

  async delete(key: string): Promise<boolean> {
    this.assertOpen("delete");
    return this.data.delete(key);
  }

  async publish(channel: string, sessionKey: string, payload: JsonValue): Promise<number> {
    this.assertOpen("publish");
    return this.deliver(channel, sessionKey, payload);
  }

  async subscribe(channel: string): Promise<EventStream> {
    this.assertOpen("subscribe");
    const stream = new EventStream(channel, (closing) => this.detach(closing));
    const subscribers = this.streams.get(channel) ?? new Set<EventStream>();
    subscribers.add(stream);
    this.streams.set(channel, subscribers);
    return stream;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const subscribers of [...this.streams.values()]) {
      for (const stream of [...subscribers]) stream.close();
    }
    this.streams.clear();
    this.data.clear();
  }

  private write(key: string, value: JsonValue): StoredSnapshot {
    const raw = serializeSnapshot({ value, updatedAt: this.now() });
    this.data.set(key, raw);
    return deserializeSnapshot(raw);
  }

  private deliver(channel: string, sessionKey: string, payload: JsonValue): number {
    const sequence = (this.sequences.get(channel) ?? 0) + 1;
    this.sequences.set(channel, sequence);
    const subscribers = this.streams.get(channel);
    if (!subscribers || subscribers.size === 0) return sequence;
    const serialized = JSON.stringify(payload);
    for (const stream of subscribers) {
      stream.push({ channel, sessionKey, payload: parseJsonValue(serialized), sequence });
    }
    this.log?.debug({ channel, sequence, subscribers: subscribers.size }, "local publish");
    return sequence;
  }

  private detach(stream: EventStream) {
    const subscribers = this.streams.get(stream.channel);
    if (!subscribers) return;
    subscribers.delete(stream);
    if (subscribers.size === 0) this.streams.delete(stream.channel);
  }

  private assertOpen(operation: string) {
    if (this.closed) {
      throw new BackendUnavailableError(operation, new Error("store is closed"));
    }
  }
}
