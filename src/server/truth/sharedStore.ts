import { Redis } from "ioredis";
import { z } from "zod";
import { jsonValueSchema } from "../../shared/events.js";
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

/** The slice of an ioredis client the store issues commands through. */
export interface RedisCommandClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  eval(script: string, numkeys: number, ...args: string[]): Promise<unknown>;
  quit(): Promise<unknown>;
}

/** The slice of an ioredis client held in subscriber mode. */
export interface RedisSubscriberClient {
  subscribe(...channels: string[]): Promise<unknown>;
  unsubscribe(...channels: string[]): Promise<unknown>;
  on(event: "message", listener: (channel: string, message: string) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  quit(): Promise<unknown>;
}

export interface SharedStateStoreOptions {
  client: RedisCommandClient;
  subscriber: RedisSubscriberClient;
  keyPrefix: string;
  log?: Logger;
  now?: () => number;
}

// Sequence assignment and delivery happen in one script so that every
// subscriber, in every process, sees a channel's sequences in increasing order.
const PUBLISH_SCRIPT = `
local seq = redis.call("INCR", KEYS[1])
redis.call("PUBLISH", ARGV[1], seq .. ":" .. ARGV[2])
return seq
`;

// Same as PUBLISH_SCRIPT with the snapshot write folded in, so a failed commit
// leaves neither a stored snapshot without its event nor an event without it.
const COMMIT_SCRIPT = `
redis.call("SET", KEYS[2], ARGV[3])
local seq = redis.call("INCR", KEYS[1])
redis.call("PUBLISH", ARGV[1], seq .. ":" .. ARGV[2])
return seq
`;

// Publishes only when the delete removed something; replies 0 otherwise.
const DISCARD_SCRIPT = `
if redis.call("DEL", KEYS[2]) == 0 then return 0 end
local seq = redis.call("INCR", KEYS[1])
redis.call("PUBLISH", ARGV[1], seq .. ":" .. ARGV[2])
return seq
`;

const messageBodySchema = z.object({
  sessionKey: z.string(),
  payload: jsonValueSchema
});

/**
 * Multi-process backend on Redis. Snapshots live under `<prefix>state:<key>`
 * and channel counters under `<prefix>seq:<channel>`. Pub/sub channels are
 * namespaced with the same prefix.
 */
export class SharedStateStore implements StateStore {
  readonly kind = "shared" as const;

  private readonly client: RedisCommandClient;
  private readonly subscriber: RedisSubscriberClient;
  private readonly keyPrefix: string;
  private readonly log?: Logger;
  private readonly now: () => number;
  private readonly streams = new Map<string, Set<EventStream>>();
  private closed = false;

  constructor(options: SharedStateStoreOptions) {
    this.client = options.client;
    this.subscriber = options.subscriber;
    this.keyPrefix = options.keyPrefix;
    this.log = options.log;
    this.now = options.now ?? Date.now;

    this.subscriber.on("message", (redisChannel, message) => {
      this.dispatch(redisChannel, message);
    });
    this.subscriber.on("error", (error) => {
      this.log?.error({ err: error }, "redis subscriber error");
    });
  }

  async get(key: string): Promise<StoredSnapshot | undefined> {
    const raw = await this.call("get", () => this.client.get(this.stateKey(key)));
    return raw === null ? undefined : deserializeSnapshot(raw);
  }

  async set(key: string, value: JsonValue): Promise<StoredSnapshot> {
    const snapshot: StoredSnapshot = { value, updatedAt: this.now() };
    await this.call("set", () => this.client.set(this.stateKey(key), serializeSnapshot(snapshot)));
    return deserializeSnapshot(serializeSnapshot(snapshot));
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.call("delete", () => this.client.del(this.stateKey(key)));
    return removed > 0;
  }

  async commit(
    key: string,
    value: JsonValue,
    channel: string,
    sessionKey: string,
    payload: JsonValue
  ): Promise<CommitResult> {
    const snapshot: StoredSnapshot = { value, updatedAt: this.now() };
    const serialized = serializeSnapshot(snapshot);
    const body = JSON.stringify({ sessionKey, payload });
    const result = await this.call("commit", () =>
      this.client.eval(
        COMMIT_SCRIPT,
        2,
        this.sequenceKey(channel),
        this.stateKey(key),
        this.pubsubChannel(channel),
        body,
        serialized
      )
    );
    return { snapshot: deserializeSnapshot(serialized), sequence: toSequence("commit", result) };
  }

  async discard(
    key: string,
    channel: string,
    sessionKey: string,
    payload: JsonValue
  ): Promise<number | undefined> {
    const body = JSON.stringify({ sessionKey, payload });
    const result = await this.call("discard", () =>
      this.client.eval(
        DISCARD_SCRIPT,
        2,
        this.sequenceKey(channel),
        this.stateKey(key),
        this.pubsubChannel(channel),
        body
      )
    );
    return Number(result) === 0 ? undefined : toSequence("discard", result);
  }

  async publish(channel: string, sessionKey: string, payload: JsonValue): Promise<number> {
    const body = JSON.stringify({ sessionKey, payload });
    const result = await this.call("publish", () =>
      this.client.eval(PUBLISH_SCRIPT, 1, this.sequenceKey(channel), this.pubsubChannel(channel), body)
    );
    return toSequence("publish", result);
  }

  async subscribe(channel: string): Promise<EventStream> {
    this.assertOpen("subscribe");
    const existing = this.streams.get(channel);
    if (!existing) {
      await this.call("subscribe", () => this.subscriber.subscribe(this.pubsubChannel(channel)));
    }
    const stream = new EventStream(channel, (closing) => this.detach(closing));
    const subscribers = this.streams.get(channel) ?? new Set<EventStream>();
    subscribers.add(stream);
    this.streams.set(channel, subscribers);
    return stream;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    for (const subscribers of [...this.streams.values()]) {
      for (const stream of [...subscribers]) stream.close();
    }
    this.closed = true;
    this.streams.clear();
    const results = await Promise.allSettled([this.subscriber.quit(), this.client.quit()]);
    for (const result of results) {
      if (result.status === "rejected") {
        this.log?.warn({ err: result.reason }, "redis quit failed");
      }
    }
  }

  private dispatch(redisChannel: string, message: string) {
    if (!redisChannel.startsWith(this.keyPrefix)) return;
    const channel = redisChannel.slice(this.keyPrefix.length);
    const subscribers = this.streams.get(channel);
    if (!subscribers || subscribers.size === 0) return;

    const separator = message.indexOf(":");
    const sequence = Number(message.slice(0, separator));
    let body: z.infer<typeof messageBodySchema>;
    try {
      if (separator <= 0 || !Number.isInteger(sequence)) throw new Error("missing sequence prefix");
      body = messageBodySchema.parse(JSON.parse(message.slice(separator + 1)));
    } catch (error) {
      this.log?.warn({ err: error, channel }, "dropping malformed pub/sub message");
      return;
    }
    for (const stream of subscribers) {
      stream.push({ channel, sessionKey: body.sessionKey, payload: body.payload, sequence });
    }
  }

  private detach(stream: EventStream) {
    const subscribers = this.streams.get(stream.channel);
    if (!subscribers) return;
    subscribers.delete(stream);
    if (subscribers.size > 0) return;
    this.streams.delete(stream.channel);
    if (this.closed) return;
    this.subscriber.unsubscribe(this.pubsubChannel(stream.channel)).catch((error: unknown) => {
      this.log?.warn({ err: error, channel: stream.channel }, "redis unsubscribe failed");
    });
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    this.assertOpen(operation);
    try {
      return await fn();
    } catch (error) {
      throw new BackendUnavailableError(operation, error);
    }
  }

  private assertOpen(operation: string) {
    if (this.closed) {
      throw new BackendUnavailableError(operation, new Error("store is closed"));
    }
  }

  private stateKey(key: string) {
    return `${this.keyPrefix}state:${key}`;
  }

  private sequenceKey(channel: string) {
    return `${this.keyPrefix}seq:${channel}`;
  }

  private pubsubChannel(channel: string) {
    return `${this.keyPrefix}${channel}`;
  }
}

function toSequence(operation: string, reply: unknown): number {
  const sequence = Number(reply);
  if (!Number.isInteger(sequence) || sequence < 1) {
    throw new BackendUnavailableError(operation, new Error(`unexpected sequence reply ${String(reply)}`));
  }
  return sequence;
}

/**
 * Opens the command and subscriber connections. Offline queueing is disabled
 * so a dropped connection fails calls immediately instead of stalling them.
 */
export async function connectSharedStateStore(
  url: string,
  keyPrefix: string,
  log?: Logger
): Promise<SharedStateStore> {
  const client = new Redis(url, {
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1
  });
  const subscriber = client.duplicate();
  client.on("error", (error: Error) => {
    log?.error({ err: error }, "redis client error");
  });
  try {
    await Promise.all([client.connect(), subscriber.connect()]);
  } catch (error) {
    client.disconnect();
    subscriber.disconnect();
    throw new BackendUnavailableError("connect", error);
  }
  return new SharedStateStore({ client, subscriber, keyPrefix, log });
}
