import { z } from "zod";
import { jsonValueSchema, type JsonValue, type StoreEvent } from "../../shared/events.js";
import type { EventStream } from "./eventStream.js";

export type { JsonValue, StoreEvent };

export type BackendKind = "local" | "shared";

const storedSnapshotSchema = z.object({
  value: jsonValueSchema,
  updatedAt: z.number()
});

export type StoredSnapshot = z.infer<typeof storedSnapshotSchema>;

export interface CommitResult {
  snapshot: StoredSnapshot;
  sequence: number;
}

/**
 * Truth-state store for live sessions. Both backends honour the same contract:
 * an absent key reads as `undefined`, writes overwrite unconditionally, and
 * each channel's published events carry strictly increasing sequence numbers.
 */
export interface StateStore {
  readonly kind: BackendKind;
  get(key: string): Promise<StoredSnapshot | undefined>;
  set(key: string, value: JsonValue): Promise<StoredSnapshot>;
  delete(key: string): Promise<boolean>;
  /**
   * Writes a snapshot and publishes its event as one step. When it rejects,
   * neither the snapshot nor the channel counter has changed.
   */
  commit(
    key: string,
    value: JsonValue,
    channel: string,
    sessionKey: string,
    payload: JsonValue
  ): Promise<CommitResult>;
  /**
   * Deletes a snapshot and publishes `payload` as one step. Resolves with the
   * event's sequence, or `undefined` when there was nothing to delete and
   * nothing was published.
   */
  discard(
    key: string,
    channel: string,
    sessionKey: string,
    payload: JsonValue
  ): Promise<number | undefined>;
  /** Resolves with the assigned sequence once the event is handed off; never waits on subscribers. */
  publish(channel: string, sessionKey: string, payload: JsonValue): Promise<number>;
  /** Resolves once the subscription is live. Events published earlier are not replayed. */
  subscribe(channel: string): Promise<EventStream>;
  close(): Promise<void>;
}

export function serializeSnapshot(snapshot: StoredSnapshot): string {
  return JSON.stringify(snapshot);
}

export function deserializeSnapshot(raw: string): StoredSnapshot {
  return storedSnapshotSchema.parse(JSON.parse(raw));
}
