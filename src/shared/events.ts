import { z } from "zod";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

export const storeEventSchema = z.object({
  channel: z.string(),
  sessionKey: z.string(),
  payload: jsonValueSchema,
  sequence: z.number().int().positive()
});

/** One state-change notification on a channel. */
export type StoreEvent = z.infer<typeof storeEventSchema>;

export interface ServerToClientEvents {
  state_update: (event: StoreEvent) => void;
  "session:error": (payload: { message: string }) => void;
}

export interface ClientToServerEvents {
  "session:leave": () => void;
}

export interface SessionHandshake {
  game: string;
  sessionKey: string;
}

export function parseJsonValue(raw: string): JsonValue {
  return jsonValueSchema.parse(JSON.parse(raw));
}
