import type { z } from "zod";
import type { JsonValue } from "./events.js";

export type EngineResult<State> =
  | { ok: true; state: State; event: string }
  | { ok: false; reason: string };

/**
 * A game's rules as pure functions over its session state. Engines know
 * nothing about locks, channels or backends.
 */
export interface GameEngine<State extends JsonValue = JsonValue, Action = unknown> {
  readonly id: string;
  readonly channel: string;
  readonly actionSchema: z.ZodType<Action, z.ZodTypeDef, unknown>;
  /** Validates a stored snapshot back into this engine's state. */
  readonly stateSchema: z.ZodType<State, z.ZodTypeDef, unknown>;
  initialState(): State;
  apply(state: State, action: Action): EngineResult<State>;
}

export function channelForGame(gameId: string): string {
  return `game:${gameId}`;
}

export function accept<State>(state: State, event: string): EngineResult<State> {
  return { ok: true, state, event };
}

export function reject<State>(reason: string): EngineResult<State> {
  return { ok: false, reason };
}
