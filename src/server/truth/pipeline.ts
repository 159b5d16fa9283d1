import type { GameEngine } from "../../shared/engine.js";
import type { JsonValue } from "../../shared/events.js";
import { EngineRejectedError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { KeyedLock } from "./keyedLock.js";
import type { StateStore } from "./stateStore.js";

export interface MutationResult<State> {
  state: State;
  updatedAt: number;
  sequence: number;
}

export interface SessionView<State> {
  state: State;
  updatedAt: number;
}

/** Session keys are unique per channel only, so store and lock keys carry the channel. */
export function sessionStoreKey(channel: string, sessionKey: string): string {
  return `${channel}/${sessionKey}`;
}

/**
 * The lock → read → transition → commit → release discipline every
 * route handler goes through. Holds no state of its own.
 */
export class SessionPipeline {
  constructor(
    private readonly store: StateStore,
    private readonly lock: KeyedLock,
    private readonly log: Logger
  ) {}

  async mutate<State extends JsonValue, Action>(
    engine: GameEngine<State, Action>,
    sessionKey: string,
    action: Action
  ): Promise<MutationResult<State>> {
    const key = sessionStoreKey(engine.channel, sessionKey);
    return this.lock.runExclusive(key, async () => {
      const current = await this.store.get(key);
      const state = current ? engine.stateSchema.parse(current.value) : engine.initialState();
      const result = engine.apply(state, action);
      if (!result.ok) {
        this.log.debug({ game: engine.id, sessionKey, reason: result.reason }, "action rejected");
        throw new EngineRejectedError(result.reason);
      }
      const payload = { game: engine.id, event: result.event, state: result.state };
      const { snapshot, sequence } = await this.store.commit(
        key,
        result.state,
        engine.channel,
        sessionKey,
        payload
      );
      this.log.debug({ game: engine.id, sessionKey, event: result.event, sequence }, "session mutated");
      return { state: result.state, updatedAt: snapshot.updatedAt, sequence };
    });
  }

  /** Last written snapshot; readers never take the lock. */
  async read<State extends JsonValue, Action>(
    engine: GameEngine<State, Action>,
    sessionKey: string
  ): Promise<SessionView<State> | undefined> {
    const current = await this.store.get(sessionStoreKey(engine.channel, sessionKey));
    if (!current) return undefined;
    return { state: engine.stateSchema.parse(current.value), updatedAt: current.updatedAt };
  }

  /** Removes the session's snapshot. Returns false when there was nothing to remove. */
  async teardown<State extends JsonValue, Action>(
    engine: GameEngine<State, Action>,
    sessionKey: string
  ): Promise<boolean> {
    const key = sessionStoreKey(engine.channel, sessionKey);
    return this.lock.runExclusive(key, async () => {
      const sequence = await this.store.discard(key, engine.channel, sessionKey, {
        game: engine.id,
        event: "teardown"
      });
      if (sequence === undefined) return false;
      this.log.info({ game: engine.id, sessionKey, sequence }, "session torn down");
      return true;
    });
  }
}
