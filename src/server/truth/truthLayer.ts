import type { AppConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { EventGateway } from "./eventGateway.js";
import { KeyedLock } from "./keyedLock.js";
import { LocalStateStore } from "./localStore.js";
import { SessionPipeline } from "./pipeline.js";
import { connectSharedStateStore } from "./sharedStore.js";
import type { StateStore } from "./stateStore.js";

export type TruthLayerConfig = Pick<
  AppConfig,
  "REDIS_URL" | "REDIS_KEY_PREFIX" | "GAME_CHANNELS" | "LOCK_TIMEOUT_MS"
>;

/** Picks the backend once: a Redis URL selects the shared store, otherwise local. */
export async function createStateStore(config: TruthLayerConfig, log: Logger): Promise<StateStore> {
  const storeLog = log.child({ component: "state-store" });
  if (config.REDIS_URL) {
    const store = await connectSharedStateStore(config.REDIS_URL, config.REDIS_KEY_PREFIX, storeLog);
    storeLog.info({ backend: store.kind }, "using shared state store");
    return store;
  }
  storeLog.info({ backend: "local" }, "using in-process state store");
  return new LocalStateStore(storeLog);
}

/**
 * Owns everything live sessions depend on. Built once at startup and handed to
 * the HTTP and socket layers.
 */
export class TruthLayer {
  readonly lock: KeyedLock;
  readonly gateway: EventGateway;
  readonly pipeline: SessionPipeline;

  constructor(
    readonly store: StateStore,
    channels: readonly string[],
    lockTimeoutMs: number,
    log: Logger
  ) {
    this.lock = new KeyedLock({ defaultTimeoutMs: lockTimeoutMs });
    this.gateway = new EventGateway({
      store,
      channels,
      log: log.child({ component: "event-gateway" })
    });
    this.pipeline = new SessionPipeline(store, this.lock, log.child({ component: "pipeline" }));
  }

  start(): Promise<void> {
    return this.gateway.start();
  }

  async close(): Promise<void> {
    await this.gateway.stop();
    await this.store.close();
  }
}

export async function createTruthLayer(config: TruthLayerConfig, log: Logger): Promise<TruthLayer> {
  const store = await createStateStore(config, log);
  return new TruthLayer(store, config.GAME_CHANNELS, config.LOCK_TIMEOUT_MS, log);
}
