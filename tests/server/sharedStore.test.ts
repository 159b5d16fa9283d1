import { describe, it, expect, beforeEach } from "vitest";
import { BackendUnavailableError } from "../../src/server/errors.js";
import { SharedStateStore } from "../../src/server/truth/sharedStore.js";
import { FakeRedisServer, type FakeSubscriber } from "../helpers/fakeRedis.js";

describe("SharedStateStore", () => {
  let redis: FakeRedisServer;

  const connect = (subscriber: FakeSubscriber = redis.subscriberClient()) =>
    new SharedStateStore({
      client: redis.commandClient(),
      subscriber,
      keyPrefix: "bg:",
      now: () => 42
    });

  beforeEach(() => {
    redis = new FakeRedisServer();
  });

  it("stores snapshots under the prefixed state key", async () => {
    const store = connect();
    await store.set("game:cabo/g1", { round: 3 });
    expect(redis.data.get("bg:state:game:cabo/g1")).toBe('{"value":{"round":3},"updatedAt":42}');
    await store.close();
  });

  it("keeps the channel counter in Redis so every process shares one sequence", async () => {
    const processA = connect();
    const processB = connect();
    expect(await processA.publish("game:cabo", "g1", "a")).toBe(1);
    expect(await processB.publish("game:cabo", "g1", "b")).toBe(2);
    expect(redis.data.get("bg:seq:game:cabo")).toBe("2");
    await processA.close();
    await processB.close();
  });

  it("shares state written by one process with another", async () => {
    const processA = connect();
    const processB = connect();
    await processA.set("game:flip7/g9", { deck: 94 });
    expect((await processB.get("game:flip7/g9"))?.value).toEqual({ deck: 94 });
    await processA.close();
    await processB.close();
  });

  it("delivers an event once to every process, including the publisher", async () => {
    const processA = connect();
    const processB = connect();
    const streamA = await processA.subscribe("game:cabo");
    const streamB = await processB.subscribe("game:cabo");

    await processB.publish("game:cabo", "g1", { event: "draw" });
    await processA.publish("game:cabo", "g1", { event: "swap" });

    const seenA = [await streamA.next(), await streamA.next()].map((r) => r.value?.sequence);
    const seenB = [await streamB.next(), await streamB.next()].map((r) => r.value?.sequence);
    expect(seenA).toEqual([1, 2]);
    expect(seenB).toEqual([1, 2]);

    await processA.close();
    await processB.close();
  });

  it("surfaces a dead connection as BackendUnavailable rather than an absent value", async () => {
    const store = connect();
    redis.down = true;
    await expect(store.get("game:cabo/g1")).rejects.toBeInstanceOf(BackendUnavailableError);
    await expect(store.set("game:cabo/g1", 1)).rejects.toBeInstanceOf(BackendUnavailableError);
    await expect(store.publish("game:cabo", "g1", 1)).rejects.toMatchObject({
      code: "BACKEND_UNAVAILABLE"
    });
    await expect(store.subscribe("game:cabo")).rejects.toBeInstanceOf(BackendUnavailableError);
    redis.down = false;
    await store.close();
  });

  it("writes the snapshot and bumps the counter in one script", async () => {
    const store = connect();
    const result = await store.commit("game:cabo/g1", { round: 3 }, "game:cabo", "g1", { event: "draw" });
    expect(result.sequence).toBe(1);
    expect(redis.data.get("bg:state:game:cabo/g1")).toBe('{"value":{"round":3},"updatedAt":42}');
    expect(redis.data.get("bg:seq:game:cabo")).toBe("1");
    await store.close();
  });

  it("leaves the snapshot and counter untouched when the commit script fails", async () => {
    const store = connect();
    await store.set("game:cabo/g1", { round: 1 });
    redis.scriptsFail = true;

    await expect(
      store.commit("game:cabo/g1", { round: 2 }, "game:cabo", "g1", { event: "draw" })
    ).rejects.toBeInstanceOf(BackendUnavailableError);
    expect(redis.data.get("bg:state:game:cabo/g1")).toBe('{"value":{"round":1},"updatedAt":42}');
    expect(redis.data.has("bg:seq:game:cabo")).toBe(false);

    redis.scriptsFail = false;
    await store.close();
  });

  it("drops malformed pub/sub messages and keeps delivering", async () => {
    const subscriber = redis.subscriberClient();
    const store = connect(subscriber);
    const stream = await store.subscribe("game:cabo");

    subscriber.deliver("bg:game:cabo", "not-a-sequence");
    subscriber.deliver("bg:game:cabo", '7:{"sessionKey":"g1"}');
    await store.publish("game:cabo", "g1", "ok");

    const result = await stream.next();
    expect(result.value).toEqual({ channel: "game:cabo", sessionKey: "g1", payload: "ok", sequence: 1 });
    await store.close();
  });

  it("unsubscribes from Redis once the last stream on a channel closes", async () => {
    const subscriber = redis.subscriberClient();
    const store = connect(subscriber);
    const first = await store.subscribe("game:cabo");
    const second = await store.subscribe("game:cabo");
    expect(subscriber.channels.has("bg:game:cabo")).toBe(true);

    first.close();
    expect(subscriber.channels.has("bg:game:cabo")).toBe(true);
    second.close();
    await new Promise((resolve) => setImmediate(resolve));
    expect(subscriber.channels.has("bg:game:cabo")).toBe(false);
    await store.close();
  });
});
