import { describe, it, expect } from "vitest";
import { ApiError, createApiClient } from "../../src/network/api.js";

interface RecordedCall {
  url: string;
  method: string;
  body: unknown;
}

function stubFetch(response: () => Response) {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method ?? "GET",
      body: init?.body
    });
    return response();
  };
  return { calls, fetchImpl };
}

describe("createApiClient", () => {
  it("escapes path segments and posts the action as JSON", async () => {
    const { calls, fetchImpl } = stubFetch(() =>
      Response.json({ state: { round: 2 }, updatedAt: 10, sequence: 4 })
    );
    const api = createApiClient("http://game.test", fetchImpl);

    const result = await api.sendAction("scoreboard", "table 1/a", { type: "next_round" });

    expect(result).toEqual({ state: { round: 2 }, updatedAt: 10, sequence: 4 });
    expect(calls).toEqual([
      {
        url: "http://game.test/api/games/scoreboard/sessions/table%201%2Fa/actions",
        method: "POST",
        body: '{"type":"next_round"}'
      }
    ]);
  });

  it("carries the server's message and code on failures", async () => {
    const { fetchImpl } = stubFetch(() =>
      Response.json({ error: "Player Zed not found", code: "ENGINE_REJECTED" }, { status: 422 })
    );
    const api = createApiClient("http://game.test", fetchImpl);

    await expect(api.sendAction("scoreboard", "t1", { type: "reset" })).rejects.toMatchObject({
      name: "ApiError",
      message: "Player Zed not found",
      status: 422,
      code: "ENGINE_REJECTED"
    });
  });

  it("falls back to the status text when the error body is not JSON", async () => {
    const { fetchImpl } = stubFetch(
      () => new Response("upstream down", { status: 502, statusText: "Bad Gateway" })
    );
    const api = createApiClient("http://game.test", fetchImpl);

    const error = await api.listGames().catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ message: "Bad Gateway", status: 502, code: undefined });
  });

  it("rejects responses that do not match the expected shape", async () => {
    const { fetchImpl } = stubFetch(() => Response.json({ games: [{ id: 7 }] }));
    const api = createApiClient("http://game.test", fetchImpl);
    await expect(api.listGames()).rejects.toThrow();
  });
});
