import { describe, it, expect } from "vitest";
import {
  applyScoreboardAction,
  scoreboardEngine,
  type ScoreboardState
} from "../../src/shared/engines/scoreboard.js";

const makeState = (): ScoreboardState => ({
  players: [
    { name: "Ann", score: 4 },
    { name: "Bo", score: 0 }
  ],
  round: 2
});

describe("scoreboard engine", () => {
  it("starts empty on round 1", () => {
    expect(scoreboardEngine.initialState()).toEqual({ players: [], round: 1 });
    expect(scoreboardEngine.channel).toBe("game:scoreboard");
  });

  it("adds a trimmed player with zero points", () => {
    const result = applyScoreboardAction(makeState(), { type: "add_player", name: "  Cy  " });
    expect(result).toEqual({
      ok: true,
      event: "add_player",
      state: {
        players: [
          { name: "Ann", score: 4 },
          { name: "Bo", score: 0 },
          { name: "Cy", score: 0 }
        ],
        round: 2
      }
    });
  });

  it("cuts long names to 32 characters", () => {
    const result = applyScoreboardAction({ players: [], round: 1 }, { type: "add_player", name: "x".repeat(40) });
    expect(result.ok && result.state.players[0].name).toBe("x".repeat(32));
  });

  it("rejects empty and duplicate names", () => {
    expect(applyScoreboardAction(makeState(), { type: "add_player", name: "   " })).toEqual({
      ok: false,
      reason: "Player name cannot be empty"
    });
    expect(applyScoreboardAction(makeState(), { type: "add_player", name: "Ann" })).toEqual({
      ok: false,
      reason: "Player Ann already exists"
    });
  });

  it("rejects a ninth player", () => {
    const full: ScoreboardState = {
      players: Array.from({ length: 8 }, (_, i) => ({ name: `p${i}`, score: 0 })),
      round: 1
    };
    expect(applyScoreboardAction(full, { type: "add_player", name: "late" })).toEqual({
      ok: false,
      reason: "Scoreboard is full"
    });
  });

  it("adds points to the named player only", () => {
    const result = applyScoreboardAction(makeState(), { type: "add_points", name: "Bo", points: 9 });
    expect(result.ok && result.state.players).toEqual([
      { name: "Ann", score: 4 },
      { name: "Bo", score: 9 }
    ]);
  });

  it("rejects points and removal for unknown players", () => {
    expect(applyScoreboardAction(makeState(), { type: "add_points", name: "Zed", points: 1 })).toEqual({
      ok: false,
      reason: "Player Zed not found"
    });
    expect(applyScoreboardAction(makeState(), { type: "remove_player", name: "Zed" })).toEqual({
      ok: false,
      reason: "Player Zed not found"
    });
  });

  it("removes a player", () => {
    const result = applyScoreboardAction(makeState(), { type: "remove_player", name: "Ann" });
    expect(result.ok && result.state.players).toEqual([{ name: "Bo", score: 0 }]);
  });

  it("advances rounds and resets scores while keeping players", () => {
    const advanced = applyScoreboardAction(makeState(), { type: "next_round" });
    expect(advanced.ok && advanced.state.round).toBe(3);
    const reset = applyScoreboardAction(makeState(), { type: "reset" });
    expect(reset).toEqual({
      ok: true,
      event: "reset",
      state: {
        players: [
          { name: "Ann", score: 0 },
          { name: "Bo", score: 0 }
        ],
        round: 1
      }
    });
  });

  it("does not modify the state it was given", () => {
    const state = makeState();
    applyScoreboardAction(state, { type: "add_points", name: "Ann", points: 1 });
    expect(state).toEqual(makeState());
  });

  it("validates raw actions", () => {
    expect(scoreboardEngine.actionSchema.safeParse({ type: "add_points", name: "Ann", points: 1.5 }).success).toBe(false);
    expect(scoreboardEngine.actionSchema.safeParse({ type: "fly" }).success).toBe(false);
    expect(scoreboardEngine.actionSchema.parse({ type: "reset", extra: true })).toEqual({ type: "reset" });
  });
});
