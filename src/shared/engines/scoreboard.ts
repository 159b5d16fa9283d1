import { z } from "zod";
import { accept, channelForGame, reject, type EngineResult, type GameEngine } from "../engine.js";

const MAX_PLAYERS = 8;
const MAX_NAME_LENGTH = 32;

const scoreboardStateSchema = z.object({
  players: z.array(z.object({ name: z.string(), score: z.number().int() })),
  round: z.number().int().positive()
});

export type ScoreboardState = z.infer<typeof scoreboardStateSchema>;

const nameField = z.string();

const scoreboardActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("add_player"), name: nameField }),
  z.object({ type: z.literal("remove_player"), name: nameField }),
  z.object({ type: z.literal("add_points"), name: nameField, points: z.number().int() }),
  z.object({ type: z.literal("next_round") }),
  z.object({ type: z.literal("reset") })
]);

export type ScoreboardAction = z.infer<typeof scoreboardActionSchema>;

function sanitizeName(raw: string): string {
  return raw.trim().slice(0, MAX_NAME_LENGTH);
}

function findPlayer(state: ScoreboardState, name: string) {
  const wanted = sanitizeName(name);
  return state.players.findIndex((player) => player.name === wanted);
}

export function applyScoreboardAction(
  state: ScoreboardState,
  action: ScoreboardAction
): EngineResult<ScoreboardState> {
  switch (action.type) {
    case "add_player": {
      const name = sanitizeName(action.name);
      if (!name) return reject("Player name cannot be empty");
      if (findPlayer(state, name) !== -1) return reject(`Player ${name} already exists`);
      if (state.players.length >= MAX_PLAYERS) return reject("Scoreboard is full");
      return accept({ ...state, players: [...state.players, { name, score: 0 }] }, "add_player");
    }
    case "remove_player": {
      const idx = findPlayer(state, action.name);
      if (idx === -1) return reject(`Player ${sanitizeName(action.name)} not found`);
      return accept(
        { ...state, players: state.players.filter((_, i) => i !== idx) },
        "remove_player"
      );
    }
    case "add_points": {
      const idx = findPlayer(state, action.name);
      if (idx === -1) return reject(`Player ${sanitizeName(action.name)} not found`);
      const players = state.players.map((player, i) =>
        i === idx ? { ...player, score: player.score + action.points } : player
      );
      return accept({ ...state, players }, "add_points");
    }
    case "next_round":
      return accept({ ...state, round: state.round + 1 }, "next_round");
    case "reset":
      return accept(
        { players: state.players.map((player) => ({ ...player, score: 0 })), round: 1 },
        "reset"
      );
  }
}

export const scoreboardEngine: GameEngine<ScoreboardState, ScoreboardAction> = {
  id: "scoreboard",
  channel: channelForGame("scoreboard"),
  actionSchema: scoreboardActionSchema,
  stateSchema: scoreboardStateSchema,
  initialState: () => ({ players: [], round: 1 }),
  apply: applyScoreboardAction
};
