import type { GameEngine } from "../engine.js";
import { scoreboardEngine } from "./scoreboard.js";

export { scoreboardEngine };
export type { ScoreboardAction, ScoreboardState } from "./scoreboard.js";

export const DEFAULT_ENGINES: readonly GameEngine[] = [scoreboardEngine];
