import { z } from "zod";
import { LOG_LEVELS } from "./logger.js";

const channelList = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean)
  )
  .pipe(z.array(z.string().regex(/^game:[a-z0-9_-]+$/i, "channel must look like game:<id>")).min(1))
  .transform((channels) => [...new Set(channels)]);

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().nonnegative().default(4000),
  REDIS_URL: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined))
    .pipe(z.string().url().optional()),
  REDIS_KEY_PREFIX: z.string().default("boardgames:"),
  GAME_CHANNELS: channelList.default("game:scoreboard"),
  LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  CORS_ORIGIN: z.string().default("*")
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return ConfigSchema.parse(env);
}
