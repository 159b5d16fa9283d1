import { z } from "zod";
import { jsonValueSchema, type JsonValue } from "../shared/events.js";

const gameSummarySchema = z.object({ id: z.string(), channel: z.string() });
const gameListSchema = z.object({ games: z.array(gameSummarySchema) });

const sessionSchema = z.object({
  sessionKey: z.string(),
  state: jsonValueSchema,
  updatedAt: z.number()
});

const mutationSchema = z.object({
  state: jsonValueSchema,
  updatedAt: z.number(),
  sequence: z.number().int()
});

export type GameSummaryDTO = z.infer<typeof gameSummarySchema>;
export type SessionDTO = z.infer<typeof sessionSchema>;
export type MutationDTO = z.infer<typeof mutationSchema>;

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code?: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export interface ApiClient {
  listGames(): Promise<GameSummaryDTO[]>;
  getSession(game: string, sessionKey: string): Promise<SessionDTO>;
  sendAction(game: string, sessionKey: string, action: JsonValue): Promise<MutationDTO>;
  endSession(game: string, sessionKey: string): Promise<void>;
}

function sessionPath(game: string, sessionKey: string) {
  return `/api/games/${encodeURIComponent(game)}/sessions/${encodeURIComponent(sessionKey)}`;
}

async function readError(res: Response): Promise<ApiError> {
  const body: unknown = await res.json().catch(() => ({}));
  const fields: object = typeof body === "object" && body !== null ? body : {};
  const message = "error" in fields && typeof fields.error === "string" ? fields.error : res.statusText;
  const code = "code" in fields && typeof fields.code === "string" ? fields.code : undefined;
  return new ApiError(message, res.status, code);
}

export function createApiClient(baseUrl: string, fetchImpl: typeof fetch = fetch): ApiClient {
  async function request(path: string, options: RequestInit = {}): Promise<Response> {
    const res = await fetchImpl(`${baseUrl}${path}`, {
      headers: {
        "Content-Type": "application/json"
      },
      ...options
    });
    if (!res.ok) throw await readError(res);
    return res;
  }

  return {
    async listGames() {
      const res = await request("/api/games");
      return gameListSchema.parse(await res.json()).games;
    },

    async getSession(game, sessionKey) {
      const res = await request(sessionPath(game, sessionKey));
      return sessionSchema.parse(await res.json());
    },

    async sendAction(game, sessionKey, action) {
      const res = await request(`${sessionPath(game, sessionKey)}/actions`, {
        method: "POST",
        body: JSON.stringify(action)
      });
      return mutationSchema.parse(await res.json());
    },

    async endSession(game, sessionKey) {
      await request(sessionPath(game, sessionKey), { method: "DELETE" });
    }
  };
}
