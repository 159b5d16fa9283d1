import "dotenv/config";
import cors from "cors";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import { createServer } from "http";
import type { Server as HttpServer } from "http";
import { Server as SocketIOServer } from "socket.io";
import { pathToFileURL } from "url";
import type { GameEngine } from "../shared/engine.js";
import type { ClientToServerEvents, ServerToClientEvents } from "../shared/events.js";
import { DEFAULT_ENGINES } from "../shared/engines/index.js";
import { loadConfig } from "./config.js";
import { BackendUnavailableError, EngineRejectedError, LockTimeoutError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { createTruthLayer, type TruthLayer } from "./truth/truthLayer.js";

interface BackendOptions {
  truth: TruthLayer;
  engines: readonly GameEngine[];
  log: Logger;
  corsOrigin?: string;
}

type ExpressApp = ReturnType<typeof express>;
type GameSocketServer = SocketIOServer<ClientToServerEvents, ServerToClientEvents>;

export function initializeBackend(app: ExpressApp, httpServer: HttpServer, options: BackendOptions) {
  const engines = indexEngines(options.engines, options.truth);
  const origin = options.corsOrigin ?? "*";
  app.use(cors({ origin }));
  app.use(express.json());

  const io: GameSocketServer = new SocketIOServer(httpServer, {
    cors: {
      origin,
      methods: ["GET", "POST", "DELETE"]
    }
  });

  registerHttpRoutes(app, engines, options);
  registerSocketHandlers(io, engines, options);

  return { io };
}

function indexEngines(engines: readonly GameEngine[], truth: TruthLayer): Map<string, GameEngine> {
  const byId = new Map<string, GameEngine>();
  for (const engine of engines) {
    if (byId.has(engine.id)) {
      throw new Error(`Duplicate engine id "${engine.id}"`);
    }
    if (!truth.gateway.hasChannel(engine.channel)) {
      throw new Error(
        `Engine "${engine.id}" publishes on ${engine.channel}, which is not in GAME_CHANNELS`
      );
    }
    byId.set(engine.id, engine);
  }
  return byId;
}

function registerHttpRoutes(app: ExpressApp, engines: Map<string, GameEngine>, options: BackendOptions) {
  const { truth, log } = options;

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", backend: truth.store.kind, channels: truth.gateway.stats() });
  });

  app.get("/api/games", (_req: Request, res: Response) => {
    res.json({
      games: [...engines.values()].map((engine) => ({ id: engine.id, channel: engine.channel }))
    });
  });

  app.get(
    "/api/games/:game/sessions/:sessionKey",
    route(async (req, res) => {
      const engine = engines.get(req.params.game);
      if (!engine) return res.status(404).json({ error: "Game not found" });
      const session = await truth.pipeline.read(engine, req.params.sessionKey);
      if (!session) return res.status(404).json({ error: "Session not found" });
      res.json({ sessionKey: req.params.sessionKey, ...session });
    })
  );

  app.post(
    "/api/games/:game/sessions/:sessionKey/actions",
    route(async (req, res) => {
      log.debug({ params: req.params, body: req.body }, "POST action");
      const engine = engines.get(req.params.game);
      if (!engine) return res.status(404).json({ error: "Game not found" });
      const parsed = engine.actionSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({
          error: parsed.error.issues.map((issue) => issue.message).join("; "),
          code: "INVALID_ACTION"
        });
      }
      const result = await truth.pipeline.mutate(engine, req.params.sessionKey, parsed.data);
      res.json(result);
    })
  );

  app.delete(
    "/api/games/:game/sessions/:sessionKey",
    route(async (req, res) => {
      log.debug({ params: req.params }, "DELETE session");
      const engine = engines.get(req.params.game);
      if (!engine) return res.status(404).json({ error: "Game not found" });
      const removed = await truth.pipeline.teardown(engine, req.params.sessionKey);
      if (!removed) return res.status(404).json({ error: "Session not found" });
      res.status(204).send();
    })
  );

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    // body-parser reports malformed JSON as a SyntaxError
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body", code: "INVALID_ACTION" });
      return;
    }
    if (error instanceof EngineRejectedError) {
      res.status(422).json({ error: error.message, code: error.code });
      return;
    }
    if (error instanceof LockTimeoutError || error instanceof BackendUnavailableError) {
      log.warn({ err: error }, "request degraded");
      res.set("Retry-After", "1");
      res.status(503).json({ error: error.message, code: error.code });
      return;
    }
    log.error({ err: error }, "unhandled request error");
    res.status(500).json({ error: "Internal server error" });
  });
}

function route(handler: (req: Request, res: Response) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function registerSocketHandlers(
  io: GameSocketServer,
  engines: Map<string, GameEngine>,
  options: BackendOptions
) {
  const { truth, log } = options;

  io.on("connection", (socket) => {
    const auth: Record<string, unknown> = socket.handshake.auth ?? {};
    const { game, sessionKey } = auth;
    if (typeof game !== "string" || typeof sessionKey !== "string" || !sessionKey) {
      socket.emit("session:error", { message: "game and sessionKey required" });
      return socket.disconnect();
    }
    const engine = engines.get(game);
    if (!engine) {
      socket.emit("session:error", { message: `Unknown game ${game}` });
      return socket.disconnect();
    }

    truth.gateway.register(engine.channel, {
      id: socket.id,
      send: (event) => {
        socket.emit("state_update", event);
      }
    });
    log.debug({ socket: socket.id, game, sessionKey }, "socket joined session stream");

    socket.on("session:leave", () => {
      truth.gateway.unregister(engine.channel, socket.id);
    });

    socket.on("disconnect", () => {
      truth.gateway.unregisterAll(socket.id);
    });
  });
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return pathToFileURL(entry).href === import.meta.url;
}

async function main() {
  const config = loadConfig();
  const log = createLogger(config.LOG_LEVEL);
  const truth = await createTruthLayer(config, log);
  const app = express();
  const httpServer = createServer(app);
  const { io } = initializeBackend(app, httpServer, {
    truth,
    engines: DEFAULT_ENGINES,
    log: log.child({ component: "server" }),
    corsOrigin: config.CORS_ORIGIN
  });
  await truth.start();

  httpServer.listen(config.PORT, "0.0.0.0", () => {
    log.info({ port: config.PORT, backend: truth.store.kind }, "board game server listening");
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, "shutting down");
    io.close()
      .then(() => truth.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error({ err: error }, "shutdown failed");
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

if (isMainModule()) {
  main().catch((error: unknown) => {
    console.error("board game server failed to start", error);
    process.exit(1);
  });
}
