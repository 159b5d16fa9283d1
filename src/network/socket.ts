import { io, type Socket } from "socket.io-client";
import type {
  ClientToServerEvents,
  ServerToClientEvents,
  SessionHandshake,
  StoreEvent
} from "../shared/events.js";

export interface SessionSocketHandlers {
  onStateUpdate(event: StoreEvent): void;
  onDisconnect?(reason: string): void;
  onError?(message: string): void;
  onConnect?(): void;
}

export type SessionSocket = Socket<ServerToClientEvents, ClientToServerEvents>;

/**
 * Opens the real-time stream for one session. The server fans out per game
 * channel, so events for other sessions and anything at or below the last
 * seen sequence are dropped here.
 */
export function connectSessionSocket(
  baseUrl: string,
  game: string,
  sessionKey: string,
  handlers: SessionSocketHandlers
): SessionSocket {
  const auth: SessionHandshake = { game, sessionKey };
  const socket: SessionSocket = io(baseUrl, {
    transports: ["websocket"],
    forceNew: true,
    reconnection: true,
    auth: { ...auth }
  });
  let lastSequence = 0;

  socket.on("state_update", (event) => {
    if (event.sessionKey !== sessionKey) return;
    if (event.sequence <= lastSequence) return;
    lastSequence = event.sequence;
    handlers.onStateUpdate(event);
  });

  socket.on("session:error", (payload) => {
    handlers.onError?.(payload.message);
    socket.disconnect();
  });

  socket.on("connect_error", (err) => {
    handlers.onError?.(err.message || "Connection error");
  });

  socket.on("disconnect", (reason) => {
    handlers.onDisconnect?.(reason);
  });

  socket.on("connect", () => {
    // a fresh connection may follow a server restart that reset sequences
    lastSequence = 0;
    handlers.onConnect?.();
  });

  return socket;
}
