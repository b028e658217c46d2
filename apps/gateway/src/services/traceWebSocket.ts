// ═══════════════════════════════════════════════════════════════
// Tapgate — WebSocket Trace Stream Server
// apps/gateway/src/services/traceWebSocket.ts
//
// Every connection becomes an observer of the trace hub: it first
// receives the retained history, then each new trace as a single
// JSON message.
//
// Heartbeat: ping every interval, terminate unresponsive clients.
// ═══════════════════════════════════════════════════════════════

import type { Server as HttpServer } from "node:http";
import { randomUUID } from "node:crypto";
import { WebSocketServer, WebSocket } from "ws";
import type { TraceHub, TraceObserver } from "./traceHub";
import { describeError } from "../errors";

export interface TraceWebSocketOptions {
  path: string;
  heartbeatIntervalMs: number;
}

export const DEFAULT_TRACE_WS_OPTIONS: TraceWebSocketOptions = {
  path: "/ws",
  heartbeatIntervalMs: 30_000,
};

/** Adapt a socket to the hub's observer interface. */
export function createSocketObserver(ws: WebSocket, id: string = randomUUID()): TraceObserver {
  return {
    id,
    send: (payload) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new Error("WebSocket is not open"));
          return;
        }
        ws.send(payload, (err) => (err ? reject(err) : resolve()));
      }),
    close: () => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.close(1000, "Trace stream closed");
      } else {
        ws.terminate();
      }
    },
  };
}

// ─────────────────────────────────────────────────────────────
// WEBSOCKET TRACE SERVER
// ─────────────────────────────────────────────────────────────

export class TraceWebSocketServer {
  private wss: WebSocketServer | null = null;
  private heartbeatInterval: ReturnType<typeof setInterval> | null = null;
  private aliveMap: WeakMap<WebSocket, boolean> = new WeakMap();
  private readonly options: TraceWebSocketOptions;

  constructor(private readonly hub: TraceHub, options?: Partial<TraceWebSocketOptions>) {
    this.options = { ...DEFAULT_TRACE_WS_OPTIONS, ...options };
  }

  /**
   * Attach the WebSocket server to the existing HTTP server.
   * Call this after `app.listen()` returns the server instance.
   */
  attach(server: HttpServer): void {
    this.wss = new WebSocketServer({ server, path: this.options.path });

    this.wss.on("connection", (ws: WebSocket) => {
      this.handleConnection(ws);
    });

    this.heartbeatInterval = setInterval(() => {
      this.heartbeat();
    }, this.options.heartbeatIntervalMs);

    console.log(`[TraceWS] WebSocket trace stream attached at ${this.options.path}`);
  }

  /** Close every client connection and stop the heartbeat. */
  async destroy(): Promise<void> {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }

    const wss = this.wss;
    if (wss) {
      this.wss = null;
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }

    console.log("[TraceWS] Destroyed.");
  }

  // ─── Connection Handling ───

  private handleConnection(ws: WebSocket): void {
    this.aliveMap.set(ws, true);
    const observer = createSocketObserver(ws);

    ws.on("pong", () => {
      this.aliveMap.set(ws, true);
    });

    ws.on("error", (err) => {
      console.warn(`[TraceWS] Observer ${observer.id} error: ${err.message}`);
    });

    ws.on("close", () => {
      this.hub.unregister(observer).catch((err) => {
        console.warn(`[TraceWS] Failed to unregister observer ${observer.id}: ${describeError(err)}`);
      });
    });

    this.hub.register(observer).catch((err) => {
      console.warn(`[TraceWS] Failed to register observer ${observer.id}: ${describeError(err)}`);
      observer.close();
    });
  }

  // ─── Heartbeat ───

  private heartbeat(): void {
    if (!this.wss) return;
    for (const client of this.wss.clients) {
      if (this.aliveMap.get(client) === false) {
        client.terminate();
        continue;
      }
      this.aliveMap.set(client, false);
      client.ping();
    }
  }
}
