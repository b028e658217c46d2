// ═══════════════════════════════════════════════════════════════
// Tapgate — Gateway Server
// apps/gateway/src/server.ts
//
// Wires together the two listeners and their services:
//   Proxy app  → Raw body → Proxy Route (/v1/*) → 404
//   Trace app  → /traces, /traces/:id, /health, WebSocket /ws
//
// The hook manager and trace hub are shared by both apps.
// ═══════════════════════════════════════════════════════════════

import type { Server } from "node:http";
import express from "express";
import type { Express, Request, Response, NextFunction } from "express";
import { HookManager } from "./hooks/hookManager";
import { ProxyService } from "./services/proxyService";
import { TraceHub } from "./services/traceHub";
import { TraceWebSocketServer } from "./services/traceWebSocket";
import { createProxyRoute } from "./routes/proxy";
import { createTraceRoutes } from "./routes/traces";
import type { GatewayConfig } from "./types";
import { DEFAULT_GATEWAY_CONFIG } from "./types";
import { describeError } from "./errors";

export { loadConfig } from "./config";
export { SAMPLE_HOOK_SCRIPT } from "./hooks/sampleHook";
export type { GatewayConfig } from "./types";

// ─────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────

/** Services shared by the proxy and trace apps. Injected in tests. */
export interface GatewayServices {
  hookManager: HookManager;
  traceHub: TraceHub;
  proxyService: ProxyService;
}

export interface StartOptions {
  /** Install SIGINT/SIGTERM handlers that shut the gateway down. */
  handleSignals?: boolean;
}

export interface RunningGateway {
  config: GatewayConfig;
  proxyServer: Server;
  traceServer: Server;
  /** Bound ports (differ from config when it asked for port 0). */
  proxyPort: number;
  tracePort: number;
  services: GatewayServices;
  close(): Promise<void>;
}

// ─────────────────────────────────────────────────────────────
// SERVER FACTORY
// ─────────────────────────────────────────────────────────────

/**
 * Create and configure the proxy and trace Express apps.
 *
 * @param config   Gateway configuration overrides.
 * @param services Pre-built services, e.g. a hub shared with a test.
 * @returns Both apps, their services and a cleanup function.
 */
export function createGatewayApp(
  config?: Partial<GatewayConfig>,
  services?: Partial<GatewayServices>
) {
  const cfg: GatewayConfig = { ...DEFAULT_GATEWAY_CONFIG, ...config };
  const startedAt = Date.now();

  // ─── Services ───
  const hookManager = services?.hookManager ?? new HookManager({ timeoutMs: cfg.hookTimeoutMs });
  const traceHub = services?.traceHub ?? new TraceHub({
    maxTraces: cfg.maxTraces,
    deliveryTimeoutMs: cfg.traceDeliveryTimeoutMs,
  });
  const proxyService = services?.proxyService ?? new ProxyService({
    upstreamUrl: cfg.upstreamUrl,
    timeoutMs: cfg.upstreamTimeoutMs,
    maxConnectionsPerHost: cfg.maxConnectionsPerHost,
    idleConnectionTimeoutMs: cfg.idleConnectionTimeoutMs,
  });

  // ─── Proxy app ───
  const app = express();
  app.disable("x-powered-by");

  // Bodies stay exactly as sent; hooks and the upstream see the same bytes.
  app.use(express.raw({
    type: () => true,
    inflate: false,
    limit: cfg.maxBodySizeBytes,
  }));

  app.use(createProxyRoute({
    prefix: cfg.proxyPrefix,
    proxyService,
    hookManager,
    traceHub,
    debug: cfg.debug,
  }));

  app.use((_req: Request, res: Response) => {
    res.status(404).type("text/plain").send(`Only ${cfg.proxyPrefix} endpoints are supported`);
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (httpStatusOf(err) === 413) {
      res.status(413).type("text/plain").send("Request body too large");
      return;
    }
    console.error("[Gateway] Unhandled error:", err);
    if (res.headersSent) {
      res.destroy();
      return;
    }
    res.status(500).type("text/plain").send("Failed to process request");
  });

  // ─── Trace app ───
  const traceApp = express();
  traceApp.disable("x-powered-by");

  traceApp.use(createTraceRoutes({ traceHub, hookManager, startedAt }));

  traceApp.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: "NOT_FOUND",
      message: "Route not found. Try /traces, /traces/:id or /health.",
    });
  });

  traceApp.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error("[Gateway] Unhandled error:", err);
    res.status(500).json({
      error: "INTERNAL_ERROR",
      message: "An unexpected error occurred.",
    });
  });

  // ─── Cleanup function ───
  async function cleanup(): Promise<void> {
    await traceHub.close();
    await proxyService.close();
    console.log("[Gateway] Cleaned up resources.");
  }

  return { app, traceApp, cleanup, config: cfg, hookManager, traceHub, proxyService };
}

// ─────────────────────────────────────────────────────────────
// STANDALONE STARTUP
// ─────────────────────────────────────────────────────────────

/**
 * Load the startup hook, bind both listeners and attach the live
 * trace stream. A hook that fails to load is logged and the gateway
 * runs without it.
 */
export async function startGateway(
  config?: Partial<GatewayConfig>,
  options: StartOptions = {}
): Promise<RunningGateway> {
  const { app, traceApp, cleanup, config: cfg, hookManager, traceHub, proxyService } =
    createGatewayApp(config);

  if (cfg.hookPath) {
    try {
      await hookManager.load(cfg.hookPath);
    } catch (err) {
      console.error(`[Gateway] ${describeError(err)}`);
      console.error("[Gateway] Continuing with hooks disabled.");
    }
  }

  const proxyServer = await listen(app, cfg.port, cfg.host);
  const traceServer = await listen(traceApp, cfg.tracePort, cfg.traceHost);
  const proxyPort = boundPort(proxyServer, cfg.port);
  const tracePort = boundPort(traceServer, cfg.tracePort);

  const traceWs = new TraceWebSocketServer(traceHub, { heartbeatIntervalMs: cfg.heartbeatIntervalMs });
  traceWs.attach(traceServer);

  console.log(`[Gateway] Tapgate proxy listening on http://${cfg.host}:${proxyPort}${cfg.proxyPrefix}`);
  console.log(`[Gateway] Upstream: ${cfg.upstreamUrl} (timeout ${cfg.upstreamTimeoutMs}ms)`);
  console.log(`[Gateway] Trace API on http://${cfg.traceHost}:${tracePort}/traces`);
  console.log(`[Gateway] Live traces at ws://${cfg.traceHost}:${tracePort}/ws`);
  console.log(`[Gateway] Hooks: ${hookManager.enabled ? hookManager.status().origin : "none"}`);

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    if (!closing) {
      closing = (async () => {
        await traceWs.destroy();
        await Promise.all([closeServer(proxyServer), closeServer(traceServer)]);
        await cleanup();
        console.log("[Gateway] Server closed.");
      })();
    }
    return closing;
  };

  if (options.handleSignals ?? true) {
    // Graceful shutdown.
    const shutdown = (signal: string) => {
      console.log(`[Gateway] Received ${signal}. Shutting down gracefully...`);

      // Force exit after 10 seconds.
      setTimeout(() => {
        console.error("[Gateway] Forced shutdown after timeout.");
        process.exit(1);
      }, 10_000).unref();

      close().then(
        () => process.exit(0),
        (err) => {
          console.error(`[Gateway] Shutdown failed: ${describeError(err)}`);
          process.exit(1);
        }
      );
    };

    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.once("SIGINT", () => shutdown("SIGINT"));
  }

  return {
    config: cfg,
    proxyServer,
    traceServer,
    proxyPort,
    tracePort,
    services: { hookManager, traceHub, proxyService },
    close,
  };
}

// ─── Internal Helpers ───

function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => resolve(server));
    server.once("error", reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeIdleConnections();
  });
}

function boundPort(server: Server, fallback: number): number {
  const address = server.address();
  return typeof address === "object" && address !== null ? address.port : fallback;
}

/** Status carried by body-parser errors (413 for oversized bodies). */
function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}
