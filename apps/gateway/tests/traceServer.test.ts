// ═══════════════════════════════════════════════════════════════
// Tapgate — Trace Server Tests
// apps/gateway/tests/traceServer.test.ts
//
// Trace API routes through supertest, and the live WebSocket
// stream against a gateway started on ephemeral ports.
// ═══════════════════════════════════════════════════════════════

import { createServer, type Server } from "node:http";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, afterEach, vi } from "vitest";
import request from "supertest";
import WebSocket from "ws";
import type { TraceMessage } from "@tapgate/types";
import { createGatewayApp, startGateway, type RunningGateway } from "../src/server";
import { createTrace } from "../src/services/trace";
import type { GatewayConfig, Trace } from "../src/types";

// ─────────────────────────────────────────────────────────────
// TEST FIXTURES
// ─────────────────────────────────────────────────────────────

function makeTrace(path: string, requestBody: string, responseBody: string): Trace {
  return createTrace({
    method: "POST",
    url: `https://upstream.test${path}`,
    status: "200 OK",
    latency: 0.2,
    requestHeaders: { "content-type": ["application/json"] },
    requestBody,
    responseBody,
  });
}

const teardown: Array<() => Promise<void>> = [];

afterEach(async () => {
  for (const fn of teardown.splice(0).reverse()) await fn();
});

async function startUpstream(): Promise<string> {
  const server: Server = createServer((_req, res) => {
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end('{"id":"cmpl-live"}');
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  teardown.push(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });
  const address = server.address();
  return `http://127.0.0.1:${typeof address === "object" && address !== null ? address.port : 0}`;
}

async function start(config: Partial<GatewayConfig>): Promise<RunningGateway> {
  const running = await startGateway(
    { host: "127.0.0.1", port: 0, traceHost: "127.0.0.1", tracePort: 0, ...config },
    { handleSignals: false }
  );
  teardown.push(() => running.close());
  return running;
}

function connect(tracePort: number): { socket: WebSocket; messages: TraceMessage[] } {
  const socket = new WebSocket(`ws://127.0.0.1:${tracePort}/ws`);
  const messages: TraceMessage[] = [];
  socket.on("message", (data) => {
    messages.push(JSON.parse(String(data)));
  });
  teardown.push(async () => {
    socket.terminate();
  });
  return { socket, messages };
}

// ─────────────────────────────────────────────────────────────
// TRACE API
// ─────────────────────────────────────────────────────────────

describe("Trace API", () => {
  function setup() {
    const built = createGatewayApp({ upstreamUrl: "http://127.0.0.1:9" });
    teardown.push(built.cleanup);
    return built;
  }

  it("lists traces oldest first", async () => {
    const { traceApp, traceHub } = setup();
    await traceHub.broadcast(makeTrace("/v1/first", "{}", "one"));
    await traceHub.broadcast(makeTrace("/v1/second", "{}", "two"));

    const res = await request(traceApp).get("/traces");

    expect(res.status).toBe(200);
    expect(res.body.map((t: TraceMessage) => t.url)).toEqual([
      "https://upstream.test/v1/first",
      "https://upstream.test/v1/second",
    ]);
    expect(res.body[0].request_headers).toEqual({ "content-type": ["application/json"] });
  });

  it("filters traces case-insensitively with ?q=", async () => {
    const { traceApp, traceHub } = setup();
    await traceHub.broadcast(makeTrace("/v1/chat/completions", '{"prompt":"Weather today"}', "sunny"));
    await traceHub.broadcast(makeTrace("/v1/embeddings", '{"input":"vectors"}', "[0.1]"));
    await traceHub.broadcast(makeTrace("/v1/models", "", "gpt-WEATHER"));

    const res = await request(traceApp).get("/traces").query({ q: "weather" });

    expect(res.body.map((t: TraceMessage) => t.url)).toEqual([
      "https://upstream.test/v1/chat/completions",
      "https://upstream.test/v1/models",
    ]);
  });

  it("returns a single trace by id", async () => {
    const { traceApp, traceHub } = setup();
    const trace = makeTrace("/v1/one", "{}", "body");
    await traceHub.broadcast(trace);

    const res = await request(traceApp).get(`/traces/${trace.id}`);

    expect(res.status).toBe(200);
    expect(res.body.id).toBe(trace.id);
    expect(res.body.response_body).toBe("body");
  });

  it("answers 404 for an unknown trace id", async () => {
    const { traceApp } = setup();

    const res = await request(traceApp).get("/traces/does-not-exist");

    expect(res.status).toBe(404);
    expect(res.body.error).toBe("TRACE_NOT_FOUND");
  });

  it("reports health", async () => {
    const { traceApp, traceHub } = setup();
    await traceHub.broadcast(makeTrace("/v1/one", "{}", "body"));

    const res = await request(traceApp).get("/health");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
    expect(res.body.traces).toBe(1);
    expect(res.body.observers).toBe(0);
    expect(res.body.hooks).toEqual({
      enabled: false,
      origin: null,
      hasRequest: false,
      hasResponse: false,
      loadedAt: null,
    });
  });

  it("answers JSON 404 for unknown routes", async () => {
    const { traceApp } = setup();

    const res = await request(traceApp).get("/nowhere");

    expect(res.status).toBe(404);
    expect(res.body.error).toBe("NOT_FOUND");
  });
});

// ─────────────────────────────────────────────────────────────
// LIVE STREAM
// ─────────────────────────────────────────────────────────────

describe("Live trace stream", () => {
  it("replays history to a new socket, then streams new exchanges", async () => {
    const upstreamUrl = await startUpstream();
    const running = await start({ upstreamUrl });
    const { traceHub } = running.services;
    await traceHub.broadcast(makeTrace("/v1/first", "{}", "one"));
    await traceHub.broadcast(makeTrace("/v1/second", "{}", "two"));

    const { messages } = connect(running.tracePort);
    await vi.waitFor(() => expect(messages).toHaveLength(2));
    expect(messages.map((m) => m.url)).toEqual([
      "https://upstream.test/v1/first",
      "https://upstream.test/v1/second",
    ]);

    const res = await fetch(`http://127.0.0.1:${running.proxyPort}/v1/chat/completions`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: '{"messages":[]}',
    });
    expect(await res.text()).toBe('{"id":"cmpl-live"}');

    await vi.waitFor(() => expect(messages).toHaveLength(3));
    expect(messages[2].url).toBe(`${upstreamUrl}/v1/chat/completions`);
    expect(messages[2].request_body).toBe('{"messages":[]}');
    expect(messages[2].response_body).toBe('{"id":"cmpl-live"}');
    expect(traceHub.observerCount()).toBe(1);
  });

  it("unregisters a socket once it disconnects", async () => {
    const running = await start({ upstreamUrl: "http://127.0.0.1:9" });
    const { traceHub } = running.services;

    const { socket } = connect(running.tracePort);
    await vi.waitFor(() => expect(traceHub.observerCount()).toBe(1));

    socket.close();
    await vi.waitFor(() => expect(traceHub.observerCount()).toBe(0));
  });
});

// ─────────────────────────────────────────────────────────────
// STARTUP HOOKS
// ─────────────────────────────────────────────────────────────

describe("Startup hook loading", () => {
  it("loads the configured hook script", async () => {
    const dir = await mkdtemp(join(tmpdir(), "tapgate-"));
    teardown.push(() => rm(dir, { recursive: true, force: true }));
    const hookPath = join(dir, "hook.js");
    await writeFile(hookPath, "function processResponse(body, headers) { return [body, headers]; }\n");

    const running = await start({ upstreamUrl: "http://127.0.0.1:9", hookPath });

    expect(running.services.hookManager.status()).toMatchObject({
      enabled: true,
      origin: hookPath,
      hasRequest: false,
      hasResponse: true,
    });
  });

  it("keeps running with hooks disabled when the script cannot be loaded", async () => {
    const running = await start({ upstreamUrl: "http://127.0.0.1:9", hookPath: "/nonexistent/hook.js" });

    expect(running.services.hookManager.enabled).toBe(false);
    expect(running.proxyPort).toBeGreaterThan(0);
  });
});
