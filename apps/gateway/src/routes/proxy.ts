// ═══════════════════════════════════════════════════════════════
// Tapgate — Proxy Route Handler
// apps/gateway/src/routes/proxy.ts
//
// The hot path. Every API call flows through here:
//   Read body → Digest → Request hook → Upstream → Classify →
//   (stream | decompress → Response hook) → Respond → Trace
//
// URL pattern: /v1/*, forwarded with path and query unchanged.
// ═══════════════════════════════════════════════════════════════

import { Router, type NextFunction, type Request, type Response } from "express";
import { finished } from "node:stream/promises";
import { streamingPlaceholder } from "@tapgate/types";
import type { HeaderMultimap, ResponseMode, Trace } from "../types";
import type { HookManager } from "../hooks/hookManager";
import { messageDigestHook, truncateMiddle } from "../hooks/messageDigest";
import { UpstreamTimeoutError, type ProxyService, type UpstreamExchange } from "../services/proxyService";
import type { TraceHub } from "../services/traceHub";
import { createTrace } from "../services/trace";
import { decompress, isSupportedEncoding } from "../services/contentCodec";
import {
  HOP_BY_HOP_HEADERS,
  firstHeader,
  fromNodeHeaders,
  maskAuthorization,
  sanitizeHeaders,
  withoutHeaders,
} from "../services/headers";
import { CodecError, TraceHubClosedError, describeError } from "../errors";

// ─────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────

export interface ProxyRouteConfig {
  /** Only paths under this prefix are forwarded. */
  prefix: string;
  proxyService: ProxyService;
  hookManager: HookManager;
  traceHub: TraceHub;
  /** Log headers and bodies of every exchange. */
  debug?: boolean;
}

const STREAMING_MEDIA_TYPES = new Set(["text/event-stream", "text/plain"]);

/** Event streams and plain text are relayed as they arrive; everything else is buffered. */
export function classifyResponse(contentType: string | undefined): ResponseMode {
  const mediaType = (contentType ?? "").split(";")[0].trim().toLowerCase();
  return STREAMING_MEDIA_TYPES.has(mediaType) ? "stream" : "buffer";
}

// ─────────────────────────────────────────────────────────────
// ROUTE FACTORY
// ─────────────────────────────────────────────────────────────

/**
 * Create the proxy route handler.
 *
 * Requests outside `prefix` fall through to the next handler.
 */
export function createProxyRoute(config: ProxyRouteConfig): Router {
  const router = Router();
  const { prefix, proxyService, hookManager, traceHub, debug = false } = config;

  router.use((req: Request, res: Response, next: NextFunction) => {
    if (!req.path.startsWith(prefix)) {
      next();
      return;
    }
    handleProxy(req, res).catch(next);
  });

  async function handleProxy(req: Request, res: Response): Promise<void> {
    const startTime = performance.now();

    // ─── 1. Inbound body and headers ───
    const inbound = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    const digested = messageDigestHook(inbound, fromNodeHeaders(req.headersDistinct));

    // ─── 2. Request hook ───
    const { body, headers } = hookManager.runRequestHook(digested.body, digested.headers);

    const queryIndex = req.originalUrl.indexOf("?");
    const queryString = queryIndex === -1 ? "" : req.originalUrl.slice(queryIndex + 1);

    if (debug) {
      console.log(`[Proxy] → ${req.method} ${req.originalUrl}\n${formatHeaders(headers)}\n${truncateMiddle(body.toString("utf8"))}`);
    }

    // ─── 3. Upstream call ───
    let exchange: UpstreamExchange;
    try {
      exchange = await proxyService.send({ method: req.method, path: req.path, queryString, headers, body });
    } catch (err) {
      if (err instanceof UpstreamTimeoutError) {
        console.error(`[Proxy] ${req.method} ${req.originalUrl}: ${err.message}`);
        res.status(504).type("text/plain").send(err.message);
        return;
      }
      console.error(`[Proxy] Failed to forward ${req.method} ${req.originalUrl}: ${describeError(err)}`);
      res.status(502).type("text/plain").send("Failed to forward request");
      return;
    }

    // ─── 4. Respond ───
    const mode = classifyResponse(firstHeader(exchange.headers, "content-type"));
    const responseBody = mode === "stream"
      ? await streamResponse(exchange, res)
      : await bufferResponse(exchange, res);
    if (responseBody === null) return;

    const latency = (performance.now() - startTime) / 1000;
    console.log(`[Proxy] ${req.method} ${exchange.url} → ${exchange.statusLine} (${latency.toFixed(3)}s, ${mode})`);

    // ─── 5. Trace ───
    await recordTrace(
      createTrace({
        method: req.method,
        url: exchange.url,
        status: exchange.statusLine,
        latency,
        sessionId: firstHeader(exchange.headers, "x-session-id"),
        requestHeaders: maskHeaders(headers),
        requestBody: body.toString("utf8"),
        responseBody,
      })
    );
  }

  // ─── Streaming path ───

  async function streamResponse(exchange: UpstreamExchange, res: Response): Promise<string | null> {
    res.status(exchange.statusCode);
    applyHeaders(res, exchange.headers);
    res.flushHeaders();

    let bytes = 0;
    try {
      for await (const chunk of exchange.stream()) {
        if (res.destroyed) throw new Error("Client connection closed");
        bytes += chunk.length;
        if (!res.write(chunk)) await waitForDrain(res);
      }
      res.end();
      await finished(res);
    } catch (err) {
      console.error(`[Proxy] Streaming aborted after ${bytes} bytes: ${describeError(err)}`);
      exchange.discard();
      res.destroy();
      return null;
    }

    console.log(`[Proxy] Streamed ${bytes} bytes from ${exchange.url}`);
    return streamingPlaceholder(bytes);
  }

  // ─── Buffered path ───

  async function bufferResponse(exchange: UpstreamExchange, res: Response): Promise<string | null> {
    let raw: Buffer;
    try {
      raw = await exchange.readAll();
    } catch (err) {
      if (err instanceof UpstreamTimeoutError) {
        console.error(`[Proxy] ${exchange.url}: ${err.message}`);
        res.status(504).type("text/plain").send(err.message);
        return null;
      }
      console.error(`[Proxy] Failed to read response from ${exchange.url}: ${describeError(err)}`);
      res.status(500).type("text/plain").send("Failed to read response");
      return null;
    }

    let decoded = raw;
    let responseHeaders = exchange.headers;
    const encoding = firstHeader(exchange.headers, "content-encoding");
    if (encoding) {
      try {
        decoded = await decompress(raw, encoding);
        if (isSupportedEncoding(encoding)) {
          responseHeaders = withoutHeaders(responseHeaders, ["content-encoding"]);
        }
      } catch (err) {
        if (!(err instanceof CodecError)) throw err;
      }
    }

    const hooked = hookManager.runResponseHook(decoded, responseHeaders);

    res.status(exchange.statusCode);
    applyHeaders(res, withoutHeaders(hooked.headers, [...HOP_BY_HOP_HEADERS, "content-length"]));
    res.end(hooked.body);
    try {
      await finished(res);
    } catch (err) {
      console.error(`[Proxy] Failed to write response for ${exchange.url}: ${describeError(err)}`);
    }

    const text = hooked.body.toString("utf8");
    if (debug) {
      console.log(`[Proxy] ← ${exchange.statusLine}\n${formatHeaders(hooked.headers)}\n${truncateMiddle(text)}`);
    }
    return text;
  }

  async function recordTrace(trace: Trace): Promise<void> {
    try {
      await traceHub.broadcast(trace);
    } catch (err) {
      if (!(err instanceof TraceHubClosedError)) throw err;
      console.warn(`[Proxy] Trace ${trace.id} not recorded: ${err.message}`);
    }
  }

  return router;
}

// ─── Internal Helpers ───

function applyHeaders(res: Response, headers: HeaderMultimap): void {
  const safe = sanitizeHeaders(headers, (name) => console.warn(`[Proxy] Dropping invalid response header: ${name}`));
  for (const [name, values] of Object.entries(safe)) {
    res.setHeader(name, values.length === 1 ? values[0] : values);
  }
}

function waitForDrain(res: Response): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const cleanup = () => {
      res.off("drain", onDrain);
      res.off("close", onClose);
    };
    const onDrain = () => {
      cleanup();
      resolve();
    };
    const onClose = () => {
      cleanup();
      reject(new Error("Client connection closed"));
    };
    res.on("drain", onDrain);
    res.on("close", onClose);
  });
}

function maskHeaders(headers: HeaderMultimap): HeaderMultimap {
  const masked: HeaderMultimap = {};
  for (const [name, values] of Object.entries(headers)) {
    masked[name] = name.toLowerCase() === "authorization" ? values.map(maskAuthorization) : [...values];
  }
  return masked;
}

function formatHeaders(headers: HeaderMultimap): string {
  return Object.entries(maskHeaders(headers))
    .map(([name, values]) => `  ${name}: ${values.join(", ")}`)
    .join("\n");
}
