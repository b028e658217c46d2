// ═══════════════════════════════════════════════════════════════
// Tapgate — Gateway Types
// apps/gateway/src/types.ts
//
// Shared types for the proxy, hook engine and trace hub.
// ═══════════════════════════════════════════════════════════════

import type { HeaderMultimap } from "@tapgate/types";

export type { HeaderMultimap, TraceMessage } from "@tapgate/types";

/** Body + headers pair produced by every hook invocation. */
export interface HookResult {
  body: Buffer;
  headers: HeaderMultimap;
}

/** Immutable record of one completed exchange. */
export interface Trace {
  readonly id: string;
  readonly timestamp: Date;
  readonly method: string;
  readonly url: string;
  /** Status line, e.g. "200 OK". */
  readonly status: string;
  /** Seconds from request arrival until the response was written. */
  readonly latency: number;
  readonly sessionId?: string;
  readonly requestHeaders: Readonly<HeaderMultimap>;
  readonly requestBody: string;
  readonly responseBody: string;
}

/** How the pipeline handles an upstream response body. */
export type ResponseMode = "stream" | "buffer";

/** Gateway configuration. */
export interface GatewayConfig {
  /** Host the proxy listens on. */
  host: string;
  /** Port the proxy listens on. */
  port: number;
  /** Host the trace API and live stream listen on. */
  traceHost: string;
  /** Port the trace API and live stream listen on. */
  tracePort: number;
  /** Upstream origin every proxied request is sent to. */
  upstreamUrl: string;
  /** Only paths under this prefix are proxied. */
  proxyPrefix: string;
  /** Upstream request timeout in milliseconds. */
  upstreamTimeoutMs: number;
  /** Pooled connections kept per upstream origin. */
  maxConnectionsPerHost: number;
  /** How long an idle pooled connection stays open (ms). */
  idleConnectionTimeoutMs: number;
  /** Maximum inbound request body size in bytes. */
  maxBodySizeBytes: number;
  /** Number of traces retained in memory. */
  maxTraces: number;
  /** Hook script loaded at startup. */
  hookPath?: string;
  /** Execution budget for a single hook script run (ms). */
  hookTimeoutMs: number;
  /** How long the hub waits on one observer write before dropping it (ms). */
  traceDeliveryTimeoutMs: number;
  /** WebSocket ping interval for live trace observers (ms). */
  heartbeatIntervalMs: number;
  /** Log headers and bodies of every exchange. */
  debug: boolean;
}

export const DEFAULT_GATEWAY_CONFIG: GatewayConfig = {
  host: "localhost",
  port: 8080,
  traceHost: "0.0.0.0",
  tracePort: 8081,
  upstreamUrl: "https://api.openai.com",
  proxyPrefix: "/v1/",
  upstreamTimeoutMs: 30_000,
  maxConnectionsPerHost: 10,
  idleConnectionTimeoutMs: 30_000,
  maxBodySizeBytes: 50 * 1024 * 1024, // 50 MB
  maxTraces: 100,
  hookTimeoutMs: 1_000,
  traceDeliveryTimeoutMs: 5_000,
  heartbeatIntervalMs: 30_000,
  debug: false,
};
