// ═══════════════════════════════════════════════════════════════
// Tapgate — Trace Records
// apps/gateway/src/services/trace.ts
// ═══════════════════════════════════════════════════════════════

import { randomBytes } from "node:crypto";
import type { HeaderMultimap, Trace, TraceMessage } from "../types";

export interface TraceInput {
  method: string;
  url: string;
  status: string;
  latency: number;
  sessionId?: string;
  requestHeaders: HeaderMultimap;
  requestBody: string;
  responseBody: string;
}

/** 16 hex characters from 8 random bytes. */
export function generateTraceId(): string {
  return randomBytes(8).toString("hex");
}

/** Freeze a new trace stamped with an id and the current time. */
export function createTrace(input: TraceInput, now: Date = new Date()): Trace {
  const requestHeaders: HeaderMultimap = {};
  for (const [name, values] of Object.entries(input.requestHeaders)) {
    requestHeaders[name] = [...values];
  }

  return Object.freeze({
    id: generateTraceId(),
    timestamp: now,
    method: input.method,
    url: input.url,
    status: input.status,
    latency: input.latency,
    ...(input.sessionId ? { sessionId: input.sessionId } : {}),
    requestHeaders: Object.freeze(requestHeaders),
    requestBody: input.requestBody,
    responseBody: input.responseBody,
  });
}

/** Wire shape: snake_case keys, empty optional fields omitted. */
export function toTraceMessage(trace: Trace): TraceMessage {
  const message: TraceMessage = {
    id: trace.id,
    timestamp: trace.timestamp.toISOString(),
    method: trace.method,
    url: trace.url,
    status: trace.status,
    latency: trace.latency,
  };
  if (trace.sessionId) message.session_id = trace.sessionId;
  if (Object.keys(trace.requestHeaders).length > 0) message.request_headers = { ...trace.requestHeaders };
  if (trace.requestBody) message.request_body = trace.requestBody;
  if (trace.responseBody) message.response_body = trace.responseBody;
  return message;
}
