/**
 * Trace API client — reads the gateway's trace endpoints.
 * Used by `tapgate traces` and `tapgate tail`.
 */

import { z } from "zod";
import type { TraceMessage } from "@tapgate/types";

export const DEFAULT_TRACE_URL = "http://localhost:8081";

const traceMessageSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  method: z.string(),
  url: z.string(),
  status: z.string(),
  latency: z.number(),
  session_id: z.string().optional(),
  request_headers: z.record(z.array(z.string())).optional(),
  request_body: z.string().optional(),
  response_body: z.string().optional(),
});

const traceListSchema = z.array(traceMessageSchema);

/** Parse one live-stream message. Returns null for anything that is not a trace. */
export function parseTraceMessage(text: string): TraceMessage | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  const result = traceMessageSchema.safeParse(value);
  return result.success ? result.data : null;
}

/** `http://host:port` → `ws://host:port/ws` (https → wss). */
export function toWebSocketUrl(baseUrl: string): string {
  const url = new URL("/ws", baseUrl);
  url.protocol = url.protocol === "https:" ? "wss:" : "ws:";
  return url.toString();
}

/** GET /traces, optionally filtered server-side with ?q=. */
export async function fetchTraces(baseUrl: string, filter?: string): Promise<TraceMessage[]> {
  const url = new URL("/traces", baseUrl);
  if (filter) url.searchParams.set("q", filter);

  const res = await fetch(url);
  if (!res.ok) {
    throw new Error(`Trace API returned ${res.status} ${res.statusText}`);
  }

  const result = traceListSchema.safeParse(await res.json());
  if (!result.success) {
    throw new Error(`Unexpected trace payload: ${result.error.issues[0]?.message ?? "invalid"}`);
  }
  return result.data;
}
