// ═══════════════════════════════════════════════════════════════
// Tapgate — Trace Wire Types
// packages/types/src/trace.ts
// ═══════════════════════════════════════════════════════════════

/**
 * HTTP headers as a multimap: lower-cased name → ordered values.
 * Shared by the proxy, the hook sandbox and the trace stream.
 */
export type HeaderMultimap = Record<string, string[]>;

/**
 * One completed proxied exchange, as served by `GET /traces`
 * and pushed over the live `/ws` stream.
 *
 * Optional keys are omitted when empty.
 */
export interface TraceMessage {
  id: string;
  /** ISO-8601 creation time. */
  timestamp: string;
  method: string;
  /** Fully-qualified upstream URL. */
  url: string;
  /** Status line, e.g. "200 OK". */
  status: string;
  /** Seconds from request arrival until the response was written. */
  latency: number;
  session_id?: string;
  request_headers?: HeaderMultimap;
  request_body?: string;
  /** Literal response text, or a streamed-bytes placeholder. */
  response_body?: string;
}

/** Placeholder recorded as the response body of a streamed exchange. */
export function streamingPlaceholder(bytes: number): string {
  return `[STREAMING RESPONSE - ${bytes} bytes]`;
}

/**
 * Case-insensitive search over url, request body and response body.
 * An empty term matches everything.
 */
export function traceMatches(trace: TraceMessage, term: string): boolean {
  const needle = term.trim().toLowerCase();
  if (!needle) return true;

  return [trace.url, trace.request_body, trace.response_body].some(
    (field) => typeof field === "string" && field.toLowerCase().includes(needle)
  );
}
