// ═══════════════════════════════════════════════════════════════
// Tapgate — Proxy Service
// apps/gateway/src/services/proxyService.ts
//
// Sends requests to the fixed upstream over a pooled connection
// agent. Accept-Encoding is forced to identity so the gateway
// sees plain bytes; anything still compressed is handled by the
// content codec on the buffered path.
// ═══════════════════════════════════════════════════════════════

import { STATUS_CODES } from "node:http";
import { Agent, request } from "undici";
import type { Dispatcher } from "undici";
import type { HeaderMultimap } from "../types";
import { HOP_BY_HOP_HEADERS, fromNodeHeaders, sanitizeHeaders, withoutHeaders } from "./headers";

// ─────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────

export interface ProxyRequest {
  /** HTTP method. */
  method: string;
  /** Request path, forwarded as is (e.g. "/v1/chat/completions"). */
  path: string;
  /** Query string (without leading ?). */
  queryString: string;
  /** Effective request headers after hooks. */
  headers: HeaderMultimap;
  /** Request body (ignored for GET/HEAD). */
  body: Buffer;
}

export interface ProxyConfig {
  /** Upstream origin, e.g. "https://api.openai.com". */
  upstreamUrl: string;
  /** Upstream timeout in ms: until headers when streaming, until the full body when buffering. */
  timeoutMs: number;
  /** Pooled connections per upstream origin. */
  maxConnectionsPerHost: number;
  /** Idle keep-alive lifetime of a pooled connection (ms). */
  idleConnectionTimeoutMs: number;
  /** Headers to strip before forwarding upstream. */
  stripRequestHeaders: string[];
  /** Headers to strip from upstream responses. */
  stripResponseHeaders: string[];
}

export const DEFAULT_PROXY_CONFIG: ProxyConfig = {
  upstreamUrl: "https://api.openai.com",
  timeoutMs: 30_000,
  maxConnectionsPerHost: 10,
  idleConnectionTimeoutMs: 30_000,
  stripRequestHeaders: [...HOP_BY_HOP_HEADERS, "host", "content-length", "accept-encoding"],
  stripResponseHeaders: [...HOP_BY_HOP_HEADERS],
};

const HTTP_METHODS = new Set<string>([
  "GET", "HEAD", "POST", "PUT", "DELETE", "CONNECT", "OPTIONS", "TRACE", "PATCH",
]);

/** The upstream did not answer within the configured timeout. */
export class UpstreamTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Upstream did not respond within ${timeoutMs}ms.`);
    this.name = "UpstreamTimeoutError";
  }
}

export function isHttpMethod(method: string): method is Dispatcher.HttpMethod {
  return HTTP_METHODS.has(method);
}

// ─────────────────────────────────────────────────────────────
// EXCHANGE
// ─────────────────────────────────────────────────────────────

type ResponseBody = Dispatcher.ResponseData["body"];

/** An upstream response whose headers have arrived. */
export class UpstreamExchange {
  constructor(
    readonly url: string,
    readonly statusCode: number,
    readonly headers: HeaderMultimap,
    private readonly body: ResponseBody,
    private readonly deadline: Deadline
  ) {}

  /** Status line, e.g. "200 OK". */
  get statusLine(): string {
    const reason = STATUS_CODES[this.statusCode];
    return reason ? `${this.statusCode} ${reason}` : String(this.statusCode);
  }

  /**
   * Buffer the whole body. The timeout keeps running until it is read.
   *
   * @throws UpstreamTimeoutError when the deadline passes mid-body.
   */
  async readAll(): Promise<Buffer> {
    try {
      return Buffer.from(await this.body.arrayBuffer());
    } catch (err) {
      if (this.deadline.controller.signal.aborted) {
        throw new UpstreamTimeoutError(this.deadline.timeoutMs);
      }
      throw err;
    } finally {
      this.deadline.clear();
    }
  }

  /** Hand over the body as a stream. The timeout stops here. */
  stream(): AsyncIterable<Buffer> {
    this.deadline.clear();
    return this.body;
  }

  /** Abandon the body and release the connection. */
  discard(): void {
    this.deadline.clear();
    this.body.destroy();
  }
}

/** Abort controller armed with the upstream timeout. */
class Deadline {
  readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;

  constructor(readonly timeoutMs: number) {
    this.timer = setTimeout(() => this.controller.abort(), timeoutMs);
  }

  clear(): void {
    clearTimeout(this.timer);
  }
}

// ─────────────────────────────────────────────────────────────
// SERVICE
// ─────────────────────────────────────────────────────────────

export class ProxyService {
  private readonly config: ProxyConfig;
  private readonly agent: Agent;

  constructor(config?: Partial<ProxyConfig>) {
    this.config = { ...DEFAULT_PROXY_CONFIG, ...config };
    this.agent = new Agent({
      connections: this.config.maxConnectionsPerHost,
      keepAliveTimeout: this.config.idleConnectionTimeoutMs,
      keepAliveMaxTimeout: this.config.idleConnectionTimeoutMs,
      headersTimeout: this.config.timeoutMs,
      // Streams may idle between events; the buffered path is bounded by timeoutMs.
      bodyTimeout: 0,
    });
  }

  /**
   * Send a request upstream and resolve once response headers arrive.
   *
   * @throws UpstreamTimeoutError when no headers arrive in time.
   * @throws Error for any other transport failure.
   */
  async send(req: ProxyRequest): Promise<UpstreamExchange> {
    const url = this.buildUpstreamUrl(req.path, req.queryString);
    const method = req.method.toUpperCase();
    if (!isHttpMethod(method)) {
      throw new Error(`Unsupported method: ${req.method}`);
    }

    const deadline = new Deadline(this.config.timeoutMs);

    try {
      const response = await request(url, {
        method,
        headers: toRawHeaders(this.buildHeaders(req.headers)),
        body: method === "GET" || method === "HEAD" ? null : req.body,
        dispatcher: this.agent,
        signal: deadline.controller.signal,
      });

      return new UpstreamExchange(
        url,
        response.statusCode,
        this.cleanResponseHeaders(response.headers),
        response.body,
        deadline
      );
    } catch (err) {
      deadline.clear();
      if (deadline.controller.signal.aborted || isHeadersTimeout(err)) {
        throw new UpstreamTimeoutError(this.config.timeoutMs);
      }
      throw err;
    }
  }

  buildUpstreamUrl(path: string, queryString: string): string {
    const base = this.config.upstreamUrl.replace(/\/+$/, "");
    const cleanPath = path.startsWith("/") ? path : `/${path}`;
    const qs = queryString ? `?${queryString}` : "";
    return `${base}${cleanPath}${qs}`;
  }

  /** Headers sent upstream: hop-by-hop removed, compression disabled. */
  buildHeaders(headers: HeaderMultimap): HeaderMultimap {
    const forwarded = sanitizeHeaders(
      withoutHeaders(headers, this.config.stripRequestHeaders),
      (name) => console.warn(`[Proxy] Dropping invalid request header: ${name}`)
    );
    forwarded["accept-encoding"] = ["identity"];
    return forwarded;
  }

  async close(): Promise<void> {
    await this.agent.close();
  }

  private cleanResponseHeaders(headers: Record<string, string | string[] | undefined>): HeaderMultimap {
    return withoutHeaders(fromNodeHeaders(headers), this.config.stripResponseHeaders);
  }
}

/** Multimap → flat [name, value, name, value, ...] list. */
function toRawHeaders(headers: HeaderMultimap): string[] {
  const raw: string[] = [];
  for (const [name, values] of Object.entries(headers)) {
    for (const value of values) raw.push(name, value);
  }
  return raw;
}

function isHeadersTimeout(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "UND_ERR_HEADERS_TIMEOUT";
}
