// ═══════════════════════════════════════════════════════════════
// Tapgate — Header Helpers
// apps/gateway/src/services/headers.ts
// ═══════════════════════════════════════════════════════════════

import type { HeaderMultimap } from "../types";

/** Connection-scoped headers never forwarded in either direction. */
export const HOP_BY_HOP_HEADERS: readonly string[] = [
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "te",
  "trailer",
  "upgrade",
];

const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const FORBIDDEN_VALUE_CHARS = /[\r\n\0]/;

/** Node header dictionary (e.g. `headersDistinct`) → multimap. */
export function fromNodeHeaders(
  headers: Record<string, string | string[] | undefined>
): HeaderMultimap {
  const result: HeaderMultimap = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const key = name.toLowerCase();
    const values = Array.isArray(value) ? value : [value];
    result[key] = [...(result[key] ?? []), ...values];
  }
  return result;
}

/** First value of a header, looked up case-insensitively. */
export function firstHeader(headers: HeaderMultimap, name: string): string | undefined {
  const key = name.toLowerCase();
  for (const [header, values] of Object.entries(headers)) {
    if (header.toLowerCase() === key && values.length > 0) return values[0];
  }
  return undefined;
}

/** Copy of `headers` without the named headers (case-insensitive). */
export function withoutHeaders(headers: HeaderMultimap, names: readonly string[]): HeaderMultimap {
  const drop = new Set(names.map((n) => n.toLowerCase()));
  const result: HeaderMultimap = {};
  for (const [name, values] of Object.entries(headers)) {
    if (!drop.has(name.toLowerCase())) result[name] = [...values];
  }
  return result;
}

/**
 * Drop headers that Node would refuse to serialize: names that are
 * not HTTP tokens and values carrying CR, LF or NUL.
 */
export function sanitizeHeaders(
  headers: HeaderMultimap,
  onDrop?: (name: string) => void
): HeaderMultimap {
  const result: HeaderMultimap = {};
  for (const [name, values] of Object.entries(headers)) {
    if (!TOKEN.test(name)) {
      onDrop?.(name);
      continue;
    }
    const valid = values.filter((v) => !FORBIDDEN_VALUE_CHARS.test(v));
    if (valid.length !== values.length) onDrop?.(name);
    if (valid.length > 0) result[name] = valid;
  }
  return result;
}

/** Mask API credentials before they reach the log. */
export function maskAuthorization(value: string): string {
  if (value.startsWith("Bearer sk-") && value.length > 20) {
    return `${value.slice(0, 15)}***${value.slice(-4)}`;
  }
  return "***";
}
