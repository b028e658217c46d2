// ═══════════════════════════════════════════════════════════════
// Tapgate — JSON Values
// apps/gateway/src/hooks/jsonValue.ts
//
// Everything crossing the sandbox boundary travels as JSON text
// and is decoded here into typed host values. Shape mismatches
// raise HookDecodeError instead of producing wrong shapes.
// ═══════════════════════════════════════════════════════════════

import { z } from "zod";
import type { HeaderMultimap } from "../types";
import { HookDecodeError } from "../errors";

export type JsonPrimitive = string | number | boolean | null;
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];

const headerValueSchema = z.union([z.string(), z.array(z.string())]);
const headerTableSchema = z.record(headerValueSchema);
const hookReturnSchema = z.tuple([z.string(), headerTableSchema]);

/** Parse JSON text, throwing HookDecodeError on malformed input. */
export function parseJson(text: string): JsonValue {
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch (err) {
    throw new HookDecodeError("Invalid JSON", [err instanceof Error ? err.message : String(err)]);
  }
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert a script header table into a header multimap.
 * Keys are lower-cased; keys equal ignoring case are merged in order.
 * A bare string value becomes a one-item list.
 */
export function decodeHeaderTable(value: JsonValue): HeaderMultimap {
  const parsed = headerTableSchema.safeParse(value);
  if (!parsed.success) {
    throw new HookDecodeError("Header table must map names to strings or string lists", formatIssues(parsed.error));
  }
  return normalizeTable(parsed.data);
}

/** Decode the [body, headers] pair an entry point returns. */
export function decodeHookReturn(value: JsonValue): { body: string; headers: HeaderMultimap } {
  const parsed = hookReturnSchema.safeParse(value);
  if (!parsed.success) {
    throw new HookDecodeError("Hook must return [body, headers]", formatIssues(parsed.error));
  }
  const [body, table] = parsed.data;
  return { body, headers: normalizeTable(table) };
}

function normalizeTable(table: Record<string, string | string[]>): HeaderMultimap {
  const headers: HeaderMultimap = {};
  for (const [name, raw] of Object.entries(table)) {
    const key = name.toLowerCase();
    if (key === "__proto__") continue;
    const values = typeof raw === "string" ? [raw] : raw;
    headers[key] = [...(headers[key] ?? []), ...values];
  }
  return headers;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
}
