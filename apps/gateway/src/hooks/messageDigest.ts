// ═══════════════════════════════════════════════════════════════
// Tapgate — Message Digest Hook
// apps/gateway/src/hooks/messageDigest.ts
//
// Always-on pre-hook for chat-style payloads. Logs a "role: content"
// transcript of the `messages` array and forwards the request
// untouched. Anything it cannot read is passed through silently.
// ═══════════════════════════════════════════════════════════════

import type { HeaderMultimap, HookResult } from "../types";
import { isJsonObject, type JsonObject, type JsonValue } from "./jsonValue";

const DIGEST_EDGE_CHARS = 1_000;

export interface MessageDigest {
  /** The request's messages, exactly as received. */
  messages: JsonObject[];
  /** Transcript, middle-truncated when long. */
  transcript: string;
}

/** Keep the first and last `edge` characters of long text. */
export function truncateMiddle(text: string, edge = DIGEST_EDGE_CHARS): string {
  if (text.length <= edge * 2) return text;
  return `${text.slice(0, edge)}\n......\n${text.slice(text.length - edge)}`;
}

/**
 * Build a digest of a chat request body.
 * Returns null unless the body is a JSON object whose `messages`
 * field is an array of objects.
 */
export function digestMessages(body: Buffer): MessageDigest | null {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(body.toString("utf8"));
  } catch {
    return null;
  }
  if (!isJsonObject(parsed)) return null;

  const raw = parsed.messages;
  if (!Array.isArray(raw)) return null;

  const messages: JsonObject[] = [];
  for (const message of raw) {
    if (!isJsonObject(message)) return null;
    messages.push(message);
  }

  let transcript = "";
  for (const { role, content } of messages) {
    if (typeof role === "string" && typeof content === "string") {
      transcript += `${role}: ${content}\n`;
    }
  }

  return { messages, transcript: truncateMiddle(transcript) };
}

export function messageDigestHook(body: Buffer, headers: HeaderMultimap): HookResult {
  const digest = digestMessages(body);
  if (digest) {
    console.log(`[Hooks] Messages in session (${digest.messages.length}):\n${digest.transcript}`);
  }
  return { body, headers };
}
