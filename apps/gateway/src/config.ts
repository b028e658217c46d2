// ═══════════════════════════════════════════════════════════════
// Tapgate — Gateway Configuration
// apps/gateway/src/config.ts
// ═══════════════════════════════════════════════════════════════

import { z } from "zod";
import type { GatewayConfig } from "./types";
import { DEFAULT_GATEWAY_CONFIG } from "./types";

const flag = z
  .string()
  .transform((v) => v === "true" || v === "1");

const configSchema = z.object({
  host: z.string().min(1).default(DEFAULT_GATEWAY_CONFIG.host),
  port: z.coerce.number().int().min(0).max(65_535).default(DEFAULT_GATEWAY_CONFIG.port),
  traceHost: z.string().min(1).default(DEFAULT_GATEWAY_CONFIG.traceHost),
  tracePort: z.coerce.number().int().min(0).max(65_535).default(DEFAULT_GATEWAY_CONFIG.tracePort),
  upstreamUrl: z.string().url().default(DEFAULT_GATEWAY_CONFIG.upstreamUrl),
  upstreamTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_GATEWAY_CONFIG.upstreamTimeoutMs),
  maxBodySizeBytes: z.coerce.number().int().positive().default(DEFAULT_GATEWAY_CONFIG.maxBodySizeBytes),
  maxTraces: z.coerce.number().int().positive().default(DEFAULT_GATEWAY_CONFIG.maxTraces),
  hookPath: z.string().min(1).optional(),
  hookTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_GATEWAY_CONFIG.hookTimeoutMs),
  debug: flag.default("false"),
});

export type EnvConfig = z.infer<typeof configSchema>;

/**
 * Read gateway settings from the environment.
 * Unset variables fall back to DEFAULT_GATEWAY_CONFIG.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const raw = {
    host: env.TAPGATE_HOST,
    port: env.TAPGATE_PORT,
    traceHost: env.TAPGATE_TRACE_HOST,
    tracePort: env.TAPGATE_TRACE_PORT,
    upstreamUrl: env.TAPGATE_UPSTREAM_URL,
    upstreamTimeoutMs: env.TAPGATE_UPSTREAM_TIMEOUT_MS,
    maxBodySizeBytes: env.TAPGATE_MAX_BODY_BYTES,
    maxTraces: env.TAPGATE_MAX_TRACES,
    hookPath: env.TAPGATE_HOOK || undefined,
    hookTimeoutMs: env.TAPGATE_HOOK_TIMEOUT_MS,
    debug: env.TAPGATE_DEBUG,
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`[Config] Invalid configuration:\n${errors}`);
  }

  return { ...DEFAULT_GATEWAY_CONFIG, ...result.data };
}
