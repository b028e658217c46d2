/**
 * Flag parsing for `tapgate serve`. Flags win over TAPGATE_* variables.
 */

import { InvalidArgumentError } from "commander";
import { loadConfig, type GatewayConfig } from "@tapgate/gateway";

export interface ServeOptions {
  host?: string;
  port?: number;
  traceHost?: string;
  tracePort?: number;
  upstream?: string;
  hook?: string;
  hookTimeout?: number;
  timeout?: number;
  maxTraces?: number;
  debug?: boolean;
}

/** Commander argument parser for non-negative integers. */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

export function buildServeConfig(opts: ServeOptions, env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const config = loadConfig(env);

  if (opts.host !== undefined) config.host = opts.host;
  if (opts.port !== undefined) config.port = opts.port;
  if (opts.traceHost !== undefined) config.traceHost = opts.traceHost;
  if (opts.tracePort !== undefined) config.tracePort = opts.tracePort;
  if (opts.upstream !== undefined) config.upstreamUrl = opts.upstream;
  if (opts.hook !== undefined) config.hookPath = opts.hook;
  if (opts.hookTimeout !== undefined) config.hookTimeoutMs = opts.hookTimeout;
  if (opts.timeout !== undefined) config.upstreamTimeoutMs = opts.timeout;
  if (opts.maxTraces !== undefined) config.maxTraces = opts.maxTraces;
  if (opts.debug) config.debug = true;

  return config;
}

/** Commander argument parser for absolute URLs. */
export function parseUrl(value: string): string {
  if (!URL.canParse(value)) {
    throw new InvalidArgumentError("Expected an absolute URL.");
  }
  return value;
}
