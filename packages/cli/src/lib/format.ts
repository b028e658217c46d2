/**
 * Terminal formatting for traces.
 */

import chalk, { type ChalkInstance } from "chalk";
import type { TraceMessage } from "@tapgate/types";

/** Last path segment of the target URL, e.g. "completions". */
export function endpointName(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }
  return pathname.split("/").filter(Boolean).pop() ?? "/";
}

function paintStatus(status: string, paint: ChalkInstance): string {
  if (status.startsWith("2")) return paint.green(status);
  if (status.startsWith("4") || status.startsWith("5")) return paint.red(status);
  return paint.yellow(status);
}

/** One line per trace: time (UTC), method, status, latency, endpoint. */
export function formatTraceLine(trace: TraceMessage, paint: ChalkInstance = chalk): string {
  const time = new Date(trace.timestamp).toISOString().slice(11, 19);
  return (
    `  ${paint.dim(time)}  ${paint.bold(trace.method.padEnd(6))}  ` +
    `${paintStatus(trace.status, paint)}  ` +
    `${trace.latency.toFixed(3).padStart(7)}s  ` +
    `${endpointName(trace.url)}`
  );
}
