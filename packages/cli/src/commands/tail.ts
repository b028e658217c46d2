/**
 * tapgate tail — follow the live trace stream
 *
 * Prints the retained history first, then each new trace as the
 * gateway records it.
 */

import { Command } from "commander";
import chalk from "chalk";
import WebSocket, { type RawData } from "ws";
import { traceMatches } from "@tapgate/types";
import { DEFAULT_TRACE_URL, parseTraceMessage, toWebSocketUrl } from "../lib/traces.js";
import { formatTraceLine } from "../lib/format.js";

interface TailOptions {
  url: string;
  filter?: string;
  json?: boolean;
}

function rawToText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export const tailCommand = new Command("tail")
  .description("Follow traces live")
  .option("--url <url>", "Trace server base URL", DEFAULT_TRACE_URL)
  .option("--filter <text>", "Only traces whose url or bodies contain this text")
  .option("--json", "Print one JSON object per line")
  .action((opts: TailOptions) => {
    const wsUrl = toWebSocketUrl(opts.url);
    const ws = new WebSocket(wsUrl);

    ws.on("open", () => {
      console.error(chalk.dim(`  Connected to ${wsUrl}. Waiting for traces...`));
    });

    ws.on("message", (data: RawData) => {
      const trace = parseTraceMessage(rawToText(data));
      if (!trace || !traceMatches(trace, opts.filter ?? "")) return;
      console.log(opts.json ? JSON.stringify(trace) : formatTraceLine(trace));
    });

    ws.on("close", () => {
      console.error(chalk.dim("  Trace stream closed."));
    });

    ws.on("error", (err) => {
      console.error(chalk.red(`✖  ${err.message}`));
      process.exitCode = 1;
    });
  });
