/**
 * tapgate traces — list the traces the gateway currently retains
 */

import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { DEFAULT_TRACE_URL, fetchTraces } from "../lib/traces.js";
import { formatTraceLine } from "../lib/format.js";

interface TracesOptions {
  url: string;
  filter?: string;
  json?: boolean;
}

export const tracesCommand = new Command("traces")
  .description("List recent traces")
  .option("--url <url>", "Trace server base URL", DEFAULT_TRACE_URL)
  .option("--filter <text>", "Only traces whose url or bodies contain this text")
  .option("--json", "Print raw JSON")
  .action(async (opts: TracesOptions) => {
    const spinner = ora("Fetching traces...").start();
    try {
      const traces = await fetchTraces(opts.url, opts.filter);
      spinner.stop();

      if (opts.json) {
        console.log(JSON.stringify(traces, null, 2));
        return;
      }

      if (traces.length === 0) {
        console.log(chalk.dim("\n  No traces recorded yet.\n"));
        return;
      }

      console.log();
      console.log(chalk.bold(`  Recent Traces (${traces.length})`));
      console.log(chalk.dim("  ─────────────────────────────────────────────────────────────"));
      for (const trace of traces) {
        console.log(formatTraceLine(trace));
      }
      console.log();
    } catch (err) {
      spinner.fail(`Failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });
