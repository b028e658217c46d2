/**
 * tapgate serve — run the gateway in the foreground
 */

import { Command } from "commander";
import chalk from "chalk";
import { startGateway } from "@tapgate/gateway";
import { buildServeConfig, parseInteger, parseUrl, type ServeOptions } from "../lib/serveConfig.js";

export const serveCommand = new Command("serve")
  .description("Start the proxy and the trace server")
  .option("--host <host>", "Proxy listen host (or set TAPGATE_HOST)")
  .option("--port <port>", "Proxy listen port (or set TAPGATE_PORT)", parseInteger)
  .option("--trace-host <host>", "Trace server listen host (or set TAPGATE_TRACE_HOST)")
  .option("--trace-port <port>", "Trace server listen port (or set TAPGATE_TRACE_PORT)", parseInteger)
  .option("--upstream <url>", "Upstream API origin (or set TAPGATE_UPSTREAM_URL)", parseUrl)
  .option("--hook <file>", "Hook script loaded at startup (or set TAPGATE_HOOK)")
  .option("--hook-timeout <ms>", "Budget for one hook run", parseInteger)
  .option("--timeout <ms>", "Upstream timeout", parseInteger)
  .option("--max-traces <n>", "Traces kept in memory", parseInteger)
  .option("--debug", "Log headers and bodies of every exchange")
  .action(async (opts: ServeOptions) => {
    try {
      await startGateway(buildServeConfig(opts));
    } catch (err) {
      console.error(chalk.red(`✖  ${err instanceof Error ? err.message : String(err)}`));
      process.exit(1);
    }
  });
