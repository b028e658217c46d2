#!/usr/bin/env -S npx tsx
/**
 * Tapgate CLI — tapgate <command>
 *
 * Commands:
 *   serve        — run the proxy and the trace server
 *   sample-hook  — print a starter hook script
 *   traces       — list recent traces
 *   tail         — follow traces live
 */

import { program } from "commander";
import { serveCommand } from "./commands/serve.js";
import { sampleHookCommand } from "./commands/sampleHook.js";
import { tracesCommand } from "./commands/traces.js";
import { tailCommand } from "./commands/tail.js";

program
  .name("tapgate")
  .description("Programmable reverse proxy with script hooks and a live trace stream")
  .version("0.1.0");

program.addCommand(serveCommand);
program.addCommand(sampleHookCommand);
program.addCommand(tracesCommand);
program.addCommand(tailCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
