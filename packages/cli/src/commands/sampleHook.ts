/**
 * tapgate sample-hook — print a starter hook script
 */

import { Command } from "commander";
import { SAMPLE_HOOK_SCRIPT } from "@tapgate/gateway";

export const sampleHookCommand = new Command("sample-hook")
  .description("Print a sample hook script defining processRequest and processResponse")
  .action(() => {
    process.stdout.write(SAMPLE_HOOK_SCRIPT);
  });
