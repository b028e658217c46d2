// ═══════════════════════════════════════════════════════════════
// Tapgate — Gateway Entrypoint
// apps/gateway/src/index.ts
//
// Bootstraps the gateway from TAPGATE_* environment variables.
// ═══════════════════════════════════════════════════════════════

import { loadConfig } from "./config";
import { startGateway } from "./server";

async function main(): Promise<void> {
  await startGateway(loadConfig());
}

main().catch((err: unknown) => {
  console.error("[Gateway] Failed to start:", err);
  process.exit(1);
});
