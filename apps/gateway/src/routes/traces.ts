// ═══════════════════════════════════════════════════════════════
// Tapgate — Trace & Health Routes
// apps/gateway/src/routes/traces.ts
//
// Non-proxied endpoints served on the trace port: the retained
// trace history, single-trace lookup, and gateway health.
// ═══════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from "express";
import { traceMatches } from "@tapgate/types";
import type { HookManager } from "../hooks/hookManager";
import type { TraceHub } from "../services/traceHub";
import { toTraceMessage } from "../services/trace";

export interface TraceRouteConfig {
  traceHub: TraceHub;
  hookManager: HookManager;
  startedAt: number;
}

export function createTraceRoutes(config: TraceRouteConfig): Router {
  const router = Router();
  const { traceHub, hookManager, startedAt } = config;

  // ─── Trace history, oldest first ───
  // GET /traces?q=term filters on url, request body and response body.
  router.get("/traces", (req: Request, res: Response) => {
    const term = typeof req.query.q === "string" ? req.query.q : "";
    const traces = traceHub
      .snapshot()
      .map(toTraceMessage)
      .filter((trace) => traceMatches(trace, term));
    res.status(200).json(traces);
  });

  router.get("/traces/:id", (req: Request, res: Response) => {
    const trace = traceHub.find(req.params.id);
    if (!trace) {
      res.status(404).json({
        error: "TRACE_NOT_FOUND",
        message: `No retained trace with id: ${req.params.id}`,
      });
      return;
    }
    res.status(200).json(toTraceMessage(trace));
  });

  // ─── Liveness ───
  router.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      uptime: Math.round((Date.now() - startedAt) / 1000),
      traces: traceHub.snapshot().length,
      observers: traceHub.observerCount(),
      hooks: hookManager.status(),
    });
  });

  return router;
}
