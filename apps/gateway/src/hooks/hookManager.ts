// ═══════════════════════════════════════════════════════════════
// Tapgate — Hook Manager
// apps/gateway/src/hooks/hookManager.ts
//
// Owns the currently loaded hook script and runs its entry points
// against requests and responses. Hook failures never reach the
// client: any error falls back to the original body and headers.
//
// Loads are serialized; each run works on a snapshot of the
// source taken when it starts, so a reload never tears a run.
// ═══════════════════════════════════════════════════════════════

import { readFile } from "node:fs/promises";
import type { HeaderMultimap, HookResult } from "../types";
import { HookLoadError, describeError } from "../errors";
import { withSandbox, type EntryPoint } from "./sandbox";

// ─────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────

export interface HookSource {
  readonly code: string;
  /** File path, or "<inline>" for sources loaded from text. */
  readonly origin: string;
  readonly hasRequest: boolean;
  readonly hasResponse: boolean;
  readonly loadedAt: Date;
}

export interface HookStatus {
  enabled: boolean;
  origin: string | null;
  hasRequest: boolean;
  hasResponse: boolean;
  loadedAt: string | null;
}

export interface HookManagerOptions {
  /** Budget for one script execution or entry point call (ms). */
  timeoutMs: number;
}

export const DEFAULT_HOOK_MANAGER_OPTIONS: HookManagerOptions = {
  timeoutMs: 1_000,
};

// ─────────────────────────────────────────────────────────────
// MANAGER
// ─────────────────────────────────────────────────────────────

export class HookManager {
  private source: HookSource | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly options: HookManagerOptions;

  constructor(options?: Partial<HookManagerOptions>) {
    this.options = { ...DEFAULT_HOOK_MANAGER_OPTIONS, ...options };
  }

  get enabled(): boolean {
    return this.source !== null;
  }

  /**
   * Read a hook script from disk and install it.
   * On failure the previously loaded script stays active.
   */
  load(path: string): Promise<HookSource> {
    return this.serialize(async () => {
      let code: string;
      try {
        code = await readFile(path, "utf8");
      } catch (err) {
        throw new HookLoadError(`Failed to read hook script ${path}: ${describeError(err)}`, "unreadable", path);
      }
      return this.install(code, path);
    });
  }

  /** Install a hook script from source text. */
  loadSource(code: string, origin = "<inline>"): Promise<HookSource> {
    return this.serialize(async () => this.install(code, origin));
  }

  /** Disable hooks. Runs already in flight finish on their snapshot. */
  unload(): Promise<void> {
    return this.serialize(async () => {
      if (this.source) {
        console.log(`[Hooks] Hook script ${this.source.origin} unloaded.`);
      }
      this.source = null;
    });
  }

  status(): HookStatus {
    const source = this.source;
    return {
      enabled: source !== null,
      origin: source?.origin ?? null,
      hasRequest: source?.hasRequest ?? false,
      hasResponse: source?.hasResponse ?? false,
      loadedAt: source?.loadedAt.toISOString() ?? null,
    };
  }

  runRequestHook(body: Buffer, headers: HeaderMultimap): HookResult {
    return this.run("processRequest", body, headers);
  }

  runResponseHook(body: Buffer, headers: HeaderMultimap): HookResult {
    return this.run("processResponse", body, headers);
  }

  // ─── Internal Helpers ───

  private run(entry: EntryPoint, body: Buffer, headers: HeaderMultimap): HookResult {
    const source = this.source;
    if (!source) return { body, headers };

    const defined = entry === "processRequest" ? source.hasRequest : source.hasResponse;
    if (!defined) return { body, headers };

    const text = body.toString("utf8");
    try {
      const output = withSandbox(
        { timeoutMs: this.options.timeoutMs, filename: source.origin },
        (sandbox) => {
          sandbox.load(source.code);
          return sandbox.invoke(entry, text, headers);
        }
      );

      console.log(`[Hooks] ${entry} executed.`);
      return {
        // Unchanged text keeps the original bytes.
        body: output.body === text ? body : Buffer.from(output.body, "utf8"),
        headers: output.headers,
      };
    } catch (err) {
      console.error(`[Hooks] ${entry} failed, using original payload: ${describeError(err)}`);
      return { body, headers };
    }
  }

  private install(code: string, origin: string): HookSource {
    let probe: { hasRequest: boolean; hasResponse: boolean };
    try {
      probe = withSandbox({ timeoutMs: this.options.timeoutMs, filename: origin }, (sandbox) => {
        sandbox.load(code);
        return {
          hasRequest: sandbox.has("processRequest"),
          hasResponse: sandbox.has("processResponse"),
        };
      });
    } catch (err) {
      throw new HookLoadError(`Failed to load hook script ${origin}: ${describeError(err)}`, "syntax-invalid", origin);
    }

    if (!probe.hasRequest && !probe.hasResponse) {
      throw new HookLoadError(
        `Hook script ${origin} must define at least one of processRequest or processResponse.`,
        "no-entry-points",
        origin
      );
    }

    const source: HookSource = Object.freeze({
      code,
      origin,
      hasRequest: probe.hasRequest,
      hasResponse: probe.hasResponse,
      loadedAt: new Date(),
    });
    this.source = source;

    console.log(
      `[Hooks] Hook script loaded from ${origin} (processRequest: ${probe.hasRequest}, processResponse: ${probe.hasResponse})`
    );
    return source;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task);
    this.queue = next.catch(() => undefined);
    return next;
  }
}
