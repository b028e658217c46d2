// ═══════════════════════════════════════════════════════════════
// Tapgate — Script Sandbox
// apps/gateway/src/hooks/sandbox.ts
//
// One throwaway vm context per hook invocation. The context is built
// from a null-prototype object, so constructor lookups stay inside
// the sandbox realm where code generation from strings is off. Script
// code sees only JavaScript builtins plus a frozen `json` helper.
// Inputs, outputs and error messages cross the realm boundary as
// strings, and every call into the context runs under the timeout.
// ═══════════════════════════════════════════════════════════════

import vm from "node:vm";
import type { HeaderMultimap } from "../types";
import { SandboxError, HookDecodeError, describeError } from "../errors";
import { decodeHookReturn, parseJson } from "./jsonValue";

// ─────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────

export type EntryPoint = "processRequest" | "processResponse";

export interface SandboxOptions {
  /** Budget for each script execution and each entry point call. */
  timeoutMs: number;
  /** Shown in stack traces. */
  filename?: string;
}

export interface SandboxOutput {
  body: string;
  headers: HeaderMultimap;
}

const INPUT_SLOT = "__tapgateInput";
const THROWN_SLOT = "__tapgateThrown";

const PRELUDE = `
globalThis.json = Object.freeze({
  decode: (text) => JSON.parse(text),
  encode: (value) => JSON.stringify(value),
});
globalThis.__tapgateDescribe = (err) => {
  try {
    return String(err !== null && typeof err === "object" && "message" in err ? err.message : err);
  } catch {
    return "unprintable error";
  }
};
`;

// ─────────────────────────────────────────────────────────────
// HEADER TABLES
// ─────────────────────────────────────────────────────────────

/**
 * Host headers → script table. Keys are lower-cased and values of
 * names that collide once lower-cased are concatenated in order.
 */
export function headersToTable(headers: HeaderMultimap): HeaderMultimap {
  const table: HeaderMultimap = {};
  for (const [name, values] of Object.entries(headers)) {
    const key = name.toLowerCase();
    table[key] = [...(table[key] ?? []), ...values];
  }
  return table;
}

// ─────────────────────────────────────────────────────────────
// SANDBOX
// ─────────────────────────────────────────────────────────────

export class ScriptSandbox {
  private context: vm.Context | null;
  private readonly options: SandboxOptions;

  constructor(options: SandboxOptions) {
    this.options = options;
    this.context = vm.createContext(
      Object.create(null),
      {
        name: "tapgate-hook",
        codeGeneration: { strings: false, wasm: false },
        microtaskMode: "afterEvaluate",
      }
    );
    vm.runInContext(PRELUDE, this.context);
  }

  /** Execute script source at the top level of this sandbox. */
  load(source: string): void {
    const context = this.requireContext();
    try {
      const script = new vm.Script(source, { filename: this.options.filename ?? "hook.js" });
      script.runInContext(context, { timeout: this.options.timeoutMs });
    } catch (err) {
      throw new SandboxError(this.describeThrown(err), "load");
    }
  }

  /** Whether the loaded script defines the entry point as a function. */
  has(entry: EntryPoint): boolean {
    const context = this.requireContext();
    try {
      // An accessor on the global runs script code here too.
      return vm.runInContext(`typeof ${entry} === "function"`, context, { timeout: this.options.timeoutMs }) === true;
    } catch (err) {
      throw new SandboxError(`${entry} lookup failed: ${this.describeThrown(err)}`, "invoke");
    }
  }

  /**
   * Call an entry point with (body, headers) and decode the
   * [body, headers] pair it returns.
   */
  invoke(entry: EntryPoint, body: string, headers: HeaderMultimap): SandboxOutput {
    const context = this.requireContext();
    if (!this.has(entry)) {
      throw new SandboxError(`${entry} is not defined`, "invoke");
    }

    context[INPUT_SLOT] = JSON.stringify({ body, headers: headersToTable(headers) });

    let encoded: unknown;
    try {
      encoded = vm.runInContext(
        `(() => {
          const input = JSON.parse(globalThis.${INPUT_SLOT});
          delete globalThis.${INPUT_SLOT};
          const result = ${entry}(input.body, input.headers);
          return JSON.stringify(result === undefined ? null : result);
        })()`,
        context,
        { timeout: this.options.timeoutMs }
      );
    } catch (err) {
      throw new SandboxError(`${entry} failed: ${this.describeThrown(err)}`, "invoke");
    }

    if (typeof encoded !== "string") {
      throw new HookDecodeError(`${entry} returned a value that is not JSON-serializable`);
    }
    return decodeHookReturn(parseJson(encoded));
  }

  /** Drop the context. The sandbox cannot be used afterwards. */
  dispose(): void {
    this.context = null;
  }

  /**
   * Host errors (timeouts, syntax errors) are read directly. Values
   * thrown by script code are stringified inside the context so that
   * their accessors stay under the timeout.
   */
  private describeThrown(err: unknown): string {
    if (err instanceof Error || !this.context) return describeError(err);
    const context = this.context;
    context[THROWN_SLOT] = err;
    try {
      const text: unknown = vm.runInContext(
        `(() => {
          const thrown = globalThis.${THROWN_SLOT};
          delete globalThis.${THROWN_SLOT};
          return __tapgateDescribe(thrown);
        })()`,
        context,
        { timeout: this.options.timeoutMs }
      );
      return typeof text === "string" ? text : "unprintable error";
    } catch {
      return "unprintable error";
    }
  }

  private requireContext(): vm.Context {
    if (!this.context) {
      throw new SandboxError("Sandbox already disposed", "invoke");
    }
    return this.context;
  }
}

/**
 * Create a sandbox, hand it to `fn`, and discard it afterwards.
 * Sandboxes are never reused across invocations.
 */
export function withSandbox<T>(options: SandboxOptions, fn: (sandbox: ScriptSandbox) => T): T {
  const sandbox = new ScriptSandbox(options);
  try {
    return fn(sandbox);
  } finally {
    sandbox.dispose();
  }
}
