// ═══════════════════════════════════════════════════════════════
// Tapgate — Hook Engine Tests
// apps/gateway/tests/hooks.test.ts
//
// Hook manager, script sandbox and JSON value decoding.
// ═══════════════════════════════════════════════════════════════

import { describe, it, expect } from "vitest";
import { HookManager } from "../src/hooks/hookManager";
import { ScriptSandbox, headersToTable, withSandbox } from "../src/hooks/sandbox";
import { decodeHeaderTable, decodeHookReturn, parseJson } from "../src/hooks/jsonValue";
import { SAMPLE_HOOK_SCRIPT } from "../src/hooks/sampleHook";
import { HookDecodeError, HookLoadError, SandboxError } from "../src/errors";
import type { HeaderMultimap } from "../src/types";

// ─────────────────────────────────────────────────────────────
// TEST FIXTURES
// ─────────────────────────────────────────────────────────────

const ECHO_HOOK = `
function processRequest(body, headers) { return [body, headers]; }
function processResponse(body, headers) { return [body, headers]; }
`;

const UPPERCASE_REQUEST_HOOK = `
function processRequest(body, headers) { return [body.toUpperCase(), headers]; }
`;

async function managerWith(code: string, timeoutMs = 1_000): Promise<HookManager> {
  const manager = new HookManager({ timeoutMs });
  await manager.loadSource(code, "test-hook.js");
  return manager;
}

function loadFailure(promise: Promise<unknown>): Promise<HookLoadError> {
  return promise.then(
    () => {
      throw new Error("expected load to fail");
    },
    (err: unknown) => {
      if (err instanceof HookLoadError) return err;
      throw err;
    }
  );
}

// ─────────────────────────────────────────────────────────────
// HOOK MANAGER
// ─────────────────────────────────────────────────────────────

describe("HookManager", () => {
  it("passes payloads through untouched when no script is loaded", () => {
    const manager = new HookManager();
    const body = Buffer.from("hello");
    const headers: HeaderMultimap = { "content-type": ["text/plain"] };

    const result = manager.runRequestHook(body, headers);

    expect(manager.enabled).toBe(false);
    expect(result.body).toBe(body);
    expect(result.headers).toBe(headers);
  });

  it("applies the request hook", async () => {
    const manager = await managerWith(UPPERCASE_REQUEST_HOOK);

    const result = manager.runRequestHook(Buffer.from("hello"), {});

    expect(result.body.toString("utf8")).toBe("HELLO");
  });

  it("leaves the response untouched when processResponse is not defined", async () => {
    const manager = await managerWith(UPPERCASE_REQUEST_HOOK);
    const body = Buffer.from("hello");
    const headers: HeaderMultimap = { "x-a": ["1"] };

    const result = manager.runResponseHook(body, headers);

    expect(result.body).toBe(body);
    expect(result.headers).toBe(headers);
  });

  it("round-trips headers with zero, one and many values", async () => {
    const manager = await managerWith(ECHO_HOOK);
    const headers: HeaderMultimap = {
      "content-type": ["application/json"],
      "x-multi": ["a", "b", "a"],
      "x-empty": [],
    };

    const result = manager.runRequestHook(Buffer.from("{}"), headers);

    expect(result.headers).toEqual(headers);
  });

  it("lower-cases header names handed to the script", async () => {
    const manager = await managerWith(ECHO_HOOK);

    const result = manager.runRequestHook(Buffer.from(""), { "Content-Type": ["text/plain"] });

    expect(result.headers).toEqual({ "content-type": ["text/plain"] });
  });

  it("accepts a bare string header value as a one-item list", async () => {
    const manager = await managerWith(`
      function processResponse(body, headers) {
        headers["x-test"] = "1";
        return [body, headers];
      }
    `);

    const result = manager.runResponseHook(Buffer.from("ok"), { "content-type": ["text/plain"] });

    expect(result.headers).toEqual({ "content-type": ["text/plain"], "x-test": ["1"] });
  });

  it("exposes the json helper to scripts", async () => {
    const manager = await managerWith(`
      function processRequest(body, headers) {
        const data = json.decode(body);
        data.model = "test-model";
        return [json.encode(data), headers];
      }
    `);

    const result = manager.runRequestHook(Buffer.from('{"model":"a","n":1}'), {});

    expect(result.body.toString("utf8")).toBe('{"model":"test-model","n":1}');
  });

  it("keeps the original bytes when the script returns the body unchanged", async () => {
    const manager = await managerWith(ECHO_HOOK);
    const body = Buffer.from([0xff, 0xfe, 0x00]);

    const result = manager.runRequestHook(body, {});

    expect(result.body).toBe(body);
  });

  it.each([
    ["throws", `function processRequest(body, headers) { throw new Error("boom"); }`],
    ["returns a number", `function processRequest(body, headers) { return 42; }`],
    ["returns nothing", `function processRequest(body, headers) {}`],
    ["returns a one-item list", `function processRequest(body, headers) { return [body]; }`],
    ["returns a bad header table", `function processRequest(body, headers) { return [body, { "x-a": 1 }]; }`],
    ["calls eval", `function processRequest(body, headers) { return [eval("1 + 1"), headers]; }`],
  ])("fails open when the script %s", async (_label, code) => {
    const manager = await managerWith(code);
    const body = Buffer.from('{"messages":[]}');
    const headers: HeaderMultimap = { authorization: ["Bearer test-secret"] };

    const result = manager.runRequestHook(body, headers);

    expect(result.body).toBe(body);
    expect(result.headers).toBe(headers);
  });

  it("fails open when the script runs past its time budget", async () => {
    const manager = await managerWith(`function processRequest(body, headers) { while (true) {} }`, 50);
    const body = Buffer.from("slow");

    const result = manager.runRequestHook(body, {});

    expect(result.body).toBe(body);
  });

  it("hides host globals from scripts", async () => {
    const manager = await managerWith(`
      function processRequest(body, headers) {
        return [[typeof process, typeof require, typeof Buffer].join(","), headers];
      }
    `);

    const result = manager.runRequestHook(Buffer.from(""), {});

    expect(result.body.toString("utf8")).toBe("undefined,undefined,undefined");
  });

  it("keeps host objects out of reach through constructor chains", async () => {
    const manager = await managerWith(`
      function processRequest(body, headers) {
        const p = this.constructor.constructor("return process")();
        return [typeof p + ":" + p.pid, headers];
      }
    `);
    const body = Buffer.from("x");

    const result = manager.runRequestHook(body, {});

    expect(result.body).toBe(body);
  });

  it("fails open when a thrown value's message getter never returns", async () => {
    const manager = await managerWith(
      `function processRequest(body, headers) { throw { get message() { while (true) {} } }; }`,
      50
    );
    const body = Buffer.from("stuck");
    const started = Date.now();

    const result = manager.runRequestHook(body, {});

    expect(result.body).toBe(body);
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it("rejects a script whose entry point getter outlasts the time budget", async () => {
    const manager = new HookManager({ timeoutMs: 50 });
    const started = Date.now();

    const err = await loadFailure(
      manager.loadSource(
        `Object.defineProperty(globalThis, "processRequest", { get() { while (true) {} } });`,
        "getter.js"
      )
    );

    expect(err.origin).toBe("getter.js");
    expect(manager.enabled).toBe(false);
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it("gives every run a fresh sandbox", async () => {
    const manager = await managerWith(`
      var count = 0;
      function processRequest(body, headers) { count += 1; return [String(count), headers]; }
    `);

    const first = manager.runRequestHook(Buffer.from(""), {});
    const second = manager.runRequestHook(Buffer.from(""), {});

    expect(first.body.toString("utf8")).toBe("1");
    expect(second.body.toString("utf8")).toBe("1");
  });

  it("reports the entry points of the loaded script", async () => {
    const manager = await managerWith(SAMPLE_HOOK_SCRIPT);

    const status = manager.status();

    expect(status.enabled).toBe(true);
    expect(status.origin).toBe("test-hook.js");
    expect(status.hasRequest).toBe(true);
    expect(status.hasResponse).toBe(true);
  });

  it("rejects a script with a syntax error", async () => {
    const manager = new HookManager();

    const err = await loadFailure(manager.loadSource("function processRequest(", "broken.js"));

    expect(err.reason).toBe("syntax-invalid");
    expect(err.origin).toBe("broken.js");
    expect(manager.enabled).toBe(false);
  });

  it("rejects a script without entry points", async () => {
    const manager = new HookManager();

    const err = await loadFailure(manager.loadSource("var answer = 42;"));

    expect(err.reason).toBe("no-entry-points");
  });

  it("rejects an unreadable script file", async () => {
    const manager = new HookManager();

    const err = await loadFailure(manager.load("/nonexistent/tapgate-hook.js"));

    expect(err.reason).toBe("unreadable");
    expect(err.origin).toBe("/nonexistent/tapgate-hook.js");
  });

  it("keeps the previous script when a reload fails", async () => {
    const manager = await managerWith(UPPERCASE_REQUEST_HOOK);

    await loadFailure(manager.loadSource("var nothing;", "second.js"));
    const result = manager.runRequestHook(Buffer.from("still"), {});

    expect(manager.status().origin).toBe("test-hook.js");
    expect(result.body.toString("utf8")).toBe("STILL");
  });

  it("disables hooks on unload", async () => {
    const manager = await managerWith(UPPERCASE_REQUEST_HOOK);

    await manager.unload();
    const result = manager.runRequestHook(Buffer.from("quiet"), {});

    expect(manager.enabled).toBe(false);
    expect(result.body.toString("utf8")).toBe("quiet");
  });
});

// ─────────────────────────────────────────────────────────────
// SCRIPT SANDBOX
// ─────────────────────────────────────────────────────────────

describe("ScriptSandbox", () => {
  it("invokes an entry point and decodes its result", () => {
    const output = withSandbox({ timeoutMs: 1_000 }, (sandbox) => {
      sandbox.load(`function processResponse(body, headers) { return [body + "!", headers]; }`);
      return sandbox.invoke("processResponse", "done", { "x-a": ["1"] });
    });

    expect(output).toEqual({ body: "done!", headers: { "x-a": ["1"] } });
  });

  it("reports which entry points exist", () => {
    const sandbox = new ScriptSandbox({ timeoutMs: 1_000 });
    sandbox.load(UPPERCASE_REQUEST_HOOK);

    expect(sandbox.has("processRequest")).toBe(true);
    expect(sandbox.has("processResponse")).toBe(false);
  });

  it("raises SandboxError for a missing entry point", () => {
    const sandbox = new ScriptSandbox({ timeoutMs: 1_000 });
    sandbox.load(UPPERCASE_REQUEST_HOOK);

    expect(() => sandbox.invoke("processResponse", "", {})).toThrow(SandboxError);
  });

  it("bounds entry point lookups by the time budget", () => {
    const sandbox = new ScriptSandbox({ timeoutMs: 50 });
    sandbox.load(`Object.defineProperty(globalThis, "processResponse", { get() { while (true) {} } });`);

    expect(() => sandbox.has("processResponse")).toThrow(SandboxError);
  });

  it("raises SandboxError once disposed", () => {
    const sandbox = new ScriptSandbox({ timeoutMs: 1_000 });
    sandbox.dispose();

    expect(() => sandbox.load(ECHO_HOOK)).toThrow(SandboxError);
  });

  it("raises HookDecodeError for a result of the wrong shape", () => {
    const sandbox = new ScriptSandbox({ timeoutMs: 1_000 });
    sandbox.load(`function processRequest(body, headers) { return { body, headers }; }`);

    expect(() => sandbox.invoke("processRequest", "", {})).toThrow(HookDecodeError);
  });

  it("merges header names that collide once lower-cased", () => {
    expect(headersToTable({ Accept: ["a"], accept: ["b"] })).toEqual({ accept: ["a", "b"] });
  });
});

// ─────────────────────────────────────────────────────────────
// JSON VALUES
// ─────────────────────────────────────────────────────────────

describe("JSON value decoding", () => {
  it("normalizes header tables", () => {
    expect(decodeHeaderTable({ "X-A": "1", "x-a": ["2", "3"] })).toEqual({ "x-a": ["1", "2", "3"] });
  });

  it("rejects non-string header values", () => {
    expect(() => decodeHeaderTable({ "x-a": 1 })).toThrow(HookDecodeError);
    expect(() => decodeHeaderTable(["x-a"])).toThrow(HookDecodeError);
  });

  it("decodes a [body, headers] pair", () => {
    expect(decodeHookReturn(["text", { "content-type": "text/plain" }])).toEqual({
      body: "text",
      headers: { "content-type": ["text/plain"] },
    });
  });

  it("rejects anything but a [body, headers] pair", () => {
    expect(() => decodeHookReturn(["text"])).toThrow(HookDecodeError);
    expect(() => decodeHookReturn([1, {}])).toThrow(HookDecodeError);
    expect(() => decodeHookReturn(null)).toThrow(HookDecodeError);
  });

  it("raises HookDecodeError for malformed JSON text", () => {
    expect(() => parseJson("{")).toThrow(HookDecodeError);
    expect(parseJson('{"a":[1,true,null]}')).toEqual({ a: [1, true, null] });
  });
});
