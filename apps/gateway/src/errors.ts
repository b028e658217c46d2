// ═══════════════════════════════════════════════════════════════
// Tapgate — Error Types
// apps/gateway/src/errors.ts
// ═══════════════════════════════════════════════════════════════

export type HookLoadFailure = "unreadable" | "syntax-invalid" | "no-entry-points";

/** A hook script could not be installed. The previous script stays active. */
export class HookLoadError extends Error {
  constructor(
    message: string,
    public readonly reason: HookLoadFailure,
    public readonly origin: string
  ) {
    super(message);
    this.name = "HookLoadError";
  }
}

/** A hook returned values that do not fit the [body, headers] contract. */
export class HookDecodeError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "HookDecodeError";
  }
}

/** Script code threw, timed out, or lacks the requested entry point. */
export class SandboxError extends Error {
  constructor(message: string, public readonly stage: "load" | "invoke") {
    super(message);
    this.name = "SandboxError";
  }
}

/** A compressed payload could not be decoded. */
export class CodecError extends Error {
  constructor(
    message: string,
    public readonly encoding: string,
    public readonly original: Buffer
  ) {
    super(message);
    this.name = "CodecError";
  }
}

/** The trace hub no longer accepts messages. */
export class TraceHubClosedError extends Error {
  constructor() {
    super("Trace hub is closed.");
    this.name = "TraceHubClosedError";
  }
}

/**
 * Message of anything thrown. Errors raised inside a vm context come
 * from another realm and fail `instanceof Error`, so match on shape.
 */
export function describeError(err: unknown): string {
  if (typeof err === "object" && err !== null && "message" in err) {
    const { message } = err;
    const name = "name" in err && typeof err.name === "string" ? err.name : "Error";
    if (typeof message === "string") return `${name}: ${message}`;
  }
  return String(err);
}
