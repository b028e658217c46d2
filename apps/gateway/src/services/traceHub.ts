// ═══════════════════════════════════════════════════════════════
// Tapgate — Trace Hub
// apps/gateway/src/services/traceHub.ts
//
// Single-writer actor that owns the trace history and the set of
// live observers. Every mutation arrives as a message in one
// mailbox and is processed strictly one at a time, so history and
// observers never need a lock.
//
// New observers get the full history replayed before they join
// the broadcast set: snapshot first, then live tail, with no
// duplicates. A failed or stalled write drops that observer.
// ═══════════════════════════════════════════════════════════════

import type { Trace } from "../types";
import { TraceHubClosedError, describeError } from "../errors";
import { TraceHistory } from "./traceHistory";
import { toTraceMessage } from "./trace";

// ─────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────

/** A live subscriber to the trace stream. */
export interface TraceObserver {
  readonly id: string;
  /** Deliver one JSON-encoded trace. Rejects when the write fails. */
  send(payload: string): Promise<void>;
  /** Release the underlying connection. Must be safe to call twice. */
  close(): void;
}

type HubMessage =
  | { type: "register"; observer: TraceObserver }
  | { type: "unregister"; observer: TraceObserver }
  | { type: "broadcast"; trace: Trace }
  | { type: "shutdown" };

interface Envelope {
  message: HubMessage;
  resolve: () => void;
  reject: (err: Error) => void;
}

export interface TraceHubOptions {
  /** Traces kept in history. */
  maxTraces: number;
  /** Longest wait on a single observer write (ms). */
  deliveryTimeoutMs: number;
}

export const DEFAULT_TRACE_HUB_OPTIONS: TraceHubOptions = {
  maxTraces: 100,
  deliveryTimeoutMs: 5_000,
};

// ─────────────────────────────────────────────────────────────
// HUB
// ─────────────────────────────────────────────────────────────

export class TraceHub {
  private readonly history: TraceHistory;
  private readonly observers = new Map<string, TraceObserver>();
  private readonly mailbox: Envelope[] = [];
  private readonly options: TraceHubOptions;
  private draining = false;
  private closed = false;

  constructor(options?: Partial<TraceHubOptions>) {
    this.options = { ...DEFAULT_TRACE_HUB_OPTIONS, ...options };
    this.history = new TraceHistory(this.options.maxTraces);
  }

  /** Replay history to the observer, then add it to the broadcast set. */
  register(observer: TraceObserver): Promise<void> {
    return this.post({ type: "register", observer });
  }

  /** Remove and close the observer. No-op if it is already gone. */
  unregister(observer: TraceObserver): Promise<void> {
    return this.post({ type: "unregister", observer });
  }

  /**
   * Record a trace and deliver it to every observer.
   * Settles once the hub has processed it; traces are never dropped.
   */
  broadcast(trace: Trace): Promise<void> {
    return this.post({ type: "broadcast", trace });
  }

  /** History copy, oldest first. */
  snapshot(): Trace[] {
    return this.history.toArray();
  }

  find(id: string): Trace | undefined {
    return this.history.find(id);
  }

  observerCount(): number {
    return this.observers.size;
  }

  /** Process what is queued, close every observer, refuse further messages. */
  async close(): Promise<void> {
    if (this.closed) return;
    const done = this.post({ type: "shutdown" });
    this.closed = true;
    await done;
  }

  // ─── Mailbox ───

  private post(message: HubMessage): Promise<void> {
    if (this.closed) {
      return Promise.reject(new TraceHubClosedError());
    }
    return new Promise<void>((resolve, reject) => {
      this.mailbox.push({ message, resolve, reject });
      if (!this.draining) {
        this.draining = true;
        this.drain().catch((err) => {
          console.error(`[TraceHub] Mailbox loop failed: ${describeError(err)}`);
        });
      }
    });
  }

  private async drain(): Promise<void> {
    try {
      let envelope = this.mailbox.shift();
      while (envelope) {
        try {
          await this.process(envelope.message);
          envelope.resolve();
        } catch (err) {
          envelope.reject(err instanceof Error ? err : new Error(String(err)));
        }
        envelope = this.mailbox.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private async process(message: HubMessage): Promise<void> {
    switch (message.type) {
      case "register":
        return this.handleRegister(message.observer);
      case "unregister":
        this.drop(message.observer);
        return;
      case "broadcast":
        return this.handleBroadcast(message.trace);
      case "shutdown":
        for (const observer of this.observers.values()) observer.close();
        this.observers.clear();
        console.log("[TraceHub] Closed.");
        return;
    }
  }

  // ─── Handlers ───

  private async handleRegister(observer: TraceObserver): Promise<void> {
    if (this.observers.has(observer.id)) return;

    for (const trace of this.history.toArray()) {
      try {
        await this.deliver(observer, encode(trace));
      } catch (err) {
        console.warn(`[TraceHub] Error sending history to observer ${observer.id}: ${describeError(err)}`);
        observer.close();
        return;
      }
    }

    this.observers.set(observer.id, observer);
    console.log(`[TraceHub] Observer ${observer.id} registered (${this.observers.size} connected).`);
  }

  private async handleBroadcast(trace: Trace): Promise<void> {
    this.history.push(trace);
    if (this.observers.size === 0) return;

    const payload = encode(trace);
    console.log(`[TraceHub] Broadcasting trace ${trace.id} to ${this.observers.size} observers`);

    await Promise.all(
      [...this.observers.values()].map(async (observer) => {
        try {
          await this.deliver(observer, payload);
        } catch (err) {
          console.warn(`[TraceHub] Write error for observer ${observer.id}: ${describeError(err)}`);
          this.drop(observer);
        }
      })
    );
  }

  private drop(observer: TraceObserver): void {
    if (!this.observers.delete(observer.id)) return;
    observer.close();
    console.log(`[TraceHub] Observer ${observer.id} removed (${this.observers.size} connected).`);
  }

  private async deliver(observer: TraceObserver, payload: string): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Delivery timed out after ${this.options.deliveryTimeoutMs}ms`)),
        this.options.deliveryTimeoutMs
      );
    });
    try {
      await Promise.race([observer.send(payload), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function encode(trace: Trace): string {
  return JSON.stringify(toTraceMessage(trace));
}
