// ═══════════════════════════════════════════════════════════════
// Tapgate — Trace History
// apps/gateway/src/services/traceHistory.ts
//
// Insertion-ordered FIFO of the most recent traces. Only the
// trace hub touches it.
// ═══════════════════════════════════════════════════════════════

import type { Trace } from "../types";

export class TraceHistory {
  private entries: Trace[] = [];

  constructor(readonly capacity: number = 100) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Trace history capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /** Append, evicting the oldest entries beyond capacity. */
  push(trace: Trace): void {
    this.entries.push(trace);
    const overflow = this.entries.length - this.capacity;
    if (overflow > 0) this.entries.splice(0, overflow);
  }

  /** Oldest first. */
  toArray(): Trace[] {
    return [...this.entries];
  }

  find(id: string): Trace | undefined {
    return this.entries.find((trace) => trace.id === id);
  }
}
