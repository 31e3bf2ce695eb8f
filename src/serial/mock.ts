/**
 * Mock Transport for Testing
 * Scripted reads, recorded writes, no hardware
 */

import { ReadError, WriteError } from "../errors";
import type { Transport } from "./transport";

/** A scripted read result: text or raw bytes to return, or an error to throw */
export type ScriptedRead = string | Uint8Array | Error;

export type TransportEvent =
  | { type: "write"; data: string }
  | { type: "read"; bytes: number }
  | { type: "read-error"; message: string }
  | { type: "close" };

export interface MockTransportOptions {
  /** Consumed one per read; once exhausted reads time out empty */
  reads?: ScriptedRead[];
  /** Fail every write with this error */
  writeError?: Error;
}

export class MockTransport implements Transport {
  readonly events: TransportEvent[] = [];
  readonly writes: string[] = [];
  readonly readTimeouts: number[] = [];
  private reads: ScriptedRead[];
  private writeError?: Error;
  private readsInFlight = 0;
  private completedReads = 0;
  private readWaiters: { count: number; resolve: () => void }[] = [];
  public closed = false;
  /** Set when close() ran while a read was still pending */
  public closedDuringRead = false;
  public readsAfterClose = 0;

  constructor(options: MockTransportOptions = {}) {
    this.reads = [...(options.reads ?? [])];
    this.writeError = options.writeError;
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.writeError) throw this.writeError;
    if (this.closed) throw new WriteError("write after close");
    const text = new TextDecoder().decode(data);
    this.writes.push(text);
    this.events.push({ type: "write", data: text });
  }

  async read(maxBytes: number, timeoutMs: number): Promise<Uint8Array> {
    if (this.closed) {
      this.readsAfterClose++;
      throw new ReadError("read after close");
    }

    this.readTimeouts.push(timeoutMs);
    this.readsInFlight++;
    try {
      const next = this.reads.shift();
      if (next === undefined) {
        await new Promise((resolve) => setTimeout(resolve, timeoutMs));
        this.events.push({ type: "read", bytes: 0 });
        return new Uint8Array(0);
      }

      // Yield like real I/O would
      await new Promise((resolve) => setImmediate(resolve));

      if (next instanceof Error) {
        this.events.push({ type: "read-error", message: next.message });
        throw next;
      }

      const bytes = typeof next === "string" ? new TextEncoder().encode(next) : next;
      const chunk = bytes.subarray(0, maxBytes);
      this.events.push({ type: "read", bytes: chunk.length });
      return chunk;
    } finally {
      this.readsInFlight--;
      this.completedReads++;
      this.notifyReadWaiters();
    }
  }

  async close(): Promise<void> {
    if (this.readsInFlight > 0) this.closedDuringRead = true;
    this.closed = true;
    this.events.push({ type: "close" });
  }

  /**
   * Resolves once `count` reads have completed (successfully or not)
   */
  waitForReads(count: number): Promise<void> {
    if (this.completedReads >= count) return Promise.resolve();
    return new Promise((resolve) => this.readWaiters.push({ count, resolve }));
  }

  private notifyReadWaiters(): void {
    const ready = this.readWaiters.filter((w) => this.completedReads >= w.count);
    this.readWaiters = this.readWaiters.filter((w) => this.completedReads < w.count);
    for (const waiter of ready) waiter.resolve();
  }
}
