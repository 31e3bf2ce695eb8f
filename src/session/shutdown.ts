/**
 * Shutdown signal shared by the reader and input activities of one session.
 * Created per session and handed to both; once stopped it stays stopped.
 */

export type StopReason = "exit" | "end-of-input" | "read-error" | "write-error";

export class ShutdownSignal {
  private stopReason: StopReason | null = null;

  get running(): boolean {
    return this.stopReason === null;
  }

  /** First reason wins */
  get reason(): StopReason | null {
    return this.stopReason;
  }

  stop(reason: StopReason): void {
    this.stopReason ??= reason;
  }
}
