/**
 * Keypad Session
 * Single-shot request/response and interactive duplex mode over one transport
 */

import { DecodeError } from "../errors";
import type { Logger } from "../logger";
import { MAX_READ_BYTES, type Transport } from "../serial/transport";
import { ShutdownSignal, type StopReason } from "./shutdown";

export type ResponseCallback = (response: string) => void;

export interface SessionOptions {
  /** Read timeout per bounded read, in milliseconds */
  timeoutMs: number;
  maxReadBytes?: number;
  logger: Logger;
}

export interface InteractiveResult {
  reason: StopReason;
  linesSent: number;
}

const LINE_TERMINATOR = "\n";
const EXIT_COMMAND = "exit";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Strict UTF-8 decode with outer whitespace removed
 */
export function decodeResponse(bytes: Uint8Array): string {
  try {
    return decoder.decode(bytes).trim();
  } catch (err) {
    throw new DecodeError("Error reading response: invalid UTF-8 from device", { cause: err });
  }
}

export class Session {
  private timeoutMs: number;
  private maxReadBytes: number;
  private logger: Logger;

  constructor(
    private transport: Transport,
    options: SessionOptions
  ) {
    this.timeoutMs = options.timeoutMs;
    this.maxReadBytes = options.maxReadBytes ?? MAX_READ_BYTES;
    this.logger = options.logger;
  }

  /**
   * Send one command and read whatever the device answers within the timeout.
   *
   * Exactly one bounded read is made: a reply larger than the read buffer, or
   * one that straggles past the timeout, comes back truncated. Raise the
   * timeout for slow commands (e.g. flashes) instead.
   *
   * @returns the trimmed response, or "" when nothing arrived
   */
  async sendAndWait(command: string, timeoutMs: number = this.timeoutMs): Promise<string> {
    this.logger.debug(`Send command: ${command.trim()}`);
    await this.sendLine(command);

    this.logger.debug(`Read response (reading for ${timeoutMs / 1000} seconds):`);
    return this.readResponse(timeoutMs);
  }

  async readResponse(timeoutMs: number = this.timeoutMs): Promise<string> {
    const bytes = await this.transport.read(this.maxReadBytes, timeoutMs);
    return decodeResponse(bytes);
  }

  /**
   * Interactive duplex mode: a reader activity prints responses while input
   * lines are sent to the device, until `exit`, end of input or a transport
   * fault. Resolves only after the reader has stopped, so the transport can
   * be closed safely afterwards.
   *
   * A reader fault is noticed by the input loop when the next line arrives
   * (or input ends); the wait for input itself is not interrupted.
   */
  async runInteractive(lines: AsyncIterable<string>, onResponse: ResponseCallback): Promise<InteractiveResult> {
    const signal = new ShutdownSignal();
    let linesSent = 0;

    this.logger.debug("Start background reader for responses");
    const reader = this.readLoop(signal, onResponse);

    this.logger.debug('Start interactive mode, reading stdin until end-of-file (ctrl-d, or type "exit")');
    try {
      for await (const raw of lines) {
        if (!signal.running) break;

        const line = raw.trimEnd();
        if (line === EXIT_COMMAND) {
          signal.stop("exit");
          break;
        }

        this.logger.debug(`Send: ${line}`);
        try {
          await this.sendLine(line);
          linesSent++;
        } catch (err) {
          this.logger.error(err instanceof Error ? err.message : String(err));
          signal.stop("write-error");
          break;
        }
      }
    } finally {
      signal.stop("end-of-input");
      this.logger.debug("Stopping, waiting for reader to finish");
      await reader;
    }

    this.logger.debug("End of interactive mode");
    return { reason: signal.reason ?? "end-of-input", linesSent };
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  private async sendLine(line: string): Promise<void> {
    await this.transport.write(encoder.encode(line + LINE_TERMINATOR));
  }

  private async readLoop(signal: ShutdownSignal, onResponse: ResponseCallback): Promise<void> {
    while (signal.running) {
      try {
        const response = await this.readResponse();
        if (response) {
          onResponse(response);
        }
      } catch (err) {
        this.logger.error(err instanceof Error ? err.message : String(err));
        signal.stop("read-error");
      }
    }
    this.logger.debug("End background reader for responses");
  }
}
