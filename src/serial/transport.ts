/**
 * Serial Transport
 * Byte-stream access to the keypad with timeout-bounded reads
 */

import { SerialPort } from "serialport";
import { OpenError, ReadError, WriteError } from "../errors";

/** Largest chunk a single read returns */
export const MAX_READ_BYTES = 2048;

export interface Transport {
  write(data: Uint8Array): Promise<void>;
  /**
   * One bounded read: resolves when `maxBytes` are available or `timeoutMs`
   * has elapsed, with whatever arrived (possibly nothing).
   */
  read(maxBytes: number, timeoutMs: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

type ErrorCallback = (err: Error | null) => void;

/**
 * The parts of a serialport stream the transport relies on.
 * Satisfied by both SerialPort and SerialPortMock.
 */
export interface PortStream {
  readonly isOpen: boolean;
  on(event: "data", listener: (chunk: Buffer) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  write(chunk: Buffer, callback: (err: Error | null | undefined) => void): boolean;
  drain(callback: ErrorCallback): void;
  close(callback: ErrorCallback): void;
}

export interface PortOpenOptions {
  path: string;
  baudRate: number;
}

export type PortFactory = (options: PortOpenOptions, callback: ErrorCallback) => PortStream;

export const defaultPortFactory: PortFactory = (options, callback) =>
  new SerialPort(
    {
      path: options.path,
      baudRate: options.baudRate,
      dataBits: 8,
      parity: "none",
      stopBits: 1,
      rtscts: false, // No flow control
      xon: false,
      xoff: false,
      xany: false,
    },
    callback
  );

interface PendingRead {
  maxBytes: number;
  timer: ReturnType<typeof setTimeout>;
  resolve: (data: Uint8Array) => void;
  reject: (err: Error) => void;
}

export class SerialTransport implements Transport {
  private buffer: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private failure: Error | null = null;
  private closed = false;

  constructor(
    private port: PortStream,
    readonly deviceId: string
  ) {
    this.port.on("data", (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      if (this.pending && this.buffer.length >= this.pending.maxBytes) {
        this.settle();
      }
    });

    this.port.on("error", (err: Error) => {
      this.fail(new ReadError(`Serial port ${this.deviceId} failed: ${err.message}`, { cause: err }));
    });

    this.port.on("close", () => {
      this.fail(new ReadError(`Serial port ${this.deviceId} was closed`));
    });
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.closed || !this.port.isOpen) {
      throw new WriteError(`Serial port ${this.deviceId} is not open`);
    }

    return new Promise((resolve, reject) => {
      this.port.write(Buffer.from(data), (err) => {
        if (err) {
          reject(new WriteError(`Error writing to ${this.deviceId}: ${err.message}`, { cause: err }));
          return;
        }
        // Drain to ensure data is sent
        this.port.drain((drainErr) => {
          if (drainErr) {
            reject(new WriteError(`Error writing to ${this.deviceId}: ${drainErr.message}`, { cause: drainErr }));
          } else {
            resolve();
          }
        });
      });
    });
  }

  read(maxBytes: number, timeoutMs: number): Promise<Uint8Array> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.closed) {
      return Promise.reject(new ReadError(`Serial port ${this.deviceId} is not open`));
    }
    if (this.pending) {
      return Promise.reject(new ReadError("A read is already in progress"));
    }
    if (this.buffer.length >= maxBytes) {
      return Promise.resolve(this.take(maxBytes));
    }

    return new Promise((resolve, reject) => {
      this.pending = {
        maxBytes,
        timer: setTimeout(() => this.settle(), timeoutMs),
        resolve,
        reject,
      };
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.pending) {
      this.reject(new ReadError(`Serial port ${this.deviceId} was closed`));
    }
    if (!this.port.isOpen) return;

    return new Promise((resolve, reject) => {
      this.port.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  private take(maxBytes: number): Uint8Array {
    const chunk = this.buffer.subarray(0, maxBytes);
    this.buffer = this.buffer.subarray(chunk.length);
    return new Uint8Array(chunk);
  }

  private settle(): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.resolve(this.take(pending.maxBytes));
  }

  private reject(err: Error): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.reject(err);
  }

  private fail(err: Error): void {
    // Our own close() is not a failure
    if (this.closed) return;
    this.failure ??= err;
    this.reject(this.failure);
  }
}

/**
 * Open the serial device. An undefined device id means autodetect found nothing.
 */
export function openSerialTransport(
  options: { deviceId: string | undefined; baudRate: number },
  createPort: PortFactory = defaultPortFactory
): Promise<SerialTransport> {
  const { deviceId, baudRate } = options;
  if (!deviceId) {
    return Promise.reject(
      new OpenError(deviceId, "Error opening serial port: no device found (use -l to list ports, -d to choose one)")
    );
  }

  return new Promise((resolve, reject) => {
    const port = createPort({ path: deviceId, baudRate }, (err) => {
      if (err) {
        reject(new OpenError(deviceId, `Error opening serial port ${deviceId}, error: ${err.message}`, { cause: err }));
        return;
      }
      resolve(new SerialTransport(port, deviceId));
    });
  });
}
