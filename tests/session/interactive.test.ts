/**
 * Interactive Session Tests
 * Reader and input activities, shutdown ordering
 */

import { describe, it, beforeEach } from "node:test";
import assert from "node:assert";
import { ReadError, WriteError } from "../../src/errors";
import { RecordingLogger } from "../../src/logger";
import { MockTransport } from "../../src/serial/mock";
import { Session } from "../../src/session/session";

async function* linesOf(items: string[]): AsyncGenerator<string> {
  for (const item of items) {
    yield item;
  }
}

// Let pending promise callbacks run before continuing
const nextMacrotask = () => new Promise((resolve) => setImmediate(resolve));

describe("Session.runInteractive", () => {
  let logger: RecordingLogger;
  let responses: string[];
  const print = (response: string) => {
    responses.push(response);
  };

  beforeEach(() => {
    logger = new RecordingLogger();
    responses = [];
  });

  it("sends each line once and never sends exit", async () => {
    const transport = new MockTransport();
    const session = new Session(transport, { timeoutMs: 5, logger });

    const result = await session.runInteractive(linesOf(["t 1", "exit"]), print);

    assert.deepStrictEqual(transport.writes, ["t 1\n"]);
    assert.deepStrictEqual(result, { reason: "exit", linesSent: 1 });
  });

  it("ignores lines after exit", async () => {
    const transport = new MockTransport();
    const session = new Session(transport, { timeoutMs: 5, logger });

    await session.runInteractive(linesOf(["exit", "t 2"]), print);
    assert.deepStrictEqual(transport.writes, []);
  });

  it("trims trailing whitespace before sending", async () => {
    const transport = new MockTransport();
    const session = new Session(transport, { timeoutMs: 5, logger });

    const result = await session.runInteractive(linesOf(["e 2  \t", "g 1\r", "exit \r"]), print);

    assert.deepStrictEqual(transport.writes, ["e 2\n", "g 1\n"]);
    assert.strictEqual(result.reason, "exit");
  });

  it("ends at end of input", async () => {
    const transport = new MockTransport();
    const session = new Session(transport, { timeoutMs: 5, logger });

    const result = await session.runInteractive(linesOf(["t 1", "t 2"]), print);

    assert.deepStrictEqual(transport.writes, ["t 1\n", "t 2\n"]);
    assert.deepStrictEqual(result, { reason: "end-of-input", linesSent: 2 });
  });

  it("prints responses read in the background", async () => {
    const transport = new MockTransport({ reads: ["LED 1 on\r\n", "  \r\n", "LED 2 off\n"] });
    const session = new Session(transport, { timeoutMs: 5, logger });

    async function* input(): AsyncGenerator<string> {
      yield "t 1";
      await transport.waitForReads(3);
      yield "exit";
    }

    await session.runInteractive(input(), print);
    assert.deepStrictEqual(responses, ["LED 1 on", "LED 2 off"]);
  });

  it("resolves only after the reader has stopped, so close never races a read", async () => {
    const transport = new MockTransport();
    const session = new Session(transport, { timeoutMs: 20, logger });

    await session.runInteractive(linesOf(["t 1", "exit"]), print);
    await session.close();

    assert.strictEqual(transport.closedDuringRead, false);
    assert.strictEqual(transport.readsAfterClose, 0);
    assert.deepStrictEqual(transport.events.at(-1), { type: "close" });
    assert.ok(transport.events.some((e) => e.type === "read"));
  });

  it("stops taking input after the reader fails", async () => {
    const transport = new MockTransport({ reads: ["hello", new ReadError("device unplugged")] });
    const session = new Session(transport, { timeoutMs: 5, logger });

    async function* input(): AsyncGenerator<string> {
      yield "a";
      await transport.waitForReads(2);
      await nextMacrotask();
      yield "b";
      yield "c";
    }

    const result = await session.runInteractive(input(), print);

    assert.deepStrictEqual(transport.writes, ["a\n"]);
    assert.deepStrictEqual(result, { reason: "read-error", linesSent: 1 });
    assert.deepStrictEqual(responses, ["hello"]);
    assert.deepStrictEqual(logger.messages("error"), ["device unplugged"]);
    assert.strictEqual(transport.readTimeouts.length, 2);
  });

  it("ends the session on a write failure and stops the reader", async () => {
    const transport = new MockTransport({ writeError: new WriteError("write failed") });
    const session = new Session(transport, { timeoutMs: 5, logger });

    const result = await session.runInteractive(linesOf(["t 1", "t 2"]), print);
    await session.close();

    assert.deepStrictEqual(result, { reason: "write-error", linesSent: 0 });
    assert.deepStrictEqual(logger.messages("error"), ["write failed"]);
    assert.strictEqual(transport.closedDuringRead, false);
  });

  it("treats undecodable bytes like a read failure", async () => {
    const transport = new MockTransport({ reads: [new Uint8Array([0xff])] });
    const session = new Session(transport, { timeoutMs: 5, logger });

    async function* input(): AsyncGenerator<string> {
      await transport.waitForReads(1);
      await nextMacrotask();
      yield "t 1";
    }

    const result = await session.runInteractive(input(), print);

    assert.strictEqual(result.reason, "read-error");
    assert.deepStrictEqual(transport.writes, []);
  });
});
