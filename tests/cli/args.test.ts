import { describe, it } from "node:test";
import assert from "node:assert";
import { checkMode, parseCliArgs, type CliOptions } from "../../src/cli/args";
import { DEFAULT_AUTODETECT, loadConfig } from "../../src/config";
import { ConfigurationError } from "../../src/errors";

const defaults = loadConfig({});

function parse(argv: string[], cfg = defaults): CliOptions {
  const parsed = parseCliArgs(argv, cfg);
  if (parsed.help) assert.fail("unexpected help");
  return parsed.options;
}

describe("parseCliArgs", () => {
  it("uses configuration defaults", () => {
    assert.deepStrictEqual(parse(["t", "1"]), {
      device: undefined,
      autodetect: DEFAULT_AUTODETECT,
      timeoutSeconds: 0.1,
      baudRate: 115200,
      list: false,
      interactive: false,
      quiet: false,
      verbose: false,
      commands: ["t", "1"],
    });
  });

  it("reads options mixed with command words", () => {
    const options = parse(["-t", "0.5", "t", "2", "f", "1", "200", "e", "2", "g", "1"]);
    assert.strictEqual(options.timeoutSeconds, 0.5);
    assert.deepStrictEqual(options.commands, ["t", "2", "f", "1", "200", "e", "2", "g", "1"]);
  });

  it("reads long flags", () => {
    const options = parse(["--interactive", "--quiet", "--verbose", "--baud-rate", "9600", "--device", "/dev/ttyACM0"]);
    assert.strictEqual(options.interactive, true);
    assert.strictEqual(options.quiet, true);
    assert.strictEqual(options.verbose, true);
    assert.strictEqual(options.baudRate, 9600);
    assert.strictEqual(options.device, "/dev/ttyACM0");
  });

  it("reads short list and autodetect flags", () => {
    const options = parse(["-a", "9206 hidpc", "-l", "-v"]);
    assert.strictEqual(options.autodetect, "9206 hidpc");
    assert.strictEqual(options.list, true);
    assert.strictEqual(options.verbose, true);
  });

  it("returns help", () => {
    assert.deepStrictEqual(parseCliArgs(["-h"], defaults), { help: true });
  });

  it("rejects --device together with --autodetect", () => {
    assert.throws(() => parseCliArgs(["-d", "/dev/ttyACM0", "-a", "sparkfun"], defaults), ConfigurationError);
  });

  it("rejects unknown options", () => {
    assert.throws(() => parseCliArgs(["--bogus"], defaults), ConfigurationError);
  });

  it("rejects invalid timeouts", () => {
    assert.throws(() => parseCliArgs(["-t", "soon", "t"], defaults), {
      name: "ConfigurationError",
      message: "argument -t/--timeout: invalid value: 'soon' (expected 0 to 2147483.647 seconds)",
    });
    assert.throws(() => parseCliArgs(["-t", "-1", "t"], defaults), ConfigurationError);
  });

  it("rejects timeouts longer than a timer can wait", () => {
    assert.throws(() => parseCliArgs(["-t", "3000000", "t"], defaults), {
      name: "ConfigurationError",
      message: "argument -t/--timeout: invalid value: '3000000' (expected 0 to 2147483.647 seconds)",
    });
    assert.strictEqual(parse(["-t", "2147483.647", "t"]).timeoutSeconds, 2147483.647);
  });

  it("rejects an out-of-range timeout from the environment", () => {
    const cfg = loadConfig({ MACROPAD_TIMEOUT: "3000000" });
    assert.throws(() => parseCliArgs(["t"], cfg), {
      name: "ConfigurationError",
      message: "MACROPAD_TIMEOUT: invalid value: '3000000' (expected 0 to 2147483.647 seconds)",
    });
    assert.strictEqual(parse(["-t", "0.2", "t"], cfg).timeoutSeconds, 0.2);
  });

  it("accepts a zero timeout", () => {
    assert.strictEqual(parse(["-t", "0", "t"]).timeoutSeconds, 0);
  });

  it("rejects non-integer baud rates", () => {
    assert.throws(() => parseCliArgs(["-b", "96.5", "t"], defaults), ConfigurationError);
    assert.throws(() => parseCliArgs(["-b", "0", "t"], defaults), ConfigurationError);
  });

  it("takes the device from the environment", () => {
    const cfg = loadConfig({ MACROPAD_DEVICE: "/dev/ttyACM3" });
    assert.strictEqual(parse(["t"], cfg).device, "/dev/ttyACM3");
  });

  it("lets an explicit --autodetect beat the environment device", () => {
    const cfg = loadConfig({ MACROPAD_DEVICE: "/dev/ttyACM3" });
    const options = parse(["-a", "hidpc", "t"], cfg);
    assert.strictEqual(options.device, undefined);
    assert.strictEqual(options.autodetect, "hidpc");
  });
});

describe("checkMode", () => {
  const base = parse(["t"]);

  it("accepts commands alone", () => {
    assert.doesNotThrow(() => checkMode(base));
  });

  it("accepts interactive mode alone", () => {
    assert.doesNotThrow(() => checkMode({ ...base, commands: [], interactive: true }));
  });

  it("rejects neither and both", () => {
    assert.throws(() => checkMode({ ...base, commands: [] }), ConfigurationError);
    assert.throws(() => checkMode({ ...base, interactive: true }), ConfigurationError);
  });
});
