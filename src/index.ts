/**
 * Macro Keypad CLI - Entry Point
 * Sends commands to a USB-serial macro keypad and prints its responses
 */

import { createInterface } from "readline";
import { parseCliArgs, USAGE, type ParsedCli } from "./cli/args";
import { config, printConfig } from "./config";
import { createEnumerator } from "./discovery";
import { dispatch } from "./dispatcher";
import { ConfigurationError } from "./errors";
import { ConsoleLogger } from "./logger";
import { openSerialTransport } from "./serial/transport";

async function main(): Promise<number> {
  let parsed: ParsedCli;
  try {
    parsed = parseCliArgs(process.argv.slice(2), config);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(err.message);
      console.error(USAGE);
      return 1;
    }
    throw err;
  }

  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }

  const { options } = parsed;
  const logger = new ConsoleLogger(options.verbose ? "debug" : config.LOG_LEVEL);
  printConfig(config, logger);

  return dispatch(options, {
    enumerator: createEnumerator(logger),
    openTransport: (deviceId, baudRate) => openSerialTransport({ deviceId, baudRate }),
    input: () => createInterface({ input: process.stdin, terminal: false, crlfDelay: Infinity }),
    output: (line) => console.log(line),
    logger,
  });
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error("Fatal error:", err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
);
