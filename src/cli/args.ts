/**
 * Command-line arguments
 * Flags override the environment defaults from config
 */

import { parseArgs } from "util";
import type { Config } from "../config";
import { ConfigurationError } from "../errors";

export interface CliOptions {
  /** Explicit device, skips autodetection */
  device?: string;
  autodetect: string;
  timeoutSeconds: number;
  baudRate: number;
  list: boolean;
  interactive: boolean;
  quiet: boolean;
  verbose: boolean;
  /** Free-form words, joined with spaces into the command */
  commands: string[];
}

export type ParsedCli = { help: true } | { help: false; options: CliOptions };

export const USAGE = `
Send command to macro keypad

Usage:
  macropad [options] [command ...]
  macropad -i [options]

Options:
  -i, --interactive        Interactive mode (end with "exit" or ctrl-d)
  -v, --verbose            Verbose / debug output (on stderr)
  -q, --quiet              Do not print the response
  -l, --list               List serial ports and the autodetect choice
  -t, --timeout <seconds>  Time to wait for a response (default 0.1, at most
                           2147483.647; raise to 0.2 or higher on partial or
                           no response)
  -b, --baud-rate <bps>    Baud rate (default 115200)
  -d, --device <path>      Serial device to use, e.g. /dev/ttyACM0
  -a, --autodetect <words> Hardware id / description words to autodetect the
                           device (default: "1B4F:9206 SparkFun")
  -h, --help               Show this help

Environment Variables (overridden by flags):
  MACROPAD_DEVICE       Serial device (autodetect if empty)
  MACROPAD_AUTODETECT   Autodetect words
  MACROPAD_TIMEOUT      Response timeout in seconds
  MACROPAD_BAUD_RATE    Baud rate
  MACROPAD_LOG_LEVEL    Log level: debug, info, warn, error (default: info)

Note: the flash command ('f') holds the device busy; raise the timeout when
you need its response. Count each flash time twice (on and off).

Examples:
  macropad -v -l                        # debug port autodetection
  macropad -a "9206 hidpc" -l -v        # try other autodetect words
  macropad help                         # get keypad command help
  macropad -t 0.3 help                  # same, slower computer
  macropad -t 0.5 t 2 f 1 200 e 2 g 1   # toggle 2, flash 1 for 200ms, turn on 2, read 1
  macropad -d /dev/ttyACM0 t 1          # toggle led 1 on a specific device
`;

/** Longest delay a Node timer honours; larger ones fire after 1ms */
export const MAX_TIMEOUT_SECONDS = 2147483647 / 1000;

function checkSeconds(seconds: number, source: string, raw: string): number {
  if (!Number.isFinite(seconds) || seconds < 0 || seconds * 1000 > 2147483647) {
    throw new ConfigurationError(
      `${source}: invalid value: '${raw}' (expected 0 to ${MAX_TIMEOUT_SECONDS} seconds)`
    );
  }
  return seconds;
}

function parseSeconds(value: string): number {
  if (value.trim() === "") {
    throw new ConfigurationError(`argument -t/--timeout: invalid value: '${value}'`);
  }
  return checkSeconds(Number(value), "argument -t/--timeout", value);
}

function parseBaudRate(value: string): number {
  const baudRate = Number(value);
  if (!Number.isInteger(baudRate) || baudRate <= 0) {
    throw new ConfigurationError(`argument -b/--baud-rate: invalid value: '${value}'`);
  }
  return baudRate;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        interactive: { type: "boolean", short: "i", default: false },
        verbose: { type: "boolean", short: "v", default: false },
        quiet: { type: "boolean", short: "q", default: false },
        list: { type: "boolean", short: "l", default: false },
        timeout: { type: "string", short: "t" },
        "baud-rate": { type: "string", short: "b" },
        device: { type: "string", short: "d" },
        autodetect: { type: "string", short: "a" },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (err) {
    throw new ConfigurationError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

export function parseCliArgs(argv: string[], cfg: Config): ParsedCli {
  const { values, positionals } = readArgs(argv);

  if (values.help === true) {
    return { help: true };
  }

  if (values.device !== undefined && values.autodetect !== undefined) {
    throw new ConfigurationError("argument -a/--autodetect: not allowed with argument -d/--device");
  }

  // An explicit -a means autodetect, even when the environment names a device
  const device = values.device ?? (values.autodetect === undefined ? cfg.DEVICE || undefined : undefined);

  return {
    help: false,
    options: {
      device,
      autodetect: values.autodetect ?? cfg.AUTODETECT,
      timeoutSeconds:
        values.timeout === undefined
          ? checkSeconds(cfg.TIMEOUT, "MACROPAD_TIMEOUT", String(cfg.TIMEOUT))
          : parseSeconds(values.timeout),
      baudRate: values["baud-rate"] === undefined ? cfg.BAUD_RATE : parseBaudRate(values["baud-rate"]),
      list: values.list ?? false,
      interactive: values.interactive ?? false,
      quiet: values.quiet ?? false,
      verbose: values.verbose ?? false,
      commands: positionals,
    },
  };
}

/**
 * Exactly one of: command words, interactive mode
 */
export function checkMode(options: CliOptions): void {
  if ((options.commands.length > 0) === options.interactive) {
    throw new ConfigurationError("Either specify a command as argument, or use -i for interactive mode.");
  }
}
