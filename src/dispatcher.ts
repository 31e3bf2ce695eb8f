/**
 * Dispatcher
 * Resolves the device, then runs list, single-shot or interactive mode
 */

import { checkMode, USAGE, type CliOptions } from "./cli/args";
import {
  buildPattern,
  matchDevice,
  selectDevice,
  MISSING_FIELD,
  type CandidateDevice,
  type DeviceEnumerator,
} from "./discovery";
import { ConfigurationError, OpenError, ReadError, WriteError } from "./errors";
import type { Logger } from "./logger";
import type { Transport } from "./serial/transport";
import { Session } from "./session/session";

export interface DispatchDeps {
  enumerator: DeviceEnumerator;
  openTransport: (deviceId: string | undefined, baudRate: number) => Promise<Transport>;
  /** Lines typed by the operator (interactive mode) */
  input: () => AsyncIterable<string>;
  /** Device responses and list output */
  output: (line: string) => void;
  logger: Logger;
}

export function formatCandidate(candidate: CandidateDevice): string {
  return (
    `device:${candidate.deviceId}\n` +
    `    description:${candidate.description ?? MISSING_FIELD}\n` +
    `    hwid:${candidate.hardwareId ?? MISSING_FIELD}\n`
  );
}

/**
 * @returns process exit code
 */
export async function dispatch(options: CliOptions, deps: DispatchDeps): Promise<number> {
  const { logger } = deps;

  const candidates = await deps.enumerator.listCandidates();
  const pattern = buildPattern(options.autodetect);

  if (options.list) {
    const detected = matchDevice(candidates, pattern, logger, { warnOnAmbiguity: !options.device });
    deps.output("The following serial ports are found:\n");
    for (const candidate of candidates) {
      deps.output(formatCandidate(candidate));
    }
    deps.output(`Based on the autodetect setting keywords, we would choose: ${detected ?? MISSING_FIELD}`);
    return 0;
  }

  const device = selectDevice(candidates, pattern, options.device, logger);
  logger.debug(`Device to use: ${device ?? MISSING_FIELD}, ${options.baudRate} baud`);

  try {
    checkMode(options);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.error(err.message);
      logger.info(USAGE);
      return 1;
    }
    throw err;
  }

  let transport: Transport;
  try {
    transport = await deps.openTransport(device, options.baudRate);
  } catch (err) {
    if (err instanceof OpenError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }

  const session = new Session(transport, {
    timeoutMs: options.timeoutSeconds * 1000,
    logger,
  });

  try {
    if (options.interactive) {
      const result = await session.runInteractive(deps.input(), deps.output);
      logger.debug(`Interactive session ended (${result.reason}), ${result.linesSent} line(s) sent`);
      return 0;
    }
    return await runSingleShot(session, options, deps);
  } finally {
    await session.close().catch((err: unknown) => {
      logger.warn(`Error closing ${device}: ${err instanceof Error ? err.message : String(err)}`);
    });
  }
}

async function runSingleShot(session: Session, options: CliOptions, deps: DispatchDeps): Promise<number> {
  const { logger } = deps;
  const command = options.commands.join(" ");

  let answer: string;
  try {
    answer = await session.sendAndWait(command);
  } catch (err) {
    // Undelivered command is fatal; a failed read just means no answer
    if (err instanceof WriteError) {
      logger.error(err.message);
      return 1;
    }
    if (err instanceof ReadError) {
      logger.error(err.message);
      return 0;
    }
    throw err;
  }

  if (options.quiet) {
    logger.debug("Quiet mode, do not print answer");
  } else if (answer) {
    deps.output(answer);
  } else {
    logger.debug("No response");
  }
  return 0;
}
