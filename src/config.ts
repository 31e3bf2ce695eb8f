/**
 * Configuration from environment variables
 * Command-line flags override these defaults
 */

import { isLogLevel, type LogLevel, type Logger } from "./logger";

type Env = Record<string, string | undefined>;

function getEnvInteger(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvFloat(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvString(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue;
}

function getEnvLogLevel(env: Env, key: string, defaultValue: LogLevel): LogLevel {
  const value = env[key]?.toLowerCase();
  return value !== undefined && isLogLevel(value) ? value : defaultValue;
}

/** Pro Micro VID:PID plus maker name */
export const DEFAULT_AUTODETECT = "1B4F:9206 SparkFun";

export interface Config {
  /**
   * Serial device path (autodetect if empty)
   * @env MACROPAD_DEVICE
   */
  DEVICE: string;

  /**
   * Keywords matched against hardware id and description
   * @env MACROPAD_AUTODETECT
   * @default "1B4F:9206 SparkFun"
   */
  AUTODETECT: string;

  /**
   * Response read timeout in seconds
   * @env MACROPAD_TIMEOUT
   * @default 0.1
   */
  TIMEOUT: number;

  /**
   * Serial baud rate (irrelevant for native USB CDC boards like the atmega32u4)
   * @env MACROPAD_BAUD_RATE
   * @default 115200
   */
  BAUD_RATE: number;

  /**
   * Log level: debug, info, warn, error
   * @env MACROPAD_LOG_LEVEL
   * @default "info"
   */
  LOG_LEVEL: LogLevel;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    DEVICE: getEnvString(env, "MACROPAD_DEVICE", ""),
    AUTODETECT: getEnvString(env, "MACROPAD_AUTODETECT", DEFAULT_AUTODETECT),
    TIMEOUT: getEnvFloat(env, "MACROPAD_TIMEOUT", 0.1),
    BAUD_RATE: getEnvInteger(env, "MACROPAD_BAUD_RATE", 115200),
    LOG_LEVEL: getEnvLogLevel(env, "MACROPAD_LOG_LEVEL", "info"),
  };
}

export const config = loadConfig();

/**
 * Print resolved configuration (for debugging)
 */
export function printConfig(cfg: Config, logger: Logger): void {
  logger.debug("Configuration:");
  logger.debug(`  Device:     ${cfg.DEVICE || "(autodetect)"}`);
  logger.debug(`  Autodetect: ${cfg.AUTODETECT}`);
  logger.debug(`  Timeout:    ${cfg.TIMEOUT}s`);
  logger.debug(`  Baud Rate:  ${cfg.BAUD_RATE}`);
  logger.debug(`  Log Level:  ${cfg.LOG_LEVEL}`);
}
