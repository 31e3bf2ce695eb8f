/**
 * Device Discovery Module
 * Re-exports all discovery components
 */

export * from "./interface";
export * from "./matcher";
export * from "./mock";
export * from "./serial";

import type { DeviceEnumerator } from "./interface";
import type { Logger } from "../logger";
import { SerialPortEnumerator } from "./serial";

/**
 * Create default enumerator for current platform
 */
export function createEnumerator(logger: Logger): DeviceEnumerator {
  return new SerialPortEnumerator(logger);
}
