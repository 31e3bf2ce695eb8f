/**
 * Serial port enumeration via the serialport package
 */

import { SerialPort } from "serialport";
import type { CandidateDevice, DeviceEnumerator } from "./interface";
import type { Logger } from "../logger";

/** Fields of a serialport list entry that identify the hardware */
export interface SerialPortListing {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  /** e.g. usb-SparkFun_SparkFun_Pro_Micro-if00 on Linux */
  pnpId?: string;
  /** Windows only, e.g. "USB Serial Device (COM3)" */
  friendlyName?: string;
  locationId?: string;
  vendorId?: string;
  productId?: string;
}

export type ListPortsFn = () => Promise<SerialPortListing[]>;

/**
 * Hardware id in the usual USB form, or undefined for ports without USB metadata
 */
export function formatHardwareId(port: SerialPortListing): string | undefined {
  if (!port.vendorId) return undefined;

  let hwid = `USB VID:PID=${port.vendorId.toUpperCase()}:${(port.productId ?? "").toUpperCase()}`;
  if (port.serialNumber) hwid += ` SER=${port.serialNumber}`;
  if (port.locationId) hwid += ` LOCATION=${port.locationId}`;
  return hwid;
}

/**
 * Maker and product from a Linux by-id style pnpId:
 * usb-Arduino_LLC_HIDPC-if00 -> "Arduino LLC HIDPC"
 */
export function productFromPnpId(pnpId: string | undefined): string | undefined {
  const match = pnpId?.match(/^usb-(.+?)(?:-if\d+)?(?:-port\d+)?$/);
  if (!match) return undefined;
  return match[1].replace(/_/g, " ");
}

/**
 * Human-readable name: the OS friendly name, else the product name, else the maker
 */
export function describePort(port: SerialPortListing): string | undefined {
  return port.friendlyName || productFromPnpId(port.pnpId) || port.manufacturer || undefined;
}

export function toCandidate(port: SerialPortListing): CandidateDevice {
  return {
    deviceId: port.path,
    hardwareId: formatHardwareId(port),
    description: describePort(port),
  };
}

export class SerialPortEnumerator implements DeviceEnumerator {
  private listPorts: ListPortsFn;

  constructor(
    private logger: Logger,
    listPorts?: ListPortsFn
  ) {
    this.listPorts = listPorts ?? (() => SerialPort.list());
  }

  async listCandidates(): Promise<CandidateDevice[]> {
    try {
      const ports = await this.listPorts();
      return ports.map(toCandidate);
    } catch (err) {
      // Listing must keep working with zero ports, so a failed scan is only a warning
      this.logger.warn(`Could not enumerate serial ports: ${err instanceof Error ? err.message : String(err)}`);
      return [];
    }
  }
}
