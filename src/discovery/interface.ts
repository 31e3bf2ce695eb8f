/**
 * Device Enumeration Interface
 * High-level modules depend on this abstraction, not on serialport
 */

export interface CandidateDevice {
  /** Platform path or name, e.g. /dev/ttyACM0 or COM3 */
  deviceId: string;
  /** e.g. "USB VID:PID=1B4F:9206 SER=0 LOCATION=1-1:1.0" */
  hardwareId?: string;
  description?: string;
}

export interface DeviceEnumerator {
  /**
   * Current serial endpoints, queried fresh on every call
   */
  listCandidates(): Promise<CandidateDevice[]>;
}
