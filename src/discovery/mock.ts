/**
 * Mock Device Enumeration for Testing
 * Can replace real enumeration in tests
 */

import type { CandidateDevice, DeviceEnumerator } from "./interface";

export class MockEnumerator implements DeviceEnumerator {
  private candidates: CandidateDevice[];
  public listCalls = 0;

  constructor(candidates: CandidateDevice[] = []) {
    this.candidates = candidates;
  }

  async listCandidates(): Promise<CandidateDevice[]> {
    this.listCalls++;
    // Fresh copies, as a real scan would produce
    return this.candidates.map((c) => ({ ...c }));
  }

  // Helper to simulate hot-plug between calls
  setCandidates(candidates: CandidateDevice[]): void {
    this.candidates = candidates;
  }

  reset(): void {
    this.listCalls = 0;
  }
}
