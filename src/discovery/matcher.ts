/**
 * Device Matcher
 * Picks a serial endpoint whose metadata contains the autodetect keywords in order
 */

import type { CandidateDevice } from "./interface";
import type { Logger } from "../logger";

export interface MatchPattern {
  /** Phrase the pattern was built from, for diagnostics */
  readonly phrase: string;
  /** Lower-cased keywords, in required order */
  readonly keywords: readonly string[];
}

/** Rendering of a missing hardware id or description */
export const MISSING_FIELD = "None";

export function buildPattern(phrase: string): MatchPattern {
  const keywords = phrase
    .toLowerCase()
    .split(/\s+/)
    .filter((k) => k.length > 0);
  return { phrase, keywords };
}

export function describePattern(pattern: MatchPattern): string {
  return ["", ...pattern.keywords, ""].join("*");
}

/**
 * Ordered-substring test anchored at the start of `text`:
 * any text, keyword 1, any text, keyword 2, ..., any text
 */
export function matchesPattern(text: string, pattern: MatchPattern): boolean {
  let position = 0;
  for (const keyword of pattern.keywords) {
    const found = text.indexOf(keyword, position);
    if (found === -1) return false;
    position = found + keyword.length;
  }
  return true;
}

export function candidateMatchText(candidate: CandidateDevice): string {
  const hwid = candidate.hardwareId ?? MISSING_FIELD;
  const description = candidate.description ?? MISSING_FIELD;
  return `${hwid} ${description}`.toLowerCase();
}

/**
 * Find the matching device. When several match the last one wins,
 * with a warning for each superseded match unless `warnOnAmbiguity` is off
 * (an explicit device makes the ambiguity moot).
 */
export function matchDevice(
  candidates: readonly CandidateDevice[],
  pattern: MatchPattern,
  logger: Logger,
  options: { warnOnAmbiguity?: boolean } = {}
): string | undefined {
  const warnOnAmbiguity = options.warnOnAmbiguity ?? true;
  let selected: string | undefined;

  logger.debug(`Autodetect search pattern: ${describePattern(pattern)}`);

  for (const candidate of candidates) {
    const text = candidateMatchText(candidate);
    logger.debug(`For device ${candidate.deviceId}; Autodetect string to match against: ${text}`);

    if (!matchesPattern(text, pattern)) continue;

    logger.debug(`Match: autodetected device: ${candidate.deviceId}`);
    if (selected !== undefined && warnOnAmbiguity) {
      logger.warn(
        "multiple matches on autodetect. Last match will be used. " +
          "Use -v and -l options to investigate, and change -a or -d value to fix this!"
      );
      logger.warn(`Previous match: ${selected}, current match: ${candidate.deviceId}`);
    }
    selected = candidate.deviceId;
  }

  return selected;
}

/**
 * Explicit override wins unconditionally; otherwise the autodetected device.
 * Undefined means nothing to open, which the caller reports when opening.
 */
export function selectDevice(
  candidates: readonly CandidateDevice[],
  pattern: MatchPattern,
  explicitOverride: string | undefined,
  logger: Logger
): string | undefined {
  if (explicitOverride) {
    logger.debug(`Using device ${explicitOverride} instead of autodetecting`);
    return explicitOverride;
  }
  return matchDevice(candidates, pattern, logger);
}
