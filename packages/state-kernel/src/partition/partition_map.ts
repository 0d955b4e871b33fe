// State Kernel - risk_score -> mode -> risk_level partition (v1)
//
// Bands are lower-inclusive / upper-exclusive, except Halt which is closed:
//   [0.0, 0.2) Optimal   [0.2, 0.4) Normal   [0.4, 0.6) Caution
//   [0.6, 0.8) Alert     [0.8, 1.0] Halt
//
// Pure functions. No IO.

import {
  MODE_TO_RISK_LEVEL_V1,
  RISK_LEVEL_TO_MODE_V1,
  isModeV1,
  isRiskLevelV1,
  type ModeV1,
  type RiskLevelV1
} from "@pmatrix/contracts";

/**
 * Lower bound of each band, ascending. The last band catches everything up to 1.0
 * (values above 1.0 are rejected before the scan).
 */
export const MODE_THRESHOLDS_V1: ReadonlyArray<{ readonly lower: number; readonly mode: ModeV1 }> = Object.freeze([
  Object.freeze({ lower: 0.0, mode: "Optimal" as const }),
  Object.freeze({ lower: 0.2, mode: "Normal" as const }),
  Object.freeze({ lower: 0.4, mode: "Caution" as const }),
  Object.freeze({ lower: 0.6, mode: "Alert" as const }),
  Object.freeze({ lower: 0.8, mode: "Halt" as const })
]);

/**
 * Maps a risk score to its operating mode.
 *
 * @returns undefined when the score is NaN or outside [0, 1].
 */
export function mapRiskToMode(riskScore: number): ModeV1 | undefined {
  if (Number.isNaN(riskScore) || riskScore < 0 || riskScore > 1) return undefined;

  let mode: ModeV1 = MODE_THRESHOLDS_V1[0].mode;
  for (const band of MODE_THRESHOLDS_V1) {
    if (riskScore >= band.lower) mode = band.mode;
  }
  return mode;
}

/**
 * Maps a mode name to its risk level. Accepts any string so that wire values can
 * be checked without a prior cast.
 *
 * @returns undefined for anything outside the five canonical modes.
 */
export function mapModeToLevel(mode: string): RiskLevelV1 | undefined {
  return isModeV1(mode) ? MODE_TO_RISK_LEVEL_V1[mode] : undefined;
}

export function mapLevelToMode(level: string): ModeV1 | undefined {
  return isRiskLevelV1(level) ? RISK_LEVEL_TO_MODE_V1[level] : undefined;
}
