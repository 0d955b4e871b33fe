// Runtime State - Mode / Risk Level Taxonomy v1
//
// Engineering rule:
// - Modes and risk levels are closed allowlists, not free-form strings.
// - Table order is the severity order (Optimal/L1 lowest, Halt/L5 highest).
// - Do NOT extend these lists in code without bumping SCHEMA_VERSION.

/**
 * The five discrete operating modes, ordered by rising risk.
 */
export const MODES_V1 = Object.freeze(["Optimal", "Normal", "Caution", "Alert", "Halt"] as const);

/**
 * The five risk classification levels, index-aligned with MODES_V1.
 */
export const RISK_LEVELS_V1 = Object.freeze(["L1", "L2", "L3", "L4", "L5"] as const);

export type ModeV1 = (typeof MODES_V1)[number];
export type RiskLevelV1 = (typeof RISK_LEVELS_V1)[number];

/**
 * Fixed bijection mode -> risk level.
 */
const MODE_TO_RISK_LEVEL: Record<ModeV1, RiskLevelV1> = {
  Optimal: "L1",
  Normal: "L2",
  Caution: "L3",
  Alert: "L4",
  Halt: "L5"
};
export const MODE_TO_RISK_LEVEL_V1: Readonly<Record<ModeV1, RiskLevelV1>> = Object.freeze(MODE_TO_RISK_LEVEL);

/**
 * Inverse of MODE_TO_RISK_LEVEL_V1.
 */
const RISK_LEVEL_TO_MODE: Record<RiskLevelV1, ModeV1> = {
  L1: "Optimal",
  L2: "Normal",
  L3: "Caution",
  L4: "Alert",
  L5: "Halt"
};
export const RISK_LEVEL_TO_MODE_V1: Readonly<Record<RiskLevelV1, ModeV1>> = Object.freeze(RISK_LEVEL_TO_MODE);

const MODE_SET_V1: ReadonlySet<string> = new Set<string>(MODES_V1);
const RISK_LEVEL_SET_V1: ReadonlySet<string> = new Set<string>(RISK_LEVELS_V1);

/**
 * Checks whether a string is one of the five canonical modes (case-sensitive).
 */
export function isModeV1(value: string): value is ModeV1 {
  return MODE_SET_V1.has(value);
}

/**
 * Checks whether a string is one of the five canonical risk levels (case-sensitive).
 */
export function isRiskLevelV1(value: string): value is RiskLevelV1 {
  return RISK_LEVEL_SET_V1.has(value);
}
