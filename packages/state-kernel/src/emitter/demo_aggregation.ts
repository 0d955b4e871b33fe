// Demonstration score aggregation.
//
// Placeholder arithmetic that only fills the score fields so emitted records
// are well-formed. It is not an evaluation method and is never used to check
// a record: the validator does not relate scores to function values.

import type { FunctionsV1 } from "@pmatrix/contracts";

/** Arithmetic mean of the four function values. */
export function demoStabilityScore(f: FunctionsV1): number {
  return (f.baseline + f.norm + f.stability + f.meta_control) / 4;
}

/** Complement of the stability score. */
export function demoRiskScore(stabilityScore: number): number {
  return 1 - stabilityScore;
}
