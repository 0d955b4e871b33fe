// State Kernel - demonstration record emitter (v1)
//
// Builds a record from four raw inputs. Inputs are checked before anything is
// assembled; on failure no record exists.

import {
  FUNCTIONS_FIELDS,
  RuntimeStateInputError,
  RuntimeStateInternalError,
  SCHEMA_VERSION,
  SPEC_VERSION,
  type FunctionsV1,
  type RuntimeStateRecordV1
} from "@pmatrix/contracts";

import { mapModeToLevel, mapRiskToMode } from "../partition/partition_map";
import { demoRiskScore, demoStabilityScore } from "./demo_aggregation";

export type Clock = () => number;

const systemClockSeconds: Clock = () => Math.floor(Date.now() / 1000);

function assertUnitInput(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new RuntimeStateInputError(field, value, `${field} = ${value} is NaN or infinite`);
  }
  if (value < 0 || value > 1) {
    throw new RuntimeStateInputError(field, value, `${field} = ${value} is outside [0.0, 1.0]`);
  }
}

function assertTimestamp(value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new RuntimeStateInputError("timestamp", value, `timestamp = ${value} is not a positive integer of seconds`);
  }
}

/**
 * Emits a demonstration record.
 *
 * @param timestamp - Unix seconds; defaults to `clock()` (wall clock in whole seconds).
 * @throws RuntimeStateInputError when a function value is NaN, infinite or outside [0, 1],
 *   or when an explicit timestamp is not a positive whole number of seconds.
 */
export function emitDemoRecord(
  functions: FunctionsV1,
  timestamp?: number,
  clock: Clock = systemClockSeconds
): RuntimeStateRecordV1 {
  for (const field of FUNCTIONS_FIELDS) assertUnitInput(field, functions[field]);
  if (timestamp !== undefined) assertTimestamp(timestamp);

  // Copy so the record never aliases caller state.
  const fns: FunctionsV1 = {
    baseline: functions.baseline,
    norm: functions.norm,
    stability: functions.stability,
    meta_control: functions.meta_control
  };

  const stability_score = demoStabilityScore(fns);
  const risk_score = demoRiskScore(stability_score);

  const mode = mapRiskToMode(risk_score);
  if (mode === undefined) throw new RuntimeStateInternalError(`risk_score ${risk_score} out of range`);
  const risk_level = mapModeToLevel(mode);
  if (risk_level === undefined) throw new RuntimeStateInternalError(`unknown mode ${mode}`);

  return {
    spec_version: SPEC_VERSION,
    schema_version: SCHEMA_VERSION,
    timestamp: timestamp ?? clock(),
    functions: fns,
    stability_score,
    risk_score,
    mode,
    risk_level
  };
}
