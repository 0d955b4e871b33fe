// State Kernel - single-record invariant validator (v1)
//
// Every check runs on every call: callers get the full picture even when
// several invariants fail together. The record is never mutated.

import type { RuntimeStateRecordV1 } from "@pmatrix/contracts";

import { invariantDefinitions } from "./invariant_definitions";
import type { InvariantResult } from "./types";

/**
 * Runs all twelve invariants against one record.
 *
 * @returns One result per invariant, in definition order (R1..R4, C1..C3, S1..S4, T1).
 */
export function validateAll(record: RuntimeStateRecordV1): InvariantResult[] {
  return invariantDefinitions.map((def) => {
    const outcome = def.check(record);
    return { id: def.id, category: def.category, passed: outcome.passed, detail: outcome.detail };
  });
}

/**
 * Conformance: true iff every invariant passes.
 */
export function isValid(record: RuntimeStateRecordV1): boolean {
  return validateAll(record).every((r) => r.passed);
}
