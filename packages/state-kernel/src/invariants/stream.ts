// State Kernel - stream-level validation (v1)
//
// The only order-dependent check. Records must be given in emission order;
// partial or reordered batches give meaningless answers.

import type { RuntimeStateRecordV1 } from "@pmatrix/contracts";

import { validateAll } from "./validator";
import type { StreamReport } from "./types";

/**
 * Finds the first record whose timestamp is strictly less than its predecessor's.
 * Equal consecutive timestamps are allowed.
 *
 * @returns The offending index, or undefined when the stream is non-decreasing.
 */
export function validateStreamT1(records: ReadonlyArray<RuntimeStateRecordV1>): number | undefined {
  for (let i = 1; i < records.length; i++) {
    if (records[i].timestamp < records[i - 1].timestamp) return i;
  }
  return undefined;
}

/**
 * Validates every record independently, then the stream ordering.
 */
export function validateStream(records: ReadonlyArray<RuntimeStateRecordV1>): StreamReport {
  const perRecord = records.map((record, index) => {
    const failed = validateAll(record)
      .filter((r) => !r.passed)
      .map((r) => r.id);
    return { index, conforming: failed.length === 0, failed };
  });
  const t1ViolationIndex = validateStreamT1(records);

  return {
    records: perRecord,
    t1ViolationIndex,
    conforming: t1ViolationIndex === undefined && perRecord.every((r) => r.conforming)
  };
}
