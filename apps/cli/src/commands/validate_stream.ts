import { RuntimeStateDecodeError, decodeRuntimeStateStreamV1, type RuntimeStateRecordV1 } from "@pmatrix/contracts";
import { validateStream } from "@pmatrix/state-kernel";

import { assertKnownFlags, optionalStringFlag, type ParsedArgs } from "../args";
import { EXIT_DECODE_FAILED, EXIT_FAILURE, EXIT_OK, EXIT_READ_FAILED, readCommandInput, type CliIo } from "../io";

export const STREAM_CONFORMING = "Result: STREAM CONFORMING — every record conforms and timestamps are non-decreasing.";
export const STREAM_MALFORMED = "Result: STREAM VIOLATION(S) DETECTED.";

// validate-stream [--file <path>]: JSON array or JSON Lines, in emission order
export function runValidateStream(args: ParsedArgs, io: CliIo): number {
  assertKnownFlags(args, ["file"]);
  const text = readCommandInput(io, optionalStringFlag(args, "file"));
  if (text === undefined) return EXIT_READ_FAILED;

  let records: RuntimeStateRecordV1[];
  try {
    records = decodeRuntimeStateStreamV1(text);
  } catch (e) {
    if (!(e instanceof RuntimeStateDecodeError)) throw e;
    io.err(`JSON parse error: ${e.message}`);
    io.err("The input must be a JSON array or JSON Lines of runtime state records.");
    return EXIT_DECODE_FAILED;
  }

  const report = validateStream(records);
  for (const r of report.records) {
    const ts = records[r.index].timestamp;
    io.out(
      r.conforming
        ? `[PASS] record ${r.index} (timestamp=${ts})`
        : `[FAIL] record ${r.index} (timestamp=${ts}): ${r.failed.join(", ")}`
    );
  }

  const v = report.t1ViolationIndex;
  io.out(
    v === undefined
      ? `[PASS] INV-T1 — timestamps non-decreasing across ${records.length} record(s)`
      : `[FAIL] INV-T1 — record ${v} timestamp=${records[v].timestamp} < previous timestamp=${records[v - 1].timestamp}`
  );
  io.out("");

  io.out(report.conforming ? STREAM_CONFORMING : STREAM_MALFORMED);
  return report.conforming ? EXIT_OK : EXIT_FAILURE;
}
