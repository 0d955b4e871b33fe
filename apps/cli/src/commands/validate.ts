import { RuntimeStateDecodeError, decodeRuntimeStateRecordV1, type RuntimeStateRecordV1 } from "@pmatrix/contracts";
import { validateAll, type InvariantResult } from "@pmatrix/state-kernel";

import { assertKnownFlags, optionalStringFlag, type ParsedArgs } from "../args";
import { EXIT_DECODE_FAILED, EXIT_FAILURE, EXIT_OK, EXIT_READ_FAILED, readCommandInput, type CliIo } from "../io";

export const RESULT_CONFORMING = "Result: ALL INVARIANTS SATISFIED — record is conforming.";
export const RESULT_MALFORMED = "Result: INVARIANT VIOLATION(S) DETECTED — record is malformed.";

export function formatResultLine(r: InvariantResult): string {
  return `[${r.passed ? "PASS" : "FAIL"}] ${r.id} — ${r.detail}`;
}

// validate [--file <path>]  (stdin when --file is absent)
export function runValidate(args: ParsedArgs, io: CliIo): number {
  assertKnownFlags(args, ["file"]);
  const text = readCommandInput(io, optionalStringFlag(args, "file"));
  if (text === undefined) return EXIT_READ_FAILED;

  let record: RuntimeStateRecordV1;
  try {
    record = decodeRuntimeStateRecordV1(text);
  } catch (e) {
    if (!(e instanceof RuntimeStateDecodeError)) throw e;
    io.err(`JSON parse error: ${e.message}`);
    io.err("The input must be a valid runtime state record.");
    return EXIT_DECODE_FAILED;
  }

  const results = validateAll(record);
  for (const r of results) io.out(formatResultLine(r));
  io.out("");

  if (results.every((r) => r.passed)) {
    io.out(RESULT_CONFORMING);
    return EXIT_OK;
  }
  io.out(RESULT_MALFORMED);
  return EXIT_FAILURE;
}
