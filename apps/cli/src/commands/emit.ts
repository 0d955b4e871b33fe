import { RuntimeStateError, encodeRuntimeStateRecordV1 } from "@pmatrix/contracts";
import { emitDemoRecord } from "@pmatrix/state-kernel";

import { assertKnownFlags, optionalUnsignedIntFlag, requireNumberFlag, type ParsedArgs } from "../args";
import { EXIT_FAILURE, EXIT_OK, type CliIo } from "../io";

export const EMIT_FLAGS = ["baseline", "norm", "stability", "meta-control", "timestamp"] as const;

// emit --baseline <n> --norm <n> --stability <n> --meta-control <n> [--timestamp <secs>]
export function runEmit(args: ParsedArgs, io: CliIo, clock?: () => number): number {
  assertKnownFlags(args, EMIT_FLAGS);

  const functions = {
    baseline: requireNumberFlag(args, "baseline"),
    norm: requireNumberFlag(args, "norm"),
    stability: requireNumberFlag(args, "stability"),
    meta_control: requireNumberFlag(args, "meta-control")
  };
  const timestamp = optionalUnsignedIntFlag(args, "timestamp");

  try {
    const record = emitDemoRecord(functions, timestamp, clock);
    io.out(encodeRuntimeStateRecordV1(record, { pretty: true }));
    return EXIT_OK;
  } catch (e) {
    if (e instanceof RuntimeStateError) {
      io.err(`Error: ${e.message}`);
      return EXIT_FAILURE;
    }
    throw e;
  }
}
