#!/usr/bin/env node
/**
 * Runtime state reference CLI. A schema conformance tool, not an execution engine.
 *
 * Usage:
 *   npm run cli -- emit --baseline 0.25 --norm 0.70 --stability 0.30 --meta-control 0.20
 *   npm run cli -- validate < record.json
 *   npm run cli -- validate-stream --file records.jsonl
 *
 * Exit codes: 0 conforming / emitted, 1 violation or rejected input,
 * 2 undecodable input, 64 usage error, 66 unreadable input.
 */

import { parseArgv, UsageError } from "./args";
import { runEmit } from "./commands/emit";
import { runValidate } from "./commands/validate";
import { runValidateStream } from "./commands/validate_stream";
import { EXIT_OK, EXIT_USAGE, processIo, type CliIo } from "./io";

export const USAGE = [
  "Usage: pmatrix <command> [flags]",
  "",
  "Commands:",
  "  emit --baseline <n> --norm <n> --stability <n> --meta-control <n> [--timestamp <secs>]",
  "      Emit a demonstration runtime state record from four function values.",
  "  validate [--file <path>]",
  "      Validate one record (JSON, stdin by default) against all 12 invariants.",
  "  validate-stream [--file <path>]",
  "      Validate an ordered stream (JSON array or JSON Lines), including timestamp ordering.",
  "",
  "Exit codes:",
  "  0 conforming / emitted, 1 invariant violation or rejected input,",
  "  2 undecodable input, 64 usage error, 66 input file or stdin unreadable"
].join("\n");

export function runCli(argv: ReadonlyArray<string>, io: CliIo): number {
  try {
    const args = parseArgv(argv);
    switch (args.command) {
      case "emit":
        return runEmit(args, io);
      case "validate":
        return runValidate(args, io);
      case "validate-stream":
        return runValidateStream(args, io);
      case undefined:
      case "help":
      case "--help":
      case "-h":
        io.out(USAGE);
        return EXIT_OK;
      default:
        throw new UsageError(`unknown command: ${args.command}`);
    }
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    io.err(`Error: ${e.message}`);
    io.err(USAGE);
    return EXIT_USAGE;
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2), processIo);
}
