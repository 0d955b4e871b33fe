import fs from "node:fs";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  // Reads the whole input: the named file, or stdin when no file is given
  readInput(file: string | undefined): string;
}

export const processIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readInput: (file) => fs.readFileSync(file ?? 0, "utf8")
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_DECODE_FAILED = 2;
export const EXIT_USAGE = 64;
export const EXIT_READ_FAILED = 66;

/**
 * Reads the command input, reporting read failures (missing file, closed stdin)
 * on stderr. Returns undefined when nothing could be read.
 */
export function readCommandInput(io: CliIo, file: string | undefined): string | undefined {
  try {
    return io.readInput(file);
  } catch (e) {
    io.err(`Error reading input: ${e instanceof Error ? e.message : String(e)}`);
    return undefined;
  }
}
