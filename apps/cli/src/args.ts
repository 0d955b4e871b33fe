// Minimal argv parsing: `<command> --flag value ...`.
//
// Kept dependency-free like the repository scripts; unknown flags are rejected.

export class UsageError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type ParsedArgs = {
  command: string | undefined;
  flags: Map<string, string | true>;
};

export function parseArgv(argv: ReadonlyArray<string>): ParsedArgs {
  const [command, ...rest] = argv;
  const flags = new Map<string, string | true>();

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    if (!token.startsWith("--")) throw new UsageError(`unexpected argument: ${token}`);

    const eq = token.indexOf("=");
    if (eq !== -1) {
      flags.set(token.slice(2, eq), token.slice(eq + 1));
      continue;
    }

    const next = rest[i + 1];
    // "--x -0.5" is a value, "--x --y" is a boolean flag
    if (next === undefined || next.startsWith("--")) {
      flags.set(token.slice(2), true);
    } else {
      flags.set(token.slice(2), next);
      i++;
    }
  }

  return { command, flags };
}

export function assertKnownFlags(args: ParsedArgs, allowed: ReadonlyArray<string>): void {
  for (const name of args.flags.keys()) {
    if (!allowed.includes(name)) throw new UsageError(`unknown flag: --${name}`);
  }
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const v = args.flags.get(name);
  if (v === true) throw new UsageError(`--${name} requires a value`);
  return v;
}

export function requireNumberFlag(args: ParsedArgs, name: string): number {
  const raw = stringFlag(args, name);
  if (raw === undefined) throw new UsageError(`missing required flag --${name}`);
  const s = raw.trim();
  const n = Number(s);
  // NaN/inf are well-formed numbers here; range policy belongs to the emitter
  if (s === "" || (Number.isNaN(n) && s.toLowerCase() !== "nan")) {
    throw new UsageError(`invalid value for --${name}: ${raw}`);
  }
  return n;
}

export function optionalUnsignedIntFlag(args: ParsedArgs, name: string): number | undefined {
  const raw = stringFlag(args, name);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw.trim())) throw new UsageError(`invalid value for --${name}: ${raw}`);
  return Number(raw.trim());
}

export function optionalStringFlag(args: ParsedArgs, name: string): string | undefined {
  return stringFlag(args, name);
}
