import { z } from "zod"; // zod: runtime schema at the decode boundary

import { RuntimeStateDecodeError, type DecodeIssue } from "../errors";

/** Current spec version stamped on every emitted record. */
export const SPEC_VERSION = "pmatrix-3.5";

/** Current schema version stamped on every emitted record. */
export const SCHEMA_VERSION = "1.0.0";

/** Canonical top-level field set, in wire order. */
export const RUNTIME_STATE_RECORD_FIELDS = Object.freeze([
  "spec_version",
  "schema_version",
  "timestamp",
  "functions",
  "stability_score",
  "risk_score",
  "mode",
  "risk_level"
] as const);

/** Canonical field set of the nested `functions` object, in wire order. */
export const FUNCTIONS_FIELDS = Object.freeze(["baseline", "norm", "stability", "meta_control"] as const);

export const FunctionsV1Z = z
  .object({
    baseline: z.number(),
    norm: z.number(),
    stability: z.number(),
    meta_control: z.number()
  })
  .strict(); // no extra evaluation inputs

// Ranges, version values and the mode/level mapping are NOT enforced here:
// they are invariants, reported per check by the kernel. Only the shape is closed.
export const RuntimeStateRecordV1Z = z
  .object({
    spec_version: z.string(),
    schema_version: z.string(),
    timestamp: z.number().int().nonnegative().lte(Number.MAX_SAFE_INTEGER), // unsigned seconds
    functions: FunctionsV1Z,
    stability_score: z.number(),
    risk_score: z.number(),
    mode: z.string(), // open at the wire; membership is a consistency check
    risk_level: z.string() // open at the wire; membership is a consistency check
  })
  .strict(); // unknown keys fail decoding

export type FunctionsV1 = z.infer<typeof FunctionsV1Z>;
export type RuntimeStateRecordV1 = z.infer<typeof RuntimeStateRecordV1Z>;

function toDecodeIssues(error: z.ZodError, prefix: ReadonlyArray<string | number>): DecodeIssue[] {
  return error.issues.map((issue) => ({
    path: [...prefix, ...issue.path].join("."),
    message: issue.message
  }));
}

function parseJsonText(text: string, path: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    const where = path ? ` at ${path}` : "";
    throw new RuntimeStateDecodeError(`invalid JSON${where}: ${message}`, [{ path, message }]);
  }
}

/**
 * Admission parse for an already-parsed JSON value. Throws RuntimeStateDecodeError
 * on any shape violation, including unknown keys.
 */
export function parseRuntimeStateRecordV1(input: unknown): RuntimeStateRecordV1 {
  const result = RuntimeStateRecordV1Z.safeParse(input);
  if (!result.success) {
    const issues = toDecodeIssues(result.error, []);
    throw new RuntimeStateDecodeError(`runtime state record rejected: ${formatIssues(issues)}`, issues);
  }
  return result.data;
}

/**
 * Decodes a single record from JSON text.
 */
export function decodeRuntimeStateRecordV1(text: string): RuntimeStateRecordV1 {
  return parseRuntimeStateRecordV1(parseJsonText(text, ""));
}

/**
 * Decodes a stream of records, either a JSON array or JSON Lines (one record per
 * non-blank line). Element order is preserved; it is the emission order.
 */
export function decodeRuntimeStateStreamV1(text: string): RuntimeStateRecordV1[] {
  const trimmed = text.trim();
  const elements: unknown[] = [];

  if (trimmed.startsWith("[")) {
    const parsed = parseJsonText(trimmed, "");
    if (!Array.isArray(parsed)) {
      throw new RuntimeStateDecodeError("runtime state stream rejected: expected an array", [
        { path: "", message: "expected an array" }
      ]);
    }
    elements.push(...parsed);
  } else {
    const lines = trimmed.split(/\r?\n/).filter((line) => line.trim().length > 0);
    lines.forEach((line, index) => elements.push(parseJsonText(line, String(index))));
  }

  return parseRuntimeStateStreamV1(elements);
}

/**
 * Admission parse for an array of already-parsed JSON values.
 */
export function parseRuntimeStateStreamV1(elements: ReadonlyArray<unknown>): RuntimeStateRecordV1[] {
  return elements.map((element, index) => {
    const result = RuntimeStateRecordV1Z.safeParse(element);
    if (!result.success) {
      const issues = toDecodeIssues(result.error, [index]);
      throw new RuntimeStateDecodeError(`runtime state stream rejected at index ${index}: ${formatIssues(issues)}`, issues);
    }
    return result.data;
  });
}

/**
 * Encodes a record with keys in canonical order.
 */
export function encodeRuntimeStateRecordV1(record: RuntimeStateRecordV1, opts: { pretty?: boolean } = {}): string {
  const canonical: RuntimeStateRecordV1 = {
    spec_version: record.spec_version,
    schema_version: record.schema_version,
    timestamp: record.timestamp,
    functions: {
      baseline: record.functions.baseline,
      norm: record.functions.norm,
      stability: record.functions.stability,
      meta_control: record.functions.meta_control
    },
    stability_score: record.stability_score,
    risk_score: record.risk_score,
    mode: record.mode,
    risk_level: record.risk_level
  };
  return opts.pretty ? JSON.stringify(canonical, null, 2) : JSON.stringify(canonical);
}

export function formatIssues(issues: ReadonlyArray<DecodeIssue>): string {
  return issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");
}
