// Error taxonomy for runtime state records.
//
// Input rejection, decode rejection and internal inconsistency are thrown.
// Invariant violations are never thrown: they are reported as results.

export type RuntimeStateErrorCode = "INPUT_REJECTED" | "DECODE_REJECTED" | "INTERNAL_INCONSISTENCY";

export class RuntimeStateError extends Error {
  public readonly code: RuntimeStateErrorCode;

  public constructor(code: RuntimeStateErrorCode, message: string) {
    super(message);
    this.name = "RuntimeStateError";
    this.code = code;
  }
}

/**
 * Raised by the emitter when a raw input is NaN, infinite or outside [0, 1].
 */
export class RuntimeStateInputError extends RuntimeStateError {
  public readonly field: string;
  public readonly value: number;

  public constructor(field: string, value: number, message: string) {
    super("INPUT_REJECTED", message);
    this.name = "RuntimeStateInputError";
    this.field = field;
    this.value = value;
  }
}

export type DecodeIssue = {
  // Dot path into the payload ("" for the root, "functions.norm", "2.mode" for stream element 2)
  path: string;
  message: string;
};

/**
 * Raised when bytes do not satisfy the wire contract (bad JSON, wrong types,
 * missing or unknown fields). Validation is never attempted on such input.
 */
export class RuntimeStateDecodeError extends RuntimeStateError {
  public readonly issues: ReadonlyArray<DecodeIssue>;

  public constructor(message: string, issues: ReadonlyArray<DecodeIssue>) {
    super("DECODE_REJECTED", message);
    this.name = "RuntimeStateDecodeError";
    this.issues = issues;
  }
}

export class RuntimeStateInternalError extends RuntimeStateError {
  public constructor(message: string) {
    super("INTERNAL_INCONSISTENCY", message);
    this.name = "RuntimeStateInternalError";
  }
}
