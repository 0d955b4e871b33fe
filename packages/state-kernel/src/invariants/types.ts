import type { RuntimeStateRecordV1 } from "@pmatrix/contracts";

export type InvariantCategory = "range" | "consistency" | "structural" | "temporal";

export type InvariantId =
  | "INV-R1"
  | "INV-R2"
  | "INV-R3"
  | "INV-R4"
  | "INV-C1"
  | "INV-C2"
  | "INV-C3"
  | "INV-S1"
  | "INV-S2"
  | "INV-S3"
  | "INV-S4"
  | "INV-T1";

export interface InvariantResult {
  id: InvariantId;
  category: InvariantCategory;
  passed: boolean;
  // Human-readable actual vs expected
  detail: string;
}

export interface InvariantDefinition {
  id: InvariantId;
  category: InvariantCategory;
  check: (record: RuntimeStateRecordV1) => Omit<InvariantResult, "id" | "category">;
}

export interface StreamRecordReport {
  index: number;
  conforming: boolean;
  failed: InvariantId[];
}

export interface StreamReport {
  records: StreamRecordReport[];
  // Index of the first record older than its predecessor, if any
  t1ViolationIndex: number | undefined;
  conforming: boolean;
}
