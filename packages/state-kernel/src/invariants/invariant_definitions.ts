import {
  FUNCTIONS_FIELDS,
  RUNTIME_STATE_RECORD_FIELDS,
  SPEC_VERSION,
  type RuntimeStateRecordV1
} from "@pmatrix/contracts";

import { mapModeToLevel, mapRiskToMode } from "../partition/partition_map";
import type { InvariantDefinition } from "./types";

type CheckOutcome = ReturnType<InvariantDefinition["check"]>;

const inUnitRange = (v: number): boolean => !Number.isNaN(v) && v >= 0 && v <= 1;

const SEMVER_PART = /^\d+$/;

function checkR1(r: RuntimeStateRecordV1): CheckOutcome {
  const bad = FUNCTIONS_FIELDS.filter((name) => !inUnitRange(r.functions[name]));
  if (bad.length === 0) return { passed: true, detail: "All function values in [0.0, 1.0]." };
  return {
    passed: false,
    detail: `Function value(s) out of [0.0, 1.0]: ${bad.map((name) => `${name}=${r.functions[name]}`).join(", ")}`
  };
}

function checkR2(r: RuntimeStateRecordV1): CheckOutcome {
  return {
    passed: inUnitRange(r.stability_score),
    detail: `stability_score=${r.stability_score}, expected within [0.0, 1.0]`
  };
}

function checkR3(r: RuntimeStateRecordV1): CheckOutcome {
  return {
    passed: inUnitRange(r.risk_score),
    detail: `risk_score=${r.risk_score}, expected within [0.0, 1.0]`
  };
}

function checkR4(r: RuntimeStateRecordV1): CheckOutcome {
  return { passed: r.timestamp > 0, detail: `timestamp=${r.timestamp}, expected > 0` };
}

function checkC1(r: RuntimeStateRecordV1): CheckOutcome {
  const expected = mapRiskToMode(r.risk_score);
  return {
    passed: expected !== undefined && expected === r.mode,
    detail: `risk_score=${r.risk_score} -> expected mode=${expected ?? "<unmappable>"}, actual mode=${r.mode}`
  };
}

function checkC2(r: RuntimeStateRecordV1): CheckOutcome {
  const expected = mapModeToLevel(r.mode);
  return {
    passed: expected !== undefined && expected === r.risk_level,
    detail: `mode=${r.mode} -> expected risk_level=${expected ?? "<unknown mode>"}, actual risk_level=${r.risk_level}`
  };
}

// Not independently checkable: defined as C1 AND C2.
function checkC3(r: RuntimeStateRecordV1): CheckOutcome {
  const c1 = checkC1(r).passed;
  const c2 = checkC2(r).passed;
  if (c1 && c2) return { passed: true, detail: "mode and risk_level are both determined by risk_score." };
  return {
    passed: false,
    detail: `risk_level not determined by risk_score (INV-C1=${c1 ? "PASS" : "FAIL"}, INV-C2=${c2 ? "PASS" : "FAIL"})`
  };
}

function checkS1(r: RuntimeStateRecordV1): CheckOutcome {
  const empty = (["spec_version", "schema_version", "mode", "risk_level"] as const).filter((k) => r[k].length === 0);
  if (empty.length === 0) return { passed: true, detail: "All eight fields present; no empty string fields." };
  return { passed: false, detail: `Empty string field(s): ${empty.join(", ")}` };
}

// Decoding already rejects unknown keys; this also catches values built in memory.
function checkS2(r: RuntimeStateRecordV1): CheckOutcome {
  const topLevel = new Set<string>(RUNTIME_STATE_RECORD_FIELDS);
  const nested = new Set<string>(FUNCTIONS_FIELDS);
  const extras = [
    ...Object.keys(r).filter((k) => !topLevel.has(k)),
    ...Object.keys(r.functions)
      .filter((k) => !nested.has(k))
      .map((k) => `functions.${k}`)
  ];
  if (extras.length === 0) return { passed: true, detail: "No fields beyond the canonical eight." };
  return { passed: false, detail: `Unexpected field(s): ${extras.join(", ")}` };
}

function checkS3(r: RuntimeStateRecordV1): CheckOutcome {
  return {
    passed: r.spec_version === SPEC_VERSION,
    detail: `spec_version=${r.spec_version}, expected=${SPEC_VERSION}`
  };
}

function checkS4(r: RuntimeStateRecordV1): CheckOutcome {
  const parts = r.schema_version.split(".");
  return {
    passed: parts.length === 3 && parts.every((p) => SEMVER_PART.test(p)),
    detail: `schema_version=${r.schema_version}, expected MAJOR.MINOR.PATCH`
  };
}

function checkT1Note(): CheckOutcome {
  return {
    passed: true,
    detail: "Stream-level invariant; not checkable on a single record. Use validateStreamT1() on the ordered stream."
  };
}

const DEFINITIONS: InvariantDefinition[] = [
  { id: "INV-R1", category: "range", check: checkR1 },
  { id: "INV-R2", category: "range", check: checkR2 },
  { id: "INV-R3", category: "range", check: checkR3 },
  { id: "INV-R4", category: "range", check: checkR4 },
  { id: "INV-C1", category: "consistency", check: checkC1 },
  { id: "INV-C2", category: "consistency", check: checkC2 },
  { id: "INV-C3", category: "consistency", check: checkC3 },
  { id: "INV-S1", category: "structural", check: checkS1 },
  { id: "INV-S2", category: "structural", check: checkS2 },
  { id: "INV-S3", category: "structural", check: checkS3 },
  { id: "INV-S4", category: "structural", check: checkS4 },
  { id: "INV-T1", category: "temporal", check: checkT1Note }
];

/**
 * The twelve invariants, in reporting order.
 */
export const invariantDefinitions: ReadonlyArray<InvariantDefinition> = Object.freeze(DEFINITIONS);
