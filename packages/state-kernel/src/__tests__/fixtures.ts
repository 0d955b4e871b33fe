import { SCHEMA_VERSION, SPEC_VERSION, type RuntimeStateRecordV1 } from "@pmatrix/contracts";

// Conforming baseline record: risk_score 0.6375 sits in the Alert band.
export function makeRecord(overrides: Partial<RuntimeStateRecordV1> = {}): RuntimeStateRecordV1 {
  return {
    spec_version: SPEC_VERSION,
    schema_version: SCHEMA_VERSION,
    timestamp: 1707500000,
    functions: { baseline: 0.25, norm: 0.7, stability: 0.3, meta_control: 0.2 },
    stability_score: 0.3625,
    risk_score: 0.6375,
    mode: "Alert",
    risk_level: "L4",
    ...overrides
  };
}

export function recordWithRisk(riskScore: number, mode: string, riskLevel: string): RuntimeStateRecordV1 {
  return makeRecord({ risk_score: riskScore, stability_score: 1 - riskScore, mode, risk_level: riskLevel });
}
