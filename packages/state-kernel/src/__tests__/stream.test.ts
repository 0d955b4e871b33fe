import assert from "node:assert";
import { describe, it } from "node:test";

import { validateStream, validateStreamT1 } from "../invariants/stream";
import { makeRecord } from "./fixtures";

const at = (timestamp: number) => makeRecord({ timestamp });

describe("validateStreamT1", () => {
  it("allows equal consecutive timestamps", () => {
    assert.equal(validateStreamT1([at(1000), at(1000), at(1001)]), undefined);
  });

  it("reports the first record older than its predecessor", () => {
    assert.equal(validateStreamT1([at(1001), at(1000)]), 1);
    assert.equal(validateStreamT1([at(1), at(2), at(3), at(2), at(1)]), 3);
  });

  it("treats empty and single-record streams as ordered", () => {
    assert.equal(validateStreamT1([]), undefined);
    assert.equal(validateStreamT1([at(5)]), undefined);
  });
});

describe("validateStream", () => {
  it("is conforming when every record conforms and timestamps do not decrease", () => {
    const report = validateStream([at(1000), at(1000), at(1001)]);
    assert.equal(report.conforming, true);
    assert.equal(report.t1ViolationIndex, undefined);
    assert.deepStrictEqual(
      report.records.map((r) => r.conforming),
      [true, true, true]
    );
  });

  it("reports per-record failures independently of ordering", () => {
    const report = validateStream([at(1000), makeRecord({ timestamp: 1001, mode: "Halt", risk_level: "L5" })]);
    assert.equal(report.conforming, false);
    assert.equal(report.t1ViolationIndex, undefined);
    assert.deepStrictEqual(report.records[1], { index: 1, conforming: false, failed: ["INV-C1", "INV-C3"] });
  });

  it("fails on ordering alone", () => {
    const report = validateStream([at(1001), at(1000)]);
    assert.equal(report.conforming, false);
    assert.equal(report.t1ViolationIndex, 1);
    assert.deepStrictEqual(
      report.records.map((r) => r.failed),
      [[], []]
    );
  });
});
