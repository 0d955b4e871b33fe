import assert from "node:assert";
import { describe, it } from "node:test";

import { RuntimeStateDecodeError } from "../errors";
import {
  RUNTIME_STATE_RECORD_FIELDS,
  SCHEMA_VERSION,
  SPEC_VERSION,
  decodeRuntimeStateRecordV1,
  decodeRuntimeStateStreamV1,
  encodeRuntimeStateRecordV1,
  parseRuntimeStateRecordV1,
  type RuntimeStateRecordV1
} from "../schema/runtime_state_record_v1";

const ok: RuntimeStateRecordV1 = {
  spec_version: "pmatrix-3.5",
  schema_version: "1.0.0",
  timestamp: 1707500000,
  functions: { baseline: 0.25, norm: 0.7, stability: 0.3, meta_control: 0.2 },
  stability_score: 0.3625,
  risk_score: 0.6375,
  mode: "Alert",
  risk_level: "L4"
};

function expectDecodeFail(fn: () => unknown, path: string): RuntimeStateDecodeError {
  let caught: unknown;
  try {
    fn();
  } catch (e) {
    caught = e;
  }
  assert.ok(caught instanceof RuntimeStateDecodeError, `expected decode failure at "${path}"`);
  assert.equal(caught.code, "DECODE_REJECTED");
  assert.ok(
    caught.issues.some((i) => i.path === path),
    `no issue at "${path}": ${JSON.stringify(caught.issues)}`
  );
  return caught;
}

describe("version constants", () => {
  it("pins the current versions", () => {
    assert.equal(SPEC_VERSION, "pmatrix-3.5");
    assert.equal(SCHEMA_VERSION, "1.0.0");
    assert.equal(RUNTIME_STATE_RECORD_FIELDS.length, 8);
  });
});

describe("parseRuntimeStateRecordV1", () => {
  it("accepts exactly the eight canonical fields", () => {
    assert.deepStrictEqual(parseRuntimeStateRecordV1(ok), ok);
  });

  it("keeps wire strings for mode and risk_level", () => {
    const parsed = parseRuntimeStateRecordV1({ ...ok, mode: "Sideways", risk_level: "" });
    assert.equal(parsed.mode, "Sideways");
    assert.equal(parsed.risk_level, "");
  });

  it("rejects a ninth top-level field", () => {
    const err = expectDecodeFail(() => parseRuntimeStateRecordV1({ ...ok, confidence: 0.9 }), "");
    assert.ok(err.message.includes("confidence"), err.message);
  });

  it("rejects an unknown key inside functions", () => {
    expectDecodeFail(() => parseRuntimeStateRecordV1({ ...ok, functions: { ...ok.functions, extra: 0 } }), "functions");
  });

  it("rejects missing fields", () => {
    const { mode: _mode, ...withoutMode } = ok;
    expectDecodeFail(() => parseRuntimeStateRecordV1(withoutMode), "mode");
    const { meta_control: _mc, ...partialFunctions } = ok.functions;
    expectDecodeFail(() => parseRuntimeStateRecordV1({ ...ok, functions: partialFunctions }), "functions.meta_control");
  });

  it("rejects wrong field types", () => {
    expectDecodeFail(() => parseRuntimeStateRecordV1({ ...ok, risk_score: "0.6" }), "risk_score");
    expectDecodeFail(() => parseRuntimeStateRecordV1({ ...ok, spec_version: 35 }), "spec_version");
    expectDecodeFail(() => parseRuntimeStateRecordV1({ ...ok, functions: [0.1, 0.2, 0.3, 0.4] }), "functions");
  });

  it("requires an unsigned integer timestamp but leaves zero to the invariants", () => {
    expectDecodeFail(() => parseRuntimeStateRecordV1({ ...ok, timestamp: -1 }), "timestamp");
    expectDecodeFail(() => parseRuntimeStateRecordV1({ ...ok, timestamp: 1.5 }), "timestamp");
    assert.equal(parseRuntimeStateRecordV1({ ...ok, timestamp: 0 }).timestamp, 0);
  });

  it("leaves range checks to the invariants", () => {
    assert.equal(parseRuntimeStateRecordV1({ ...ok, risk_score: 7 }).risk_score, 7);
  });
});

describe("decodeRuntimeStateRecordV1", () => {
  it("reports malformed JSON as a decode failure", () => {
    const err = expectDecodeFail(() => decodeRuntimeStateRecordV1("{not json"), "");
    assert.ok(err.message.startsWith("invalid JSON: "), err.message);
  });

  it("rejects a ninth field in JSON text", () => {
    const text = JSON.stringify({ ...ok, extra: true });
    expectDecodeFail(() => decodeRuntimeStateRecordV1(text), "");
  });

  it("round-trips encode/decode field-for-field", () => {
    assert.deepStrictEqual(decodeRuntimeStateRecordV1(encodeRuntimeStateRecordV1(ok)), ok);
  });
});

describe("encodeRuntimeStateRecordV1", () => {
  it("writes keys in canonical order", () => {
    const shuffled: RuntimeStateRecordV1 = {
      risk_level: "L4",
      mode: "Alert",
      risk_score: 0.6375,
      stability_score: 0.3625,
      functions: { meta_control: 0.2, stability: 0.3, norm: 0.7, baseline: 0.25 },
      timestamp: 1707500000,
      schema_version: "1.0.0",
      spec_version: "pmatrix-3.5"
    };
    assert.equal(
      encodeRuntimeStateRecordV1(shuffled),
      '{"spec_version":"pmatrix-3.5","schema_version":"1.0.0","timestamp":1707500000,' +
        '"functions":{"baseline":0.25,"norm":0.7,"stability":0.3,"meta_control":0.2},' +
        '"stability_score":0.3625,"risk_score":0.6375,"mode":"Alert","risk_level":"L4"}'
    );
  });

  it("pretty-prints with two-space indentation", () => {
    const lines = encodeRuntimeStateRecordV1(ok, { pretty: true }).split("\n");
    assert.equal(lines[0], "{");
    assert.equal(lines[1], '  "spec_version": "pmatrix-3.5",');
    assert.equal(lines[4], '  "functions": {');
    assert.equal(lines[5], '    "baseline": 0.25,');
    assert.equal(lines[lines.length - 1], "}");
  });
});

describe("decodeRuntimeStateStreamV1", () => {
  const second = { ...ok, timestamp: 1707500001 };

  it("accepts a JSON array", () => {
    const records = decodeRuntimeStateStreamV1(JSON.stringify([ok, second]));
    assert.deepStrictEqual(
      records.map((r) => r.timestamp),
      [1707500000, 1707500001]
    );
  });

  it("accepts JSON Lines and skips blank lines", () => {
    const text = `${JSON.stringify(ok)}\n\n${JSON.stringify(second)}\n`;
    assert.equal(decodeRuntimeStateStreamV1(text).length, 2);
  });

  it("names the failing element", () => {
    const text = JSON.stringify([ok, { ...second, extra: 1 }]);
    const err = expectDecodeFail(() => decodeRuntimeStateStreamV1(text), "1");
    assert.ok(err.message.startsWith("runtime state stream rejected at index 1: "), err.message);
  });

  it("names the failing JSON line", () => {
    const text = `${JSON.stringify(ok)}\n{broken`;
    const err = expectDecodeFail(() => decodeRuntimeStateStreamV1(text), "1");
    assert.ok(err.message.startsWith("invalid JSON at 1: "), err.message);
  });

  it("decodes an empty input as an empty stream", () => {
    assert.deepStrictEqual(decodeRuntimeStateStreamV1(""), []);
    assert.deepStrictEqual(decodeRuntimeStateStreamV1("[]"), []);
  });
});
