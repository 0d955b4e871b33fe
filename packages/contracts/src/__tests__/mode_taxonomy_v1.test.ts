import assert from "node:assert";
import { describe, it } from "node:test";

import {
  MODES_V1,
  MODE_TO_RISK_LEVEL_V1,
  RISK_LEVELS_V1,
  RISK_LEVEL_TO_MODE_V1,
  isModeV1,
  isRiskLevelV1
} from "../schema/mode_taxonomy_v1";

describe("mode taxonomy v1", () => {
  it("lists five modes and five levels in severity order", () => {
    assert.deepStrictEqual([...MODES_V1], ["Optimal", "Normal", "Caution", "Alert", "Halt"]);
    assert.deepStrictEqual([...RISK_LEVELS_V1], ["L1", "L2", "L3", "L4", "L5"]);
  });

  it("aligns the mode table index-for-index with the level table", () => {
    MODES_V1.forEach((mode, i) => {
      assert.equal(MODE_TO_RISK_LEVEL_V1[mode], RISK_LEVELS_V1[i]);
      assert.equal(RISK_LEVEL_TO_MODE_V1[RISK_LEVELS_V1[i]], mode);
    });
  });

  it("exposes frozen tables", () => {
    for (const table of [MODES_V1, RISK_LEVELS_V1, MODE_TO_RISK_LEVEL_V1, RISK_LEVEL_TO_MODE_V1]) {
      assert.equal(Object.isFrozen(table), true);
    }
  });

  it("guards membership case-sensitively", () => {
    assert.equal(isModeV1("Caution"), true);
    assert.equal(isModeV1("caution"), false);
    assert.equal(isModeV1(""), false);
    assert.equal(isRiskLevelV1("L5"), true);
    assert.equal(isRiskLevelV1("l5"), false);
    assert.equal(isRiskLevelV1("L0"), false);
  });
});
