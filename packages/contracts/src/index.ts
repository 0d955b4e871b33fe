// @pmatrix/contracts
// Runtime state record shape, taxonomy tables and error types.

export * from "./schema/mode_taxonomy_v1";
export * from "./schema/runtime_state_record_v1";
export * from "./errors";
