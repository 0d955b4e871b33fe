// @pmatrix/state-kernel
// Entry point exports: partition mapping, invariant validation, demo emitter.
//
// No IO. No logging. Every export is a pure function except the emitter's
// default clock.

export * from "./partition/partition_map";
export * from "./invariants/types";
export * from "./invariants/invariant_definitions";
export * from "./invariants/validator";
export * from "./invariants/stream";
export * from "./emitter/demo_aggregation";
export * from "./emitter/emit_demo_record";
