// Runtime state HTTP routes.
//
// - Decode failures are 400 with code DECODE_REJECTED; validation is not attempted.
// - Invariant violations are NOT HTTP errors: 200 with conforming=false and the
//   full per-check result list.
// - Emitter input rejection is 400 with code INPUT_REJECTED.

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import {
  FunctionsV1Z,
  RuntimeStateDecodeError,
  RuntimeStateInputError,
  SCHEMA_VERSION,
  SPEC_VERSION,
  parseRuntimeStateRecordV1,
  parseRuntimeStateStreamV1,
  type DecodeIssue,
  type RuntimeStateRecordV1
} from "@pmatrix/contracts";
import { emitDemoRecord, validateAll, validateStream } from "@pmatrix/state-kernel";

import type { RuntimeStateServiceConfigV1 } from "../config";

export type ApiError = { code: string; path: string; message: string };

const EmitRequestZ = z
  .object({
    functions: FunctionsV1Z,
    timestamp: z.number().int().nonnegative().lte(Number.MAX_SAFE_INTEGER).optional()
  })
  .strict();

const StreamRequestZ = z.object({ records: z.array(z.unknown()) }).strict();

function decodeErrors(issues: ReadonlyArray<DecodeIssue>, prefix = ""): ApiError[] {
  return issues.map((i) => ({
    code: "DECODE_REJECTED",
    path: prefix && i.path ? `${prefix}.${i.path}` : prefix || i.path,
    message: i.message
  }));
}

function zodErrors(error: z.ZodError): ApiError[] {
  return error.issues.map((i) => ({ code: "DECODE_REJECTED", path: i.path.join("."), message: i.message }));
}

export function registerRuntimeStateRoutes(app: FastifyInstance, config: RuntimeStateServiceConfigV1): void {
  // GET /api/health
  app.get("/api/health", async (_req, reply) => {
    return reply.send({ ok: true, spec_version: SPEC_VERSION, schema_version: SCHEMA_VERSION });
  });

  // POST /api/runtime_state/emit
  // Body: { functions, timestamp? }. Returns a demonstration record.
  app.post("/api/runtime_state/emit", async (req, reply) => {
    const parsed = EmitRequestZ.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send({ ok: false, errors: zodErrors(parsed.error) });

    try {
      const record = emitDemoRecord(parsed.data.functions, parsed.data.timestamp);
      return reply.send({ ok: true, record });
    } catch (e) {
      if (!(e instanceof RuntimeStateInputError)) throw e;
      req.log.warn({ field: e.field }, "emit input rejected");
      return reply.code(400).send({
        ok: false,
        errors: [{ code: e.code, path: e.field === "timestamp" ? "timestamp" : `functions.${e.field}`, message: e.message }]
      });
    }
  });

  // POST /api/runtime_state/validate
  // Body: one record. Returns all twelve results.
  app.post("/api/runtime_state/validate", async (req, reply) => {
    let record: RuntimeStateRecordV1;
    try {
      record = parseRuntimeStateRecordV1(req.body);
    } catch (e) {
      if (!(e instanceof RuntimeStateDecodeError)) throw e;
      req.log.warn({ issues: e.issues }, "runtime state record decode rejected");
      return reply.code(400).send({ ok: false, errors: decodeErrors(e.issues) });
    }

    const results = validateAll(record);
    const conforming = results.every((r) => r.passed);
    req.log.info(
      { conforming, failed: results.filter((r) => !r.passed).map((r) => r.id) },
      "runtime state record validated"
    );
    return reply.send({ ok: true, conforming, results });
  });

  // POST /api/runtime_state/validate_stream
  // Body: { records: [...] } in emission order.
  app.post("/api/runtime_state/validate_stream", async (req, reply) => {
    const envelope = StreamRequestZ.safeParse(req.body);
    if (!envelope.success) return reply.code(400).send({ ok: false, errors: zodErrors(envelope.error) });

    const max = config.stream.max_records;
    if (envelope.data.records.length > max) {
      return reply.code(400).send({
        ok: false,
        errors: [
          {
            code: "STREAM_TOO_LARGE",
            path: "records",
            message: `stream has ${envelope.data.records.length} records, limit is ${max}`
          }
        ]
      });
    }

    let records: RuntimeStateRecordV1[];
    try {
      records = parseRuntimeStateStreamV1(envelope.data.records);
    } catch (e) {
      if (!(e instanceof RuntimeStateDecodeError)) throw e;
      req.log.warn({ issues: e.issues }, "runtime state stream decode rejected");
      return reply.code(400).send({ ok: false, errors: decodeErrors(e.issues, "records") });
    }

    const report = validateStream(records);
    req.log.info(
      { conforming: report.conforming, count: records.length, t1_violation_index: report.t1ViolationIndex },
      "runtime state stream validated"
    );
    return reply.send({
      ok: true,
      conforming: report.conforming,
      t1_violation_index: report.t1ViolationIndex ?? null,
      records: report.records
    });
  });
}
