// Runtime state validation service.
//
// HTTP surface over @pmatrix/state-kernel. The kernel stays IO-free; logging
// is Fastify's pino logger configured from config/runtime_state/default.json.

import Fastify, { type FastifyError, type FastifyInstance } from "fastify";

import type { RuntimeStateServiceConfigV1 } from "./config";
import { registerRuntimeStateRoutes } from "./routes/runtime_state";

export function buildServer(config: RuntimeStateServiceConfigV1): FastifyInstance {
  const app = Fastify({
    logger: { level: config.logging.level },
    bodyLimit: config.server.body_limit_bytes
  });

  // Body parser failures (bad JSON, oversize) share the route error envelope.
  app.setErrorHandler((err: FastifyError, req, reply) => {
    const status = err.statusCode ?? 500;
    if (status === 413) {
      return reply.code(413).send({ ok: false, errors: [{ code: "BODY_TOO_LARGE", path: "", message: err.message }] });
    }
    if (status >= 400 && status < 500) {
      req.log.warn({ err }, "request body rejected");
      return reply.code(status).send({ ok: false, errors: [{ code: "DECODE_REJECTED", path: "", message: err.message }] });
    }
    req.log.error({ err }, "unhandled error");
    return reply.code(500).send({ ok: false, errors: [{ code: "INTERNAL", path: "", message: "internal error" }] });
  });

  registerRuntimeStateRoutes(app, config);
  return app;
}
