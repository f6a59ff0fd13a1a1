import { FastifyInstance } from "fastify";

import { config } from "@/config/config";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("http");

export function registerRequestLogger(app: FastifyInstance) {
  app.addHook("onRequest", async (request, reply) => {
    reply.header(config.server.requestIdHeader, request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    const meta = {
      requestId: request.id,
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime * 100) / 100,
    };

    // Health probes arrive every few seconds.
    if (request.url.startsWith("/api/health") && reply.statusCode < 400) {
      log.debug("Request completed", meta);
      return;
    }

    log.info("Request completed", meta);
  });
}
