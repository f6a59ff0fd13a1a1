import { randomUUID } from "node:crypto";

import Fastify, { FastifyInstance } from "fastify";

import { config } from "@/config/config";
import { errorHandler } from "@/middleware/errorHandler";
import { registerRequestLogger } from "@/middleware/requestLogger";
import { HealthChecks, registerHealthRoutes } from "@/routes/health";
import { JobRoutesRepository, registerJobRoutes } from "@/routes/jobs";

export interface ServerDeps {
  jobs: JobRoutesRepository;
  health: HealthChecks;
}

function getRequestId(headers: Record<string, string | string[] | undefined>) {
  const headerValue = headers[config.server.requestIdHeader];
  if (typeof headerValue === "string" && headerValue.length > 0) {
    return headerValue;
  }

  if (Array.isArray(headerValue) && headerValue[0]) {
    return headerValue[0];
  }

  return randomUUID();
}

/** Read-only diagnostics API served by each relay process. */
export async function createServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({
    // Requests are logged through winston by the request logger hooks.
    logger: false,
    requestIdHeader: config.server.requestIdHeader,
    genReqId: (request) => getRequestId(request.headers),
  });

  registerRequestLogger(app);
  app.setErrorHandler(errorHandler);

  await app.register(async (scope) => registerHealthRoutes(scope, deps.health), { prefix: "/api" });
  await app.register(async (scope) => registerJobRoutes(scope, deps.jobs), { prefix: "/api/v1/jobs" });

  return app;
}
