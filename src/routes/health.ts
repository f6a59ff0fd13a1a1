import { FastifyInstance } from "fastify";

import { ServiceUnavailableError } from "@/utils/errors";

export interface HealthChecks {
  database: () => Promise<boolean>;
  redis: () => Promise<boolean>;
}

const now = () => new Date().toISOString();

export async function registerHealthRoutes(app: FastifyInstance, checks: HealthChecks) {
  app.get("/health", async () => ({
    status: "ok",
    timestamp: now(),
  }));

  app.get("/health/db", async () => {
    if (!(await checks.database())) {
      throw new ServiceUnavailableError("PostgreSQL is unavailable");
    }

    return {
      status: "ok",
      service: "postgres",
      timestamp: now(),
    };
  });

  app.get("/health/redis", async () => {
    if (!(await checks.redis())) {
      throw new ServiceUnavailableError("Redis is unavailable");
    }

    return {
      status: "ok",
      service: "redis",
      timestamp: now(),
    };
  });
}
