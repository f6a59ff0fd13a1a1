import { checkDatabaseHealth, closeDatabasePool, getDatabasePool, initializeDatabase } from "@/database/connection";
import { ensureSchema } from "@/database/schema";
import type { HealthChecks } from "@/routes/health";
import { checkRedisHealth, initializeRedisService, shutdownRedisService } from "@/services/redis.service";

/** Connects PostgreSQL and Redis and brings the relay schema up to date. */
export async function connectDatastores() {
  await initializeDatabase();
  await ensureSchema(getDatabasePool());
  await initializeRedisService();
}

export async function disconnectDatastores() {
  await closeDatabasePool();
  await shutdownRedisService();
}

export const datastoreHealthChecks: HealthChecks = {
  database: checkDatabaseHealth,
  redis: checkRedisHealth,
};
