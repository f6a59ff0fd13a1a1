import { Pool } from "pg";

import { config } from "@/config/config";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("postgres");

let pool: Pool | null = null;

function createPool(): Pool {
  const createdPool = new Pool({
    connectionString: config.database.url,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  createdPool.on("error", (error) => {
    log.error("Unexpected PostgreSQL client error", { error });
  });

  return createdPool;
}

export function getDatabasePool(): Pool {
  if (!pool) {
    pool = createPool();
  }

  return pool;
}

export async function initializeDatabase() {
  const dbPool = getDatabasePool();

  try {
    await dbPool.query("SELECT 1");
    log.info("Connected to PostgreSQL");
  } catch (error) {
    log.error("Failed to initialize PostgreSQL connection", { error });
    throw error;
  }
}

export async function checkDatabaseHealth(): Promise<boolean> {
  try {
    await getDatabasePool().query("SELECT 1");
    return true;
  } catch (error) {
    log.error("PostgreSQL health check failed", { error });
    return false;
  }
}

export async function closeDatabasePool() {
  if (!pool) {
    return;
  }

  await pool.end();
  pool = null;
}
