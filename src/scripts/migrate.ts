import { closeDatabasePool, getDatabasePool, initializeDatabase } from "@/database/connection";
import { ensureSchema } from "@/database/schema";
import { logger } from "@/utils/logger";

async function migrate() {
  await initializeDatabase();
  await ensureSchema(getDatabasePool());
}

migrate()
  .then(() => logger.info("Migration complete"))
  .catch((error: unknown) => {
    logger.error("Migration failed", { error });
    process.exitCode = 1;
  })
  .finally(() => closeDatabasePool());
