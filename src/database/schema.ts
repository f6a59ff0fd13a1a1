import { readFile } from "node:fs/promises";
import path from "node:path";

import type { Queryable } from "@/services/jobs/jobStore";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("schema");

export const SCHEMA_FILE = path.resolve(__dirname, "../../migrations/001_relay_schema.sql");

/** Applies the relay schema; every statement is idempotent. */
export async function ensureSchema(db: Queryable, schemaFile = SCHEMA_FILE) {
  const sql = await readFile(schemaFile, "utf8");
  await db.query(sql);
  log.info("Relay schema ensured", { schemaFile });
}
