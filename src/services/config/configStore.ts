import { Queryable } from "@/services/jobs/jobStore";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("config-store");

export interface ConfigStore {
  /** Never throws: an absent key or a failing store yields `fallback`. */
  get(key: string, fallback: unknown): Promise<unknown>;
  set(key: string, value: unknown): Promise<void>;
}

interface ConfigRow {
  value: unknown;
}

export class PgConfigStore implements ConfigStore {
  constructor(private readonly db: Queryable) {}

  async get(key: string, fallback: unknown): Promise<unknown> {
    try {
      const result = await this.db.query<ConfigRow>("SELECT value FROM relay_config WHERE key = $1 LIMIT 1", [key]);
      const [row] = result.rows;
      return row ? row.value : fallback;
    } catch (error) {
      log.error("Failed to read relay config", { key, error });
      return fallback;
    }
  }

  async set(key: string, value: unknown): Promise<void> {
    await this.db.query(
      `INSERT INTO relay_config (key, value, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()`,
      [key, JSON.stringify(value)],
    );
  }
}
