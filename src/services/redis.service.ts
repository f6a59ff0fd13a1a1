import { createClient } from "redis";

import { config } from "@/config/config";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("redis");

export type ManagedRedisClient = ReturnType<typeof createClient>;

// One multiplexed connection per process; wizard traffic is a handful of keys.
let client: ManagedRedisClient | null = null;
let connecting: Promise<ManagedRedisClient> | null = null;

function createManagedClient(): ManagedRedisClient {
  const created: ManagedRedisClient = createClient({
    url: config.redis.url,
    socket: {
      reconnectStrategy: (retries) => Math.min(retries * 50, 2_000),
    },
  });

  created.on("ready", () => log.info("Redis client ready"));
  created.on("error", (error) => log.error("Redis client error", { error }));
  created.on("end", () => log.warn("Redis client disconnected"));
  created.on("reconnecting", () => log.warn("Redis client reconnecting"));

  return created;
}

async function acquireRedisClient(): Promise<ManagedRedisClient> {
  if (client?.isOpen) {
    return client;
  }

  if (!connecting) {
    const pending = client ?? createManagedClient();
    client = pending;
    connecting = pending
      .connect()
      .then(() => pending)
      .finally(() => {
        connecting = null;
      });
  }

  return connecting;
}

export async function initializeRedisService() {
  await acquireRedisClient();
}

export async function withRedisClient<T>(executor: (client: ManagedRedisClient) => Promise<T> | T): Promise<T> {
  const redis = await acquireRedisClient();
  return executor(redis);
}

export async function checkRedisHealth(): Promise<boolean> {
  try {
    const pong = await withRedisClient((redis) => redis.ping());
    return pong === "PONG";
  } catch (error) {
    log.error("Redis health check failed", { error });
    return false;
  }
}

export async function shutdownRedisService() {
  const current = client;
  client = null;

  if (!current?.isOpen) {
    return;
  }

  try {
    await current.quit();
  } catch (error) {
    log.error("Failed to close Redis client", { error });
  }

  log.info("Redis client shut down");
}
