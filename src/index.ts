import { createServer } from "./server";

import { config, RelayRole } from "@/config/config";
import { startDeliveryProcess } from "@/processes/deliveryProcess";
import { startOperatorProcess } from "@/processes/operatorProcess";
import { createRelayContext, RelayProcess } from "@/processes/relayContext";
import { StaleJobSweeper } from "@/services/cron/staleJobSweeper";
import { connectDatastores, datastoreHealthChecks, disconnectDatastores } from "@/utils/clients";
import { ConfigurationError } from "@/utils/errors";
import { logger } from "@/utils/logger";

function parseRole(argument: string | undefined): RelayRole {
  if (argument === "operator" || argument === "delivery") {
    return argument;
  }

  throw new ConfigurationError("Usage: index.ts <operator|delivery>", { role: argument ?? null });
}

async function start() {
  let relay: RelayProcess | null = null;
  let sweeper: StaleJobSweeper | null = null;

  try {
    const role = parseRole(process.argv[2]);

    await connectDatastores();

    const context = createRelayContext();
    relay = role === "operator" ? await startOperatorProcess(context) : await startDeliveryProcess(context);

    sweeper = new StaleJobSweeper(context.jobs, {
      schedule: config.relay.sweepSchedule,
      staleAfterMs: config.relay.staleClaimMs,
      statuses: relay.claimStatuses,
    });
    sweeper.start();

    const server = await createServer({
      jobs: context.jobs,
      health: datastoreHealthChecks,
    });
    await server.listen({ port: config.server.port, host: config.server.host });
    logger.info(`Relay ${role} process listening on http://${config.server.host}:${config.server.port}`);

    const running = relay;
    const runningSweeper = sweeper;
    const shutdown = async (signal: string) => {
      logger.info("Received shutdown signal", { signal });
      try {
        runningSweeper.stop();
        await running.stop();
        await server.close();
        await disconnectDatastores();
        logger.info("Cleanup complete, exiting process");
        process.exit(0);
      } catch (error) {
        logger.error("Failed to gracefully shut down", { error });
        process.exit(1);
      }
    };

    process.once("SIGINT", () => {
      void shutdown("SIGINT");
    });

    process.once("SIGTERM", () => {
      void shutdown("SIGTERM");
    });
  } catch (error) {
    logger.error("Failed to start relay", { error });
    sweeper?.stop();
    await relay?.stop().catch((stopError: unknown) => {
      logger.error("Failed to stop relay after startup failure", { stopError });
    });
    await disconnectDatastores().catch((disconnectError: unknown) => {
      logger.error("Failed to clean up resources after startup failure", { disconnectError });
    });
    process.exit(1);
  }
}

void start();
