import { setTimeout as sleep } from "node:timers/promises";

import { TelegramClient } from "telegram";
import { NewMessage, NewMessageEvent } from "telegram/events";

import { config } from "@/config/config";
import { DeliveryWorker } from "@/services/relay/deliveryWorker";
import { DmIngestor } from "@/services/relay/dmIngestor";
import { PollingLoop } from "@/services/relay/pollingLoop";
import { startUserClient } from "@/services/telegram/clientFactory";
import { toInboundDirectMessage } from "@/services/telegram/inboundMessages";
import { fromTelegramClient } from "@/services/telegram/rpcClient";
import { TelegramMessageSender, TelegramTopicManager } from "@/services/telegram/telegramSender";
import { createMirrorLoop, ownsMirroring, RelayContext, RelayProcess } from "@/processes/relayContext";
import { describeError } from "@/utils/errors";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("delivery-process");

/**
 * Polls the config store until the operator has produced a session, then
 * connects with it. Resolves null when aborted first.
 */
async function connectWhenAuthorized(context: RelayContext, signal: AbortSignal): Promise<TelegramClient | null> {
  let failures = 0;
  let waitingLogged = false;

  while (!signal.aborted) {
    let delayMs = config.relay.credentialPollMs;

    try {
      const credential = await context.settings.getDeliveryCredential();
      if (credential) {
        return await startUserClient(config.telegram, credential);
      }

      if (!waitingLogged) {
        log.info("Waiting for a delivery session; run /generate_session with the operator bot");
        waitingLogged = true;
      }
    } catch (error) {
      failures += 1;
      delayMs = context.backoff.delayFor(failures);
      log.error("Delivery client connection failed", { error: describeError(error), delayMs });
    }

    try {
      await sleep(delayMs, undefined, { signal });
    } catch (error) {
      if (signal.aborted) {
        break;
      }
      throw error;
    }
  }

  return null;
}

/** Delivery account: DM ingestion, protected sends and, optionally, mirroring. */
export async function startDeliveryProcess(context: RelayContext): Promise<RelayProcess> {
  const abort = new AbortController();
  let client: TelegramClient | null = null;
  let deliveryLoop: PollingLoop | null = null;
  let mirrorLoop: PollingLoop | null = null;

  const ingestor = new DmIngestor({
    jobs: context.jobs,
    onJobCreated: () => mirrorLoop?.wake(),
  });

  const onMessage = async (event: NewMessageEvent) => {
    try {
      const inbound = await toInboundDirectMessage(event.message);
      if (inbound) {
        await ingestor.ingest(inbound);
      }
    } catch (error) {
      log.error("Failed to ingest direct message", { messageId: event.message.id, error: describeError(error) });
    }
  };

  const connecting = connectWhenAuthorized(context, abort.signal).then((connected) => {
    if (!connected) {
      return;
    }

    client = connected;
    const rpc = fromTelegramClient(connected);
    const sender = new TelegramMessageSender(rpc, { inlineButtons: false });

    const worker = new DeliveryWorker({ jobs: context.jobs, sender });
    deliveryLoop = new PollingLoop(() => worker.runOnce(), {
      name: "delivery",
      idleDelayMs: config.relay.pollIntervalMs,
      backoff: context.backoff,
    });

    if (ownsMirroring("delivery")) {
      mirrorLoop = createMirrorLoop(context, sender, new TelegramTopicManager(rpc));
    }

    connected.addEventHandler(onMessage, new NewMessage({ incoming: true }));
    deliveryLoop.start();
    mirrorLoop?.start();
    log.info("Delivery process started", { mirroring: mirrorLoop !== null });
  }).catch((error: unknown) => {
    log.error("Delivery process failed to start its loops", { error: describeError(error) });
  });

  return {
    claimStatuses: ownsMirroring("delivery") ? ["SENDING", "MIRRORING"] : ["SENDING"],
    async stop() {
      abort.abort();
      await connecting;
      await Promise.all([deliveryLoop?.stop(), mirrorLoop?.stop()]);

      const current: TelegramClient | null = client;
      if (current) {
        current.removeEventHandler(onMessage, new NewMessage({ incoming: true }));
        await current.disconnect();
      }
    },
  };
}
