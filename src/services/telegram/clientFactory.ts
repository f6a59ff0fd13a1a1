import { TelegramClient } from "telegram";
import { LogLevel } from "telegram/extensions/Logger";
import { StringSession } from "telegram/sessions";

import { withTelegramErrors } from "@/services/telegram/telegramErrors";
import { ConfigurationError } from "@/utils/errors";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("telegram-client");

export interface TelegramCredentials {
  apiId: number;
  apiHash: string;
}

function createClient(credentials: TelegramCredentials, sessionString: string) {
  if (!credentials.apiId || !credentials.apiHash) {
    throw new ConfigurationError("TELEGRAM_API_ID and TELEGRAM_API_HASH are required");
  }

  const client = new TelegramClient(new StringSession(sessionString), credentials.apiId, credentials.apiHash, {
    connectionRetries: 5,
    // Flood waits must reach the loops as errors instead of being slept inside gramjs.
    floodSleepThreshold: 0,
  });
  client.setLogLevel(LogLevel.ERROR);

  return client;
}

export async function startBotClient(credentials: TelegramCredentials, botToken: string): Promise<TelegramClient> {
  if (!botToken) {
    throw new ConfigurationError("BOT_TOKEN is required for the operator process");
  }

  const client = createClient(credentials, "");
  await withTelegramErrors(() => client.start({ botAuthToken: botToken }));

  log.info("Operator bot connected");
  return client;
}

/** Connects the delivery account; an unauthorized session is a configuration error. */
export async function startUserClient(
  credentials: TelegramCredentials,
  sessionString: string,
): Promise<TelegramClient> {
  const client = createClient(credentials, sessionString);
  await withTelegramErrors(() => client.connect());

  if (!(await client.checkAuthorization())) {
    await client.disconnect();
    throw new ConfigurationError("Delivery session is not authorized; run /generate_session again");
  }

  log.info("Delivery account connected");
  return client;
}
