import bigInt from "big-integer";
import { Api, TelegramClient } from "telegram";
import { NewMessage, NewMessageEvent } from "telegram/events";

import { config } from "@/config/config";
import { CommandRouter } from "@/services/operator/commandRouter";
import { SessionWizard } from "@/services/operator/sessionWizard";
import { ReplyHarvester } from "@/services/relay/replyHarvester";
import { startBotClient } from "@/services/telegram/clientFactory";
import { toOperatorMessage } from "@/services/telegram/inboundMessages";
import { fromTelegramClient } from "@/services/telegram/rpcClient";
import { TelegramSessionManager } from "@/services/telegram/sessionManager";
import { TelegramMessageSender, TelegramTopicManager } from "@/services/telegram/telegramSender";
import { createMirrorLoop, ownsMirroring, RelayContext, RelayProcess } from "@/processes/relayContext";
import { describeError } from "@/utils/errors";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("operator-process");

async function botUsername(bot: TelegramClient): Promise<string | undefined> {
  const me = await bot.getMe();
  return me instanceof Api.User ? me.username : undefined;
}

async function sendNotices(bot: TelegramClient, router: CommandRouter, operatorId: string) {
  for (const notice of await router.startupNotices()) {
    try {
      await bot.sendMessage(bigInt(operatorId), { message: notice });
    } catch (error) {
      // The bot cannot write first until the operator has opened a chat with it.
      log.warn("Could not deliver startup notice", { error: describeError(error) });
    }
  }
}

/** Operator bot: commands, session wizard, reply harvesting and, optionally, mirroring. */
export async function startOperatorProcess(context: RelayContext): Promise<RelayProcess> {
  const bot = await startBotClient(config.telegram, config.telegram.botToken);

  const router = new CommandRouter({
    operatorId: context.operatorId,
    botUsername: await botUsername(bot),
    mirrorOwner: config.relay.mirrorOwner,
    settings: context.settings,
    jobs: context.jobs,
    wizard: new SessionWizard({
      authenticator: new TelegramSessionManager(config.telegram.apiId, config.telegram.apiHash),
      settings: context.settings,
    }),
    harvester: new ReplyHarvester({ jobs: context.jobs, settings: context.settings }),
  });

  const onMessage = async (event: NewMessageEvent) => {
    const message = toOperatorMessage(event.message);
    if (!message) {
      return;
    }

    try {
      const reply = await router.handle(message);
      if (reply) {
        await bot.sendMessage(bigInt(message.chatId), { message: reply, replyTo: message.messageId });
      }
    } catch (error) {
      log.error("Failed to answer operator message", { chatId: message.chatId, error: describeError(error) });
    }
  };
  bot.addEventHandler(onMessage, new NewMessage({}));

  await sendNotices(bot, router, context.operatorId);

  const rpc = fromTelegramClient(bot);
  const mirrorLoop = ownsMirroring("operator")
    ? createMirrorLoop(
        context,
        new TelegramMessageSender(rpc, { inlineButtons: true }),
        new TelegramTopicManager(rpc),
      )
    : null;
  mirrorLoop?.start();

  log.info("Operator process started", { mirroring: mirrorLoop !== null });

  return {
    claimStatuses: mirrorLoop ? ["MIRRORING"] : [],
    async stop() {
      await mirrorLoop?.stop();
      bot.removeEventHandler(onMessage, new NewMessage({}));
      await bot.disconnect();
    },
  };
}
