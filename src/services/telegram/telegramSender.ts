import bigInt from "big-integer";
import { randomInt } from "node:crypto";
import { Api } from "telegram";
import { generateRandomBigInt } from "telegram/Helpers";

import { toInputMedia } from "@/services/telegram/mediaRef";
import { toReplyMarkup } from "@/services/telegram/messageAdapter";
import { RpcClient, extractSentMessageId } from "@/services/telegram/rpcClient";
import { withTelegramErrors } from "@/services/telegram/telegramErrors";
import { MediaKind, SendDescriptor } from "@/types/content";
import { MessageSender, SendOptions, TopicManager } from "@/types/messaging";

// Telegram rejects captions on these.
const CAPTIONLESS_KINDS: ReadonlySet<MediaKind> = new Set(["sticker", "video_note"]);

export interface TelegramSenderOptions {
  /** User accounts cannot attach inline keyboards; only bots set this. */
  inlineButtons: boolean;
}

function toReplyTo(options: SendOptions): Api.InputReplyToMessage | undefined {
  const threadId = options.threadId ?? undefined;

  if (options.replyToMessageId !== undefined) {
    return new Api.InputReplyToMessage({ replyToMsgId: options.replyToMessageId, topMsgId: threadId });
  }

  if (threadId !== undefined) {
    return new Api.InputReplyToMessage({ replyToMsgId: threadId });
  }

  return undefined;
}

export class TelegramMessageSender implements MessageSender {
  constructor(
    private readonly client: RpcClient,
    private readonly options: TelegramSenderOptions,
  ) {}

  send(peerId: string, descriptor: SendDescriptor, options: SendOptions): Promise<number> {
    return withTelegramErrors(async () => {
      const peer = await this.client.resolvePeer(peerId);
      const randomId = generateRandomBigInt();
      const replyMarkup =
        this.options.inlineButtons && descriptor.buttons ? toReplyMarkup(descriptor.buttons) : undefined;

      const common = {
        peer,
        randomId,
        noforwards: options.protect,
        replyTo: toReplyTo(options),
        replyMarkup,
      };

      const request =
        descriptor.method === "text"
          ? new Api.messages.SendMessage({ ...common, message: descriptor.text })
          : new Api.messages.SendMedia({
              ...common,
              media: toInputMedia(descriptor.mediaRef),
              message: CAPTIONLESS_KINDS.has(descriptor.kind) ? "" : descriptor.caption ?? "",
            });

      return extractSentMessageId(await this.client.invoke(request), randomId);
    });
  }
}

export class TelegramTopicManager implements TopicManager {
  constructor(private readonly client: RpcClient) {}

  createTopic(chatId: string, title: string): Promise<number> {
    return withTelegramErrors(async () => {
      const channel = await this.client.resolvePeer(chatId);
      if (!(channel instanceof Api.InputPeerChannel)) {
        throw new Error(`Chat ${chatId} is not a forum supergroup`);
      }

      // Topic creation takes a 32-bit random id.
      const randomId = randomInt(1, 2 ** 31 - 1);
      const updates = await this.client.invoke(
        new Api.channels.CreateForumTopic({
          channel: new Api.InputChannel({ channelId: channel.channelId, accessHash: channel.accessHash }),
          title,
          randomId: bigInt(randomId),
        }),
      );

      return extractSentMessageId(updates, bigInt(randomId));
    });
  }
}
