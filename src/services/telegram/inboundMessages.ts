import { Api } from "telegram";

import { toProtocolMessage } from "@/services/telegram/messageAdapter";
import { ChatType, OperatorMessage } from "@/services/operator/commandRouter";
import { InboundDirectMessage } from "@/services/relay/dmIngestor";

function chatTypeOf(message: Api.Message): ChatType {
  if (message.isPrivate) {
    return "private";
  }

  return message.isGroup ? "group" : "channel";
}

async function isBotAuthor(message: Api.Message): Promise<boolean> {
  const sender = await message.getSender();
  return sender instanceof Api.User && Boolean(sender.bot);
}

/** A private message seen by the delivery account, or null for any other chat. */
export async function toInboundDirectMessage(message: Api.Message): Promise<InboundDirectMessage | null> {
  if (!message.isPrivate || !message.chatId) {
    return null;
  }

  return {
    senderId: message.senderId?.toString() ?? null,
    chatId: message.chatId.toString(),
    messageId: message.id,
    fromSelf: Boolean(message.out),
    fromBot: await isBotAuthor(message),
    content: toProtocolMessage(message),
  };
}

export function toOperatorMessage(message: Api.Message): OperatorMessage | null {
  if (!message.chatId) {
    return null;
  }

  const replyToMessageId =
    message.replyTo instanceof Api.MessageReplyHeader ? message.replyTo.replyToMsgId : undefined;

  return {
    chatId: message.chatId.toString(),
    chatType: chatTypeOf(message),
    senderId: message.senderId?.toString() ?? null,
    messageId: message.id,
    text: message.message,
    content: toProtocolMessage(message),
    replyTo:
      replyToMessageId === undefined
        ? undefined
        : {
            messageId: replyToMessageId,
            load: async () => {
              const replied = await message.getReplyMessage();
              return replied ? toProtocolMessage(replied) : null;
            },
          },
  };
}
