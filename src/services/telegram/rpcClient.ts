import bigInt from "big-integer";
import { Api, TelegramClient } from "telegram";

export type RelayRequest = Api.messages.SendMessage | Api.messages.SendMedia | Api.channels.CreateForumTopic;

/** The slice of a gramjs client the outbound adapters call. */
export interface RpcClient {
  invoke(request: RelayRequest): Promise<Api.TypeUpdates>;
  resolvePeer(peerId: string): Promise<Api.TypeInputPeer>;
}

export function fromTelegramClient(client: TelegramClient): RpcClient {
  return {
    invoke: (request) => client.invoke(request),
    // Ids are stored as decimal strings; a plain string would be resolved as a username.
    resolvePeer: (peerId) => client.getInputEntity(bigInt(peerId)),
  };
}

/** Id of the message a send (or topic creation) produced. */
export function extractSentMessageId(updates: Api.TypeUpdates, randomId?: bigInt.BigInteger): number {
  if (updates instanceof Api.UpdateShortSentMessage) {
    return updates.id;
  }

  if (updates instanceof Api.Updates || updates instanceof Api.UpdatesCombined) {
    for (const update of updates.updates) {
      if (update instanceof Api.UpdateMessageID && (!randomId || update.randomId.equals(randomId))) {
        return update.id;
      }
    }

    for (const update of updates.updates) {
      if (update instanceof Api.UpdateNewMessage || update instanceof Api.UpdateNewChannelMessage) {
        return update.message.id;
      }
    }
  }

  throw new Error(`Unexpected send response: ${updates.className}`);
}
