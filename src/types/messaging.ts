import { SendDescriptor } from "@/types/content";

export interface SendOptions {
  /** Ask the protocol to block forwarding and saving of the sent message. */
  protect: boolean;
  threadId?: number | null;
  replyToMessageId?: number;
}

/** Outbound side of a protocol client; returns the sent message id. */
export interface MessageSender {
  send(peerId: string, descriptor: SendDescriptor, options: SendOptions): Promise<number>;
}

export interface TopicManager {
  /** Returns the thread id of the new forum topic. */
  createTopic(chatId: string, title: string): Promise<number>;
}
