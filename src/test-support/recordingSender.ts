import { SendDescriptor } from "@/types/content";
import { MessageSender, SendOptions, TopicManager } from "@/types/messaging";

export interface RecordedSend {
  peerId: string;
  descriptor: SendDescriptor;
  options: SendOptions;
  messageId: number;
}

/** Records sends and answers with increasing message ids; can be told to fail. */
export class RecordingSender implements MessageSender {
  readonly sent: RecordedSend[] = [];
  private nextMessageId: number;
  private failures: unknown[] = [];

  constructor(firstMessageId = 100) {
    this.nextMessageId = firstMessageId;
  }

  failNextWith(error: unknown) {
    this.failures.push(error);
  }

  async send(peerId: string, descriptor: SendDescriptor, options: SendOptions): Promise<number> {
    if (this.failures.length > 0) {
      throw this.failures.shift();
    }

    const messageId = this.nextMessageId;
    this.nextMessageId += 1;
    this.sent.push({ peerId, descriptor, options, messageId });
    return messageId;
  }
}

export class RecordingTopicManager implements TopicManager {
  readonly created: Array<{ chatId: string; title: string; threadId: number }> = [];
  failWith: unknown = null;
  private nextThreadId = 500;

  async createTopic(chatId: string, title: string): Promise<number> {
    if (this.failWith !== null) {
      throw this.failWith;
    }

    const threadId = this.nextThreadId;
    this.nextThreadId += 1;
    this.created.push({ chatId, title, threadId });
    return threadId;
  }
}
