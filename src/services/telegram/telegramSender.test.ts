import bigInt from "big-integer";
import { Api } from "telegram";
import { beforeEach, describe, expect, it } from "vitest";

import { RelayRequest, RpcClient } from "@/services/telegram/rpcClient";
import { TelegramMessageSender, TelegramTopicManager } from "@/services/telegram/telegramSender";
import { RateLimitError } from "@/utils/errors";

function shortSent(id: number) {
  return new Api.UpdateShortSentMessage({ id, pts: 1, ptsCount: 1, date: 0 });
}

function updatesWith(updates: Api.TypeUpdate[]) {
  return new Api.Updates({ updates, users: [], chats: [], date: 0, seq: 0 });
}

class FakeRpcClient implements RpcClient {
  readonly requests: RelayRequest[] = [];
  peer: Api.TypeInputPeer = new Api.InputPeerUser({ userId: bigInt(4242), accessHash: bigInt(1) });
  respond: (request: RelayRequest) => Api.TypeUpdates = () => shortSent(77);

  async invoke(request: RelayRequest) {
    this.requests.push(request);
    return this.respond(request);
  }

  async resolvePeer() {
    return this.peer;
  }

  last<T extends RelayRequest>(type: new (...args: never[]) => T): T {
    const request = this.requests.at(-1);
    if (!(request instanceof type)) {
      throw new Error("unexpected request type");
    }

    return request;
  }
}

describe("TelegramMessageSender", () => {
  let rpc: FakeRpcClient;

  beforeEach(() => {
    rpc = new FakeRpcClient();
  });

  it("sends protected text and returns the new message id", async () => {
    const sender = new TelegramMessageSender(rpc, { inlineButtons: true });

    const id = await sender.send("4242", { method: "text", text: "Hi there!" }, { protect: true });

    const request = rpc.last(Api.messages.SendMessage);
    expect(id).toBe(77);
    expect(request.message).toBe("Hi there!");
    expect(request.noforwards).toBe(true);
    expect(request.replyTo).toBeUndefined();
    expect(request.replyMarkup).toBeUndefined();
  });

  it("posts into a forum topic by replying to its thread", async () => {
    const sender = new TelegramMessageSender(rpc, { inlineButtons: true });

    await sender.send("-1001234567890", { method: "text", text: "Hello" }, { protect: false, threadId: 31 });

    const request = rpc.last(Api.messages.SendMessage);
    expect(request.noforwards).toBe(false);
    expect(request.replyTo).toBeInstanceOf(Api.InputReplyToMessage);
    expect(request.replyTo instanceof Api.InputReplyToMessage ? request.replyTo.replyToMsgId : null).toBe(31);
  });

  it("sends media with its caption and attaches buttons for bots", async () => {
    const sender = new TelegramMessageSender(rpc, { inlineButtons: true });

    await sender.send(
      "4242",
      {
        method: "media",
        kind: "video",
        mediaRef: "document:7:8:AQID",
        caption: "look",
        buttons: [[{ label: "Site", action: { type: "url", url: "https://example.com" } }]],
      },
      { protect: true },
    );

    const request = rpc.last(Api.messages.SendMedia);
    expect(request.message).toBe("look");
    expect(request.noforwards).toBe(true);
    expect(request.media).toBeInstanceOf(Api.InputMediaDocument);
    expect(request.replyMarkup).toBeInstanceOf(Api.ReplyInlineMarkup);
  });

  it("drops captions on stickers and buttons on user accounts", async () => {
    const sender = new TelegramMessageSender(rpc, { inlineButtons: false });

    await sender.send(
      "4242",
      {
        method: "media",
        kind: "sticker",
        mediaRef: "document:7:8:AQID",
        caption: "ignored",
        buttons: [[{ label: "Play", action: { type: "placeholder" } }]],
      },
      { protect: true },
    );

    const request = rpc.last(Api.messages.SendMedia);
    expect(request.message).toBe("");
    expect(request.replyMarkup).toBeUndefined();
  });

  it("matches the sent id by random id in a full update batch", async () => {
    rpc.respond = (request) =>
      updatesWith([
        new Api.UpdateMessageID({ id: 5, randomId: bigInt(1) }),
        new Api.UpdateMessageID({
          id: 90,
          randomId: request instanceof Api.messages.SendMessage ? request.randomId : bigInt(0),
        }),
      ]);
    const sender = new TelegramMessageSender(rpc, { inlineButtons: false });

    await expect(sender.send("4242", { method: "text", text: "x" }, { protect: true })).resolves.toBe(90);
  });

  it("surfaces flood waits as rate limits", async () => {
    rpc.respond = () => {
      throw new Error("FLOOD_WAIT_12");
    };
    const sender = new TelegramMessageSender(rpc, { inlineButtons: false });

    const failure = sender.send("4242", { method: "text", text: "x" }, { protect: true });

    await expect(failure).rejects.toBeInstanceOf(RateLimitError);
    await expect(failure).rejects.toMatchObject({ retryAfterSeconds: 12 });
  });
});

describe("TelegramTopicManager", () => {
  it("creates a forum topic and returns its thread id", async () => {
    const rpc = new FakeRpcClient();
    rpc.peer = new Api.InputPeerChannel({ channelId: bigInt(1234567890), accessHash: bigInt(9) });
    rpc.respond = (request) =>
      updatesWith([
        new Api.UpdateMessageID({
          id: 501,
          randomId: request instanceof Api.channels.CreateForumTopic ? bigInt(request.randomId) : bigInt(0),
        }),
      ]);

    const threadId = await new TelegramTopicManager(rpc).createTopic("-1001234567890", "DM 4242");

    expect(threadId).toBe(501);
    expect(rpc.last(Api.channels.CreateForumTopic).title).toBe("DM 4242");
  });

  it("refuses chats that are not supergroups", async () => {
    const rpc = new FakeRpcClient();

    await expect(new TelegramTopicManager(rpc).createTopic("4242", "DM 1")).rejects.toThrow(
      "Chat 4242 is not a forum supergroup",
    );
    expect(rpc.requests).toHaveLength(0);
  });
});
