import { beforeEach, describe, expect, it } from "vitest";

import { MirrorWorker } from "@/services/relay/mirrorWorker";
import { InMemoryJobStore } from "@/test-support/inMemoryJobStore";
import { RecordingSender, RecordingTopicManager } from "@/test-support/recordingSender";
import { RateLimitError } from "@/utils/errors";

const STAGING_CHAT = "-1001234567890";

describe("MirrorWorker", () => {
  let jobs: InMemoryJobStore;
  let sender: RecordingSender;
  let topics: RecordingTopicManager;
  let stagingChatId: string | null;
  let worker: MirrorWorker;

  beforeEach(() => {
    jobs = new InMemoryJobStore();
    sender = new RecordingSender(40);
    topics = new RecordingTopicManager();
    stagingChatId = STAGING_CHAT;
    worker = new MirrorWorker({
      jobs,
      sender,
      topics,
      settings: { getStagingChatId: async () => stagingChatId },
    });
  });

  it("is blocked until a staging chat is configured", async () => {
    stagingChatId = null;
    const job = await jobs.createDmJob({
      senderId: "4242",
      targetId: "4242",
      dmMessageId: 1,
      inboundContent: { kind: "text", text: "Hello" },
    });

    await expect(worker.runOnce()).resolves.toEqual({ status: "blocked", reason: "staging chat is not configured" });
    expect((await jobs.findById(job.id))?.status).toBe("NEW");
  });

  it("is idle when there is nothing to mirror", async () => {
    await expect(worker.runOnce()).resolves.toEqual({ status: "idle" });
  });

  it("mirrors a DM into a new topic for the sender", async () => {
    const job = await jobs.createDmJob({
      senderId: "4242",
      targetId: "4242",
      dmMessageId: 1,
      inboundContent: { kind: "text", text: "Hello" },
    });

    await expect(worker.runOnce()).resolves.toEqual({ status: "processed", jobId: job.id });

    expect(topics.created).toEqual([{ chatId: STAGING_CHAT, title: "DM 4242", threadId: 500 }]);
    expect(sender.sent).toEqual([
      {
        peerId: STAGING_CHAT,
        descriptor: { method: "text", text: "Hello" },
        options: { protect: false, threadId: 500 },
        messageId: 40,
      },
    ]);

    const stored = await jobs.findById(job.id);
    expect(stored?.status).toBe("PENDING_REPLY");
    expect(stored?.stagingRef).toEqual({ chatId: STAGING_CHAT, messageId: 40, threadId: 500 });
  });

  it("reuses the sender's existing topic", async () => {
    jobs.seed({ status: "COMPLETED", senderId: "4242", stagingRef: { chatId: STAGING_CHAT, messageId: 3, threadId: 77 } });
    await jobs.createDmJob({ senderId: "4242", targetId: "4242", dmMessageId: 2, inboundContent: { kind: "text", text: "again" } });

    await worker.runOnce();

    expect(topics.created).toEqual([]);
    expect(sender.sent[0]?.options.threadId).toBe(77);
  });

  it("posts without a topic when topic creation fails", async () => {
    topics.failWith = new Error("CHAT_NOT_MODIFIED");
    const job = await jobs.createDmJob({
      senderId: "4242",
      targetId: "4242",
      dmMessageId: 1,
      inboundContent: { kind: "photo", text: "look", mediaRef: "photo:1:2:AA" },
    });

    await worker.runOnce();

    expect(sender.sent[0]?.options.threadId).toBeNull();
    expect(sender.sent[0]?.descriptor).toEqual({ method: "media", kind: "photo", mediaRef: "photo:1:2:AA", caption: "look" });
    expect((await jobs.findById(job.id))?.stagingRef).toEqual({ chatId: STAGING_CHAT, messageId: 40, threadId: null });
  });

  it("posts without topics when they are disabled", async () => {
    worker = new MirrorWorker({ jobs, sender, topics: null, settings: { getStagingChatId: async () => STAGING_CHAT } });
    await jobs.createDmJob({ senderId: "4242", targetId: "4242", dmMessageId: 1, inboundContent: { kind: "text", text: "x" } });

    await worker.runOnce();

    expect(sender.sent[0]?.options).toEqual({ protect: false, threadId: null });
  });

  it("marks the job as failed when the send fails", async () => {
    sender.failNextWith(new Error("CHAT_WRITE_FORBIDDEN"));
    const job = await jobs.createDmJob({
      senderId: "4242",
      targetId: "4242",
      dmMessageId: 1,
      inboundContent: { kind: "text", text: "Hello" },
    });

    await worker.runOnce();

    const stored = await jobs.findById(job.id);
    expect(stored?.status).toBe("ERROR");
    expect(stored?.error).toBe("CHAT_WRITE_FORBIDDEN");
  });

  it("releases the claim when rate limited", async () => {
    sender.failNextWith(new RateLimitError(12));
    const job = await jobs.createDmJob({
      senderId: "4242",
      targetId: "4242",
      dmMessageId: 1,
      inboundContent: { kind: "text", text: "Hello" },
    });

    await expect(worker.runOnce()).resolves.toEqual({ status: "rate_limited", jobId: job.id, retryAfterMs: 12_000 });
    expect((await jobs.findById(job.id))?.status).toBe("NEW");
  });

  it("keeps the sender's topic when the first post is rate limited", async () => {
    sender.failNextWith(new RateLimitError(5));
    const job = await jobs.createDmJob({
      senderId: "42",
      targetId: "42",
      dmMessageId: 1,
      inboundContent: { kind: "text", text: "Hello" },
    });

    await expect(worker.runOnce()).resolves.toEqual({ status: "rate_limited", jobId: job.id, retryAfterMs: 5_000 });
    await expect(worker.runOnce()).resolves.toEqual({ status: "processed", jobId: job.id });

    expect(topics.created).toEqual([{ chatId: STAGING_CHAT, title: "DM 42", threadId: 500 }]);
    expect(sender.sent.map((entry) => entry.options.threadId)).toEqual([500]);
    expect((await jobs.findById(job.id))?.stagingRef).toEqual({ chatId: STAGING_CHAT, messageId: 40, threadId: 500 });
  });

  it("reuses a topic created for a job whose post failed", async () => {
    sender.failNextWith(new Error("MEDIA_EMPTY"));
    const failed = await jobs.createDmJob({
      senderId: "42",
      targetId: "42",
      dmMessageId: 1,
      inboundContent: { kind: "text", text: "first" },
    });
    await worker.runOnce();
    expect((await jobs.findById(failed.id))?.status).toBe("ERROR");

    await jobs.createDmJob({ senderId: "42", targetId: "42", dmMessageId: 2, inboundContent: { kind: "text", text: "second" } });
    await worker.runOnce();

    expect(topics.created).toHaveLength(1);
    expect(sender.sent.map((entry) => entry.options.threadId)).toEqual([500]);
  });
});
