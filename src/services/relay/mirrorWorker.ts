import { decodeContent } from "@/services/content/contentCodec";
import { RelaySettings } from "@/services/config/relaySettings";
import { JobRepository } from "@/services/jobs/jobStore";
import { MessageSender, TopicManager } from "@/types/messaging";
import { RelayJob, StagingRef, WorkOutcome } from "@/types/relay";
import { RateLimitError, describeError } from "@/utils/errors";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("mirror-worker");

export interface MirrorWorkerDeps {
  jobs: JobRepository;
  settings: Pick<RelaySettings, "getStagingChatId">;
  sender: MessageSender;
  /** Null when per-sender forum topics are disabled. */
  topics: TopicManager | null;
}

/** Copies NEW jobs into the staging chat so the operator can reply to them. */
export class MirrorWorker {
  constructor(private readonly deps: MirrorWorkerDeps) {}

  async runOnce(): Promise<WorkOutcome> {
    const { jobs, settings, sender } = this.deps;

    const stagingChatId = await settings.getStagingChatId();
    if (!stagingChatId) {
      return { status: "blocked", reason: "staging chat is not configured" };
    }

    const job = await jobs.claimNextNew();
    if (!job) {
      return { status: "idle" };
    }

    let staged: StagingRef;
    try {
      const threadId = await this.resolveThread(job, stagingChatId);
      const descriptor = decodeContent(job.inboundContent ?? { kind: "text" });
      const messageId = await sender.send(stagingChatId, descriptor, { protect: false, threadId });
      staged = { chatId: stagingChatId, messageId, threadId };
    } catch (error) {
      if (error instanceof RateLimitError) {
        await jobs.releaseMirrorClaim(job.id);
        return { status: "rate_limited", jobId: job.id, retryAfterMs: error.retryAfterSeconds * 1000 };
      }

      const message = describeError(error);
      log.error("Mirroring failed", { jobId: job.id, operation: "mirror", error: message });
      await jobs.markMirrorFailed(job.id, message);
      return { status: "processed", jobId: job.id };
    }

    const mirrored = await jobs.markMirrored(job.id, staged);
    if (!mirrored) {
      log.warn("Mirrored job was no longer claimed", { jobId: job.id, stagingMessageId: staged.messageId });
    } else {
      log.info("Job mirrored to staging", { jobId: job.id, ...staged });
    }

    return { status: "processed", jobId: job.id };
  }

  private async resolveThread(job: RelayJob, stagingChatId: string): Promise<number | null> {
    const { jobs, topics } = this.deps;
    if (!topics || !job.senderId) {
      return null;
    }

    const existing = await jobs.findStagingThread(stagingChatId, job.senderId);
    if (existing !== null) {
      return existing;
    }

    let threadId: number;
    try {
      threadId = await topics.createTopic(stagingChatId, `DM ${job.senderId}`);
    } catch (error) {
      if (error instanceof RateLimitError) {
        throw error;
      }

      log.warn("Topic creation failed, posting without a topic", {
        jobId: job.id,
        error: describeError(error),
      });
      return null;
    }

    // Recorded before the post so a failed or rate-limited send does not orphan the topic.
    const recorded = await jobs.recordStagingThread(job.id, stagingChatId, threadId);
    if (!recorded) {
      log.warn("Topic created for a job that was no longer claimed", { jobId: job.id, threadId });
    }

    return threadId;
  }
}
