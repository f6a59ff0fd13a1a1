import { decodeContent } from "@/services/content/contentCodec";
import { JobRepository } from "@/services/jobs/jobStore";
import { MessageSender } from "@/types/messaging";
import { RelayJob, WorkOutcome } from "@/types/relay";
import { RateLimitError, describeError } from "@/utils/errors";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("delivery-worker");

export interface DeliveryWorkerDeps {
  jobs: JobRepository;
  sender: MessageSender;
}

/** Sends READY_TO_SEND jobs with forwarding protection. */
export class DeliveryWorker {
  constructor(private readonly deps: DeliveryWorkerDeps) {}

  async runOnce(): Promise<WorkOutcome> {
    const job = await this.deps.jobs.claimNextReady();
    if (!job) {
      return { status: "idle" };
    }

    return this.deliver(job);
  }

  /** Delivers a job already claimed into SENDING. */
  async deliver(job: RelayJob): Promise<WorkOutcome> {
    const { jobs, sender } = this.deps;

    const target = job.targetId ?? job.senderId;
    if (!job.outboundContent || !target) {
      const reason = !job.outboundContent ? "Job has no outbound content" : "Job has no delivery target";
      log.error("Cannot deliver job", { jobId: job.id, operation: "deliver", error: reason });
      await jobs.markDeliveryFailed(job.id, reason);
      return { status: "processed", jobId: job.id };
    }

    let messageId: number;
    try {
      messageId = await sender.send(target, decodeContent(job.outboundContent), { protect: true });
    } catch (error) {
      if (error instanceof RateLimitError) {
        await jobs.releaseDeliveryClaim(job.id);
        return { status: "rate_limited", jobId: job.id, retryAfterMs: error.retryAfterSeconds * 1000 };
      }

      const message = describeError(error);
      log.error("Protected send failed", { jobId: job.id, operation: "deliver", target, error: message });
      await jobs.markDeliveryFailed(job.id, message);
      return { status: "processed", jobId: job.id };
    }

    // A failed write here leaves the job in SENDING for the stale sweep.
    const completed = await jobs.markCompleted(job.id);
    if (!completed) {
      log.warn("Delivered job was no longer claimed", { jobId: job.id, target, messageId });
    } else {
      log.info("Protected message delivered", { jobId: job.id, target, messageId });
    }

    return { status: "processed", jobId: job.id };
  }
}
