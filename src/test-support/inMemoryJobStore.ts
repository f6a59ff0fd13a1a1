import { randomUUID } from "node:crypto";

import { JobRepository, StagedMessageRef } from "@/services/jobs/jobStore";
import { assertTransition } from "@/services/jobs/jobStateMachine";
import { ContentPayload } from "@/types/content";
import {
  ClaimStatus,
  CreateDmJobInput,
  CreateManualSendJobInput,
  JobStatus,
  JobStatusCounts,
  RelayJob,
  StagingRef,
} from "@/types/relay";

const CLAIM_RELEASE: Record<ClaimStatus, JobStatus> = {
  MIRRORING: "NEW",
  SENDING: "READY_TO_SEND",
};

/**
 * Job repository backed by a Map. Each method inspects and mutates within a
 * single synchronous step, so concurrent callers see the same
 * one-winner semantics as the SQL statements.
 */
export class InMemoryJobStore implements JobRepository {
  readonly jobs = new Map<string, RelayJob>();
  readonly history = new Map<string, JobStatus[]>();
  /** Topics recorded on jobs that have not been posted yet. */
  private readonly threads = new Map<string, { chatId: string; threadId: number }>();
  private sequence = 0;
  private readonly now: () => Date;

  constructor(now?: () => Date) {
    // Offset by the write sequence so creation order is strict within one millisecond.
    this.now = now ?? (() => new Date(Date.now() + this.sequence));
  }

  async createDmJob(input: CreateDmJobInput): Promise<RelayJob> {
    return this.insert({
      jobType: "DM_FLOW",
      status: "NEW",
      senderId: input.senderId,
      targetId: input.targetId,
      dmMessageId: input.dmMessageId,
      inboundContent: clone(input.inboundContent),
      outboundContent: null,
    });
  }

  async createManualSendJob(input: CreateManualSendJobInput): Promise<RelayJob> {
    return this.insert({
      jobType: "MANUAL_SEND",
      status: "READY_TO_SEND",
      senderId: input.senderId,
      targetId: input.targetId,
      dmMessageId: null,
      inboundContent: null,
      outboundContent: clone(input.outboundContent),
    });
  }

  async claimNextNew(): Promise<RelayJob | null> {
    return this.claimOldest("NEW", "MIRRORING");
  }

  async markMirrored(id: string, ref: StagingRef): Promise<RelayJob | null> {
    return this.transition(id, "MIRRORING", "PENDING_REPLY", (job) => {
      job.stagingRef = { ...ref };
    });
  }

  async markMirrorFailed(id: string, error: string): Promise<RelayJob | null> {
    return this.transition(id, "MIRRORING", "ERROR", (job) => {
      job.error = error;
    });
  }

  async releaseMirrorClaim(id: string): Promise<RelayJob | null> {
    return this.transition(id, "MIRRORING", "NEW");
  }

  async recordStagingThread(id: string, chatId: string, threadId: number): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || job.status !== "MIRRORING") {
      return false;
    }

    this.threads.set(id, { chatId, threadId });
    job.updatedAt = this.now();
    return true;
  }

  async harvestReply(ref: StagedMessageRef, content: ContentPayload): Promise<RelayJob | null> {
    for (const job of this.jobs.values()) {
      if (
        job.status === "PENDING_REPLY" &&
        job.stagingRef?.chatId === ref.chatId &&
        job.stagingRef.messageId === ref.messageId
      ) {
        return this.transition(job.id, "PENDING_REPLY", "READY_TO_SEND", (target) => {
          target.outboundContent = clone(content);
        });
      }
    }

    return null;
  }

  async claimNextReady(): Promise<RelayJob | null> {
    return this.claimOldest("READY_TO_SEND", "SENDING");
  }

  async claimReady(id: string): Promise<RelayJob | null> {
    return this.transition(id, "READY_TO_SEND", "SENDING");
  }

  async markCompleted(id: string): Promise<RelayJob | null> {
    return this.transition(id, "SENDING", "COMPLETED");
  }

  async markDeliveryFailed(id: string, error: string): Promise<RelayJob | null> {
    return this.transition(id, "SENDING", "ERROR", (job) => {
      job.error = error;
    });
  }

  async releaseDeliveryClaim(id: string): Promise<RelayJob | null> {
    return this.transition(id, "SENDING", "READY_TO_SEND");
  }

  async findById(id: string): Promise<RelayJob | null> {
    const job = this.jobs.get(id);
    return job ? snapshot(job) : null;
  }

  async findBySender(senderId: string, limit: number): Promise<RelayJob[]> {
    return [...this.jobs.values()]
      .filter((job) => job.senderId === senderId)
      .sort((left, right) => right.createdAt.getTime() - left.createdAt.getTime())
      .slice(0, limit)
      .map(snapshot);
  }

  async findStagingThread(chatId: string, senderId: string): Promise<number | null> {
    const threads = [...this.jobs.values()]
      .filter((job) => job.senderId === senderId)
      .sort((left, right) => right.createdAt.getTime() - left.createdAt.getTime())
      .map((job) => {
        const recorded = this.threads.get(job.id) ?? job.stagingRef;
        return recorded?.chatId === chatId ? recorded.threadId : null;
      })
      .filter((threadId): threadId is number => threadId !== null);

    return threads[0] ?? null;
  }

  async countByStatus(): Promise<JobStatusCounts> {
    const counts: JobStatusCounts = {};
    for (const job of this.jobs.values()) {
      counts[job.status] = (counts[job.status] ?? 0) + 1;
    }

    return counts;
  }

  async requeueStale(status: ClaimStatus, olderThanMs: number): Promise<string[]> {
    const cutoff = this.now().getTime() - olderThanMs;
    const requeued: string[] = [];

    for (const job of this.jobs.values()) {
      if (job.status === status && job.updatedAt.getTime() < cutoff) {
        this.apply(job, CLAIM_RELEASE[status]);
        requeued.push(job.id);
      }
    }

    return requeued;
  }

  /** Test helper: place a job directly in a given state. */
  seed(job: Partial<RelayJob> & Pick<RelayJob, "status">): RelayJob {
    return this.insert({
      jobType: "DM_FLOW",
      senderId: "1000",
      targetId: null,
      dmMessageId: null,
      inboundContent: null,
      outboundContent: null,
      ...job,
    });
  }

  private insert(
    fields: Omit<RelayJob, "id" | "stagingRef" | "error" | "createdAt" | "updatedAt"> & Partial<RelayJob>,
  ): RelayJob {
    this.sequence += 1;
    const timestamp = this.now();
    const job: RelayJob = {
      stagingRef: null,
      error: null,
      createdAt: timestamp,
      updatedAt: timestamp,
      ...fields,
      id: fields.id ?? randomUUID(),
    };

    this.jobs.set(job.id, job);
    this.history.set(job.id, [job.status]);
    return snapshot(job);
  }

  private claimOldest(from: JobStatus, to: JobStatus): RelayJob | null {
    assertTransition(from, to);

    const candidate = [...this.jobs.values()]
      .filter((job) => job.status === from)
      .sort((left, right) => left.createdAt.getTime() - right.createdAt.getTime())[0];

    if (!candidate) {
      return null;
    }

    this.apply(candidate, to);
    return snapshot(candidate);
  }

  private transition(
    id: string,
    from: JobStatus,
    to: JobStatus,
    patch?: (job: RelayJob) => void,
  ): RelayJob | null {
    assertTransition(from, to);

    const job = this.jobs.get(id);
    if (!job || job.status !== from) {
      return null;
    }

    patch?.(job);
    this.apply(job, to);
    return snapshot(job);
  }

  private apply(job: RelayJob, to: JobStatus) {
    this.sequence += 1;
    job.status = to;
    job.updatedAt = this.now();
    this.history.get(job.id)?.push(to);
  }
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

function snapshot(job: RelayJob): RelayJob {
  return structuredClone(job);
}
