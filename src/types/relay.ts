import { ContentPayload, StoredContent } from "@/types/content";

export const JOB_STATUSES = [
  "NEW",
  "MIRRORING",
  "PENDING_REPLY",
  "READY_TO_SEND",
  "SENDING",
  "COMPLETED",
  "ERROR",
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type JobType = "DM_FLOW" | "MANUAL_SEND";

export interface StagingRef {
  chatId: string;
  messageId: number;
  threadId: number | null;
}

export interface RelayJob {
  id: string;
  jobType: JobType;
  status: JobStatus;
  senderId: string | null;
  targetId: string | null;
  dmMessageId: number | null;
  stagingRef: StagingRef | null;
  inboundContent: StoredContent | null;
  outboundContent: StoredContent | null;
  error: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateDmJobInput {
  senderId: string;
  targetId: string;
  dmMessageId: number;
  inboundContent: ContentPayload;
}

export interface CreateManualSendJobInput {
  senderId: string;
  targetId: string;
  outboundContent: ContentPayload;
}

export type JobStatusCounts = Partial<Record<JobStatus, number>>;

export type ClaimStatus = Extract<JobStatus, "MIRRORING" | "SENDING">;

export type WorkOutcome =
  | { status: "processed"; jobId: string }
  | { status: "idle" }
  | { status: "blocked"; reason: string }
  | { status: "rate_limited"; jobId: string; retryAfterMs: number };
