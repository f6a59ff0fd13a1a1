import type { Pool } from "pg";

import { parseStoredContent } from "@/services/content/contentSchemas";
import { assertTransition } from "@/services/jobs/jobStateMachine";
import { ContentPayload, StoredContent } from "@/types/content";
import {
  ClaimStatus,
  CreateDmJobInput,
  CreateManualSendJobInput,
  JOB_STATUSES,
  JobStatus,
  JobStatusCounts,
  JobType,
  RelayJob,
  StagingRef,
} from "@/types/relay";
import { describeError } from "@/utils/errors";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("job-store");

export type Queryable = Pick<Pool, "query">;

export interface StagedMessageRef {
  chatId: string;
  messageId: number;
}

/**
 * Durable job queue. Every claim and transition is a single conditional
 * statement; `null` means another caller got there first (or the job is not in
 * the expected status).
 */
export interface JobRepository {
  createDmJob(input: CreateDmJobInput): Promise<RelayJob>;
  createManualSendJob(input: CreateManualSendJobInput): Promise<RelayJob>;

  claimNextNew(): Promise<RelayJob | null>;
  markMirrored(id: string, ref: StagingRef): Promise<RelayJob | null>;
  markMirrorFailed(id: string, error: string): Promise<RelayJob | null>;
  releaseMirrorClaim(id: string): Promise<RelayJob | null>;
  /** Remembers a freshly created topic on a MIRRORING job before its message is posted. */
  recordStagingThread(id: string, chatId: string, threadId: number): Promise<boolean>;

  harvestReply(ref: StagedMessageRef, content: ContentPayload): Promise<RelayJob | null>;

  claimNextReady(): Promise<RelayJob | null>;
  claimReady(id: string): Promise<RelayJob | null>;
  markCompleted(id: string): Promise<RelayJob | null>;
  markDeliveryFailed(id: string, error: string): Promise<RelayJob | null>;
  releaseDeliveryClaim(id: string): Promise<RelayJob | null>;

  findById(id: string): Promise<RelayJob | null>;
  findBySender(senderId: string, limit: number): Promise<RelayJob[]>;
  findStagingThread(chatId: string, senderId: string): Promise<number | null>;
  countByStatus(): Promise<JobStatusCounts>;
  requeueStale(status: ClaimStatus, olderThanMs: number): Promise<string[]>;
}

interface RelayJobRow {
  id: string;
  job_type: JobType;
  status: JobStatus;
  sender_id: string | null;
  target_id: string | null;
  dm_message_id: number | null;
  staging_chat_id: string | null;
  staging_message_id: number | null;
  staging_thread_id: number | null;
  inbound_content: unknown;
  outbound_content: unknown;
  error: string | null;
  created_at: Date;
  updated_at: Date;
}

interface StatusCountRow {
  status: JobStatus;
  count: string;
}

const JOB_COLUMNS = `id, job_type, status, sender_id, target_id, dm_message_id,
  staging_chat_id, staging_message_id, staging_thread_id,
  inbound_content, outbound_content, error, created_at, updated_at`;

const CLAIM_RELEASE: Record<ClaimStatus, JobStatus> = {
  MIRRORING: "NEW",
  SENDING: "READY_TO_SEND",
};

function jsonColumn(value: unknown): unknown {
  return typeof value === "string" ? JSON.parse(value) : value;
}

/**
 * An unreadable payload maps to null rather than throwing, since the row may
 * already have been claimed; the workers fail a job that has no content.
 */
function contentColumn(jobId: string, column: string, value: unknown): StoredContent | null {
  try {
    return parseStoredContent(jsonColumn(value));
  } catch (error) {
    log.warn("Stored content could not be read", { jobId, column, error: describeError(error) });
    return null;
  }
}

function mapJobRow(row: RelayJobRow): RelayJob {
  const stagingRef: StagingRef | null =
    row.staging_chat_id !== null && row.staging_message_id !== null
      ? {
          chatId: row.staging_chat_id,
          messageId: row.staging_message_id,
          threadId: row.staging_thread_id,
        }
      : null;

  return {
    id: row.id,
    jobType: row.job_type,
    status: row.status,
    senderId: row.sender_id,
    targetId: row.target_id,
    dmMessageId: row.dm_message_id,
    stagingRef,
    inboundContent: contentColumn(row.id, "inbound_content", row.inbound_content),
    outboundContent: contentColumn(row.id, "outbound_content", row.outbound_content),
    error: row.error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function firstJob(rows: RelayJobRow[]): RelayJob | null {
  const [row] = rows;
  return row ? mapJobRow(row) : null;
}

interface TransitionPatch {
  stagingRef?: StagingRef;
  outboundContent?: ContentPayload;
  error?: string;
}

export class PgJobStore implements JobRepository {
  constructor(private readonly db: Queryable) {}

  async createDmJob(input: CreateDmJobInput): Promise<RelayJob> {
    const result = await this.db.query<RelayJobRow>(
      `INSERT INTO relay_jobs (job_type, status, sender_id, target_id, dm_message_id, inbound_content)
       VALUES ('DM_FLOW', 'NEW', $1, $2, $3, $4)
       RETURNING ${JOB_COLUMNS}`,
      [input.senderId, input.targetId, input.dmMessageId, JSON.stringify(input.inboundContent)],
    );

    return this.requireCreated(result.rows);
  }

  async createManualSendJob(input: CreateManualSendJobInput): Promise<RelayJob> {
    const result = await this.db.query<RelayJobRow>(
      `INSERT INTO relay_jobs (job_type, status, sender_id, target_id, outbound_content)
       VALUES ('MANUAL_SEND', 'READY_TO_SEND', $1, $2, $3)
       RETURNING ${JOB_COLUMNS}`,
      [input.senderId, input.targetId, JSON.stringify(input.outboundContent)],
    );

    return this.requireCreated(result.rows);
  }

  claimNextNew(): Promise<RelayJob | null> {
    return this.claimNext("NEW", "MIRRORING");
  }

  markMirrored(id: string, ref: StagingRef): Promise<RelayJob | null> {
    return this.transition(id, "MIRRORING", "PENDING_REPLY", { stagingRef: ref });
  }

  markMirrorFailed(id: string, error: string): Promise<RelayJob | null> {
    return this.transition(id, "MIRRORING", "ERROR", { error });
  }

  releaseMirrorClaim(id: string): Promise<RelayJob | null> {
    return this.transition(id, "MIRRORING", "NEW");
  }

  async recordStagingThread(id: string, chatId: string, threadId: number): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE relay_jobs
       SET staging_chat_id = $2, staging_thread_id = $3, updated_at = NOW()
       WHERE id = $1 AND status = 'MIRRORING'`,
      [id, chatId, threadId],
    );

    return (result.rowCount ?? 0) > 0;
  }

  async harvestReply(ref: StagedMessageRef, content: ContentPayload): Promise<RelayJob | null> {
    assertTransition("PENDING_REPLY", "READY_TO_SEND");

    const result = await this.db.query<RelayJobRow>(
      `UPDATE relay_jobs
       SET status = 'READY_TO_SEND', outbound_content = $3, updated_at = NOW()
       WHERE staging_chat_id = $1 AND staging_message_id = $2 AND status = 'PENDING_REPLY'
       RETURNING ${JOB_COLUMNS}`,
      [ref.chatId, ref.messageId, JSON.stringify(content)],
    );

    return firstJob(result.rows);
  }

  claimNextReady(): Promise<RelayJob | null> {
    return this.claimNext("READY_TO_SEND", "SENDING");
  }

  claimReady(id: string): Promise<RelayJob | null> {
    return this.transition(id, "READY_TO_SEND", "SENDING");
  }

  markCompleted(id: string): Promise<RelayJob | null> {
    return this.transition(id, "SENDING", "COMPLETED");
  }

  markDeliveryFailed(id: string, error: string): Promise<RelayJob | null> {
    return this.transition(id, "SENDING", "ERROR", { error });
  }

  releaseDeliveryClaim(id: string): Promise<RelayJob | null> {
    return this.transition(id, "SENDING", "READY_TO_SEND");
  }

  async findById(id: string): Promise<RelayJob | null> {
    const result = await this.db.query<RelayJobRow>(`SELECT ${JOB_COLUMNS} FROM relay_jobs WHERE id = $1 LIMIT 1`, [
      id,
    ]);

    return firstJob(result.rows);
  }

  async findBySender(senderId: string, limit: number): Promise<RelayJob[]> {
    const result = await this.db.query<RelayJobRow>(
      `SELECT ${JOB_COLUMNS} FROM relay_jobs
       WHERE sender_id = $1
       ORDER BY created_at DESC
       LIMIT $2`,
      [senderId, limit],
    );

    return result.rows.map(mapJobRow);
  }

  async findStagingThread(chatId: string, senderId: string): Promise<number | null> {
    const result = await this.db.query<{ staging_thread_id: number }>(
      `SELECT staging_thread_id FROM relay_jobs
       WHERE sender_id = $1 AND staging_chat_id = $2 AND staging_thread_id IS NOT NULL
       ORDER BY created_at DESC
       LIMIT 1`,
      [senderId, chatId],
    );

    return result.rows[0]?.staging_thread_id ?? null;
  }

  async countByStatus(): Promise<JobStatusCounts> {
    const result = await this.db.query<StatusCountRow>(
      "SELECT status, COUNT(*)::text AS count FROM relay_jobs GROUP BY status",
    );

    const counts: JobStatusCounts = {};
    for (const row of result.rows) {
      if (JOB_STATUSES.includes(row.status)) {
        counts[row.status] = Number(row.count);
      }
    }

    return counts;
  }

  async requeueStale(status: ClaimStatus, olderThanMs: number): Promise<string[]> {
    const target = CLAIM_RELEASE[status];
    assertTransition(status, target);

    const result = await this.db.query<{ id: string }>(
      `UPDATE relay_jobs
       SET status = $2, updated_at = NOW()
       WHERE status = $1 AND updated_at < NOW() - ($3::int * INTERVAL '1 millisecond')
       RETURNING id`,
      [status, target, Math.max(0, Math.floor(olderThanMs))],
    );

    return result.rows.map((row) => row.id);
  }

  private async claimNext(from: JobStatus, to: JobStatus): Promise<RelayJob | null> {
    assertTransition(from, to);

    const result = await this.db.query<RelayJobRow>(
      `UPDATE relay_jobs
       SET status = $2, updated_at = NOW()
       WHERE id = (
         SELECT id FROM relay_jobs
         WHERE status = $1
         ORDER BY created_at
         FOR UPDATE SKIP LOCKED
         LIMIT 1
       ) AND status = $1
       RETURNING ${JOB_COLUMNS}`,
      [from, to],
    );

    return firstJob(result.rows);
  }

  private async transition(
    id: string,
    from: JobStatus,
    to: JobStatus,
    patch: TransitionPatch = {},
  ): Promise<RelayJob | null> {
    assertTransition(from, to);

    const assignments = ["status = $3", "updated_at = NOW()"];
    const values: unknown[] = [id, from, to];

    if (patch.stagingRef) {
      values.push(patch.stagingRef.chatId, patch.stagingRef.messageId, patch.stagingRef.threadId);
      assignments.push(
        `staging_chat_id = $${values.length - 2}`,
        `staging_message_id = $${values.length - 1}`,
        `staging_thread_id = $${values.length}`,
      );
    }

    if (patch.outboundContent) {
      values.push(JSON.stringify(patch.outboundContent));
      assignments.push(`outbound_content = $${values.length}`);
    }

    if (patch.error !== undefined) {
      values.push(patch.error);
      assignments.push(`error = $${values.length}`);
    }

    const result = await this.db.query<RelayJobRow>(
      `UPDATE relay_jobs
       SET ${assignments.join(", ")}
       WHERE id = $1 AND status = $2
       RETURNING ${JOB_COLUMNS}`,
      values,
    );

    return firstJob(result.rows);
  }

  private requireCreated(rows: RelayJobRow[]): RelayJob {
    const job = firstJob(rows);
    if (!job) {
      throw new Error("Job insert returned no row");
    }

    return job;
  }
}
