import { FastifyInstance } from "fastify";
import { z } from "zod";

import type { JobRepository } from "@/services/jobs/jobStore";
import { RelayJob } from "@/types/relay";
import { NotFoundError } from "@/utils/errors";

const jobIdParamsSchema = z.object({
  id: z.string().uuid(),
});

const senderQuerySchema = z.object({
  sender_id: z.string().trim().regex(/^-?\d+$/, "sender_id must be numeric"),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type JobRoutesRepository = Pick<JobRepository, "findById" | "findBySender" | "countByStatus">;

function serializeJob(job: RelayJob) {
  return {
    id: job.id,
    job_type: job.jobType,
    status: job.status,
    sender_id: job.senderId,
    target_id: job.targetId,
    dm_message_id: job.dmMessageId,
    staging_ref: job.stagingRef,
    inbound_content: job.inboundContent,
    outbound_content: job.outboundContent,
    error: job.error,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
  };
}

export async function registerJobRoutes(app: FastifyInstance, jobs: JobRoutesRepository) {
  app.get("/stats", async () => ({
    counts: await jobs.countByStatus(),
  }));

  app.get("/:id", async (request) => {
    const { id } = jobIdParamsSchema.parse(request.params);

    const job = await jobs.findById(id);
    if (!job) {
      throw new NotFoundError("Job not found", { id });
    }

    return { job: serializeJob(job) };
  });

  app.get("/", async (request) => {
    const { sender_id: senderId, limit } = senderQuerySchema.parse(request.query);
    const found = await jobs.findBySender(senderId, limit);

    return { jobs: found.map(serializeJob) };
  });
}
