import cron from "node-cron";

import { JobRepository } from "@/services/jobs/jobStore";
import { ClaimStatus } from "@/types/relay";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("stale-sweeper");

export interface StaleJobSweeperOptions {
  schedule: string;
  staleAfterMs: number;
  /** Claim states this process owns: SENDING for delivery, MIRRORING for the mirror owner. */
  statuses: readonly ClaimStatus[];
}

/**
 * Returns claims abandoned by a crashed worker to the queue. A requeued SENDING
 * job may be delivered twice if the crash happened after the send.
 */
export class StaleJobSweeper {
  private task: cron.ScheduledTask | null = null;

  constructor(
    private readonly jobs: Pick<JobRepository, "requeueStale">,
    private readonly options: StaleJobSweeperOptions,
  ) {}

  start() {
    if (this.task) {
      log.warn("Stale job sweeper is already running");
      return;
    }

    if (this.options.statuses.length === 0) {
      return;
    }

    this.task = cron.schedule(
      this.options.schedule,
      async () => {
        try {
          await this.sweep();
        } catch (error) {
          log.error("Stale job sweep failed with unhandled error", { error });
        }
      },
      {
        scheduled: true,
        timezone: "UTC",
      },
    );

    log.info("Stale job sweeper started", {
      schedule: this.options.schedule,
      statuses: this.options.statuses,
      staleAfterMs: this.options.staleAfterMs,
    });
  }

  stop() {
    if (!this.task) {
      return;
    }

    this.task.stop();
    this.task = null;
    log.info("Stale job sweeper stopped");
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  async sweep(): Promise<string[]> {
    const requeued: string[] = [];

    for (const status of this.options.statuses) {
      const ids = await this.jobs.requeueStale(status, this.options.staleAfterMs);
      for (const jobId of ids) {
        log.warn("Requeued stale claim", { jobId, status });
      }
      requeued.push(...ids);
    }

    return requeued;
  }
}
