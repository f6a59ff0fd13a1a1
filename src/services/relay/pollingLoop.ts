import { BackoffPolicy } from "@/services/relay/backoff";
import { WorkOutcome } from "@/types/relay";
import { describeError } from "@/utils/errors";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("polling-loop");

export interface PollingLoopOptions {
  name: string;
  idleDelayMs: number;
  backoff: BackoffPolicy;
}

export interface IterationResult {
  delayMs: number;
  /** Only idle sleeps may be cut short by {@link PollingLoop.wake}. */
  wakeable: boolean;
}

interface PendingSleep {
  timer: NodeJS.Timeout;
  resolve: () => void;
  wakeable: boolean;
}

/**
 * Runs one unit of work per iteration and decides how long to wait before the
 * next one. Work functions report their outcome; thrown errors are logged and
 * backed off, never rethrown.
 */
export class PollingLoop {
  private running = false;
  private runner: Promise<void> | null = null;
  private consecutiveFailures = 0;
  private pendingSleep: PendingSleep | null = null;
  private wakeRequested = false;

  constructor(
    private readonly work: () => Promise<WorkOutcome>,
    private readonly options: PollingLoopOptions,
  ) {}

  async runIteration(): Promise<IterationResult> {
    const { name, idleDelayMs, backoff } = this.options;

    try {
      const outcome = await this.work();

      switch (outcome.status) {
        case "processed":
          this.consecutiveFailures = 0;
          return { delayMs: 0, wakeable: false };
        case "idle":
          this.consecutiveFailures = 0;
          return { delayMs: idleDelayMs, wakeable: true };
        case "blocked": {
          this.consecutiveFailures += 1;
          const delayMs = backoff.delayFor(this.consecutiveFailures);
          log.warn("Loop blocked", { loop: name, reason: outcome.reason, delayMs });
          return { delayMs, wakeable: false };
        }
        case "rate_limited": {
          const delayMs = Math.max(0, outcome.retryAfterMs);
          log.warn("Rate limited, pausing loop", { loop: name, jobId: outcome.jobId, delayMs });
          return { delayMs, wakeable: false };
        }
      }
    } catch (error) {
      this.consecutiveFailures += 1;
      const delayMs = backoff.delayFor(this.consecutiveFailures);
      log.error("Loop iteration failed", { loop: name, error: describeError(error), delayMs });
      return { delayMs, wakeable: false };
    }
  }

  start() {
    if (this.running) {
      return;
    }

    this.running = true;
    log.info("Loop started", { loop: this.options.name });
    this.runner = this.run();
  }

  /** Resolves once the in-flight iteration (if any) has finished. */
  async stop(): Promise<void> {
    this.running = false;
    this.interruptSleep(true);

    const runner = this.runner;
    this.runner = null;
    if (runner) {
      await runner;
      log.info("Loop stopped", { loop: this.options.name });
    }
  }

  /** Skips the current idle sleep, or the next one when called mid-iteration. */
  wake() {
    if (this.pendingSleep) {
      this.interruptSleep(false);
      return;
    }

    this.wakeRequested = true;
  }

  isRunning(): boolean {
    return this.running;
  }

  private async run(): Promise<void> {
    while (this.running) {
      const { delayMs, wakeable } = await this.runIteration();
      if (!this.running) {
        break;
      }

      if (delayMs > 0) {
        await this.sleep(delayMs, wakeable);
      }
    }
  }

  private sleep(delayMs: number, wakeable: boolean): Promise<void> {
    if (wakeable && this.wakeRequested) {
      this.wakeRequested = false;
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pendingSleep = null;
        resolve();
      }, delayMs);

      this.pendingSleep = { timer, resolve, wakeable };
    });
  }

  private interruptSleep(force: boolean) {
    const pending = this.pendingSleep;
    if (!pending || (!force && !pending.wakeable)) {
      return;
    }

    clearTimeout(pending.timer);
    this.pendingSleep = null;
    this.wakeRequested = false;
    pending.resolve();
  }
}
