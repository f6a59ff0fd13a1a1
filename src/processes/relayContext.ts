import { config, RelayRole } from "@/config/config";
import { getDatabasePool } from "@/database/connection";
import { PgConfigStore } from "@/services/config/configStore";
import { RelaySettings } from "@/services/config/relaySettings";
import { JobRepository, PgJobStore } from "@/services/jobs/jobStore";
import { BackoffPolicy } from "@/services/relay/backoff";
import { MirrorWorker } from "@/services/relay/mirrorWorker";
import { PollingLoop } from "@/services/relay/pollingLoop";
import { SessionCipher } from "@/services/telegram/sessionCipher";
import { MessageSender, TopicManager } from "@/types/messaging";
import { ClaimStatus } from "@/types/relay";
import { ConfigurationError } from "@/utils/errors";

/** Shared collaborators both relay processes are built from. */
export interface RelayContext {
  jobs: JobRepository;
  settings: RelaySettings;
  backoff: BackoffPolicy;
  operatorId: string;
}

export interface RelayProcess {
  /** Claim states this process may leave behind when it crashes. */
  claimStatuses: ClaimStatus[];
  stop(): Promise<void>;
}

export function createRelayContext(): RelayContext {
  if (!config.telegram.operatorId) {
    throw new ConfigurationError("OPERATOR_ID is required");
  }

  const pool = getDatabasePool();

  return {
    jobs: new PgJobStore(pool),
    settings: new RelaySettings(new PgConfigStore(pool), new SessionCipher(config.security.sessionEncryptionKey)),
    backoff: new BackoffPolicy(config.relay.backoff),
    operatorId: config.telegram.operatorId,
  };
}

export function ownsMirroring(role: RelayRole): boolean {
  return config.relay.mirrorOwner === role;
}

export function createMirrorLoop(context: RelayContext, sender: MessageSender, topics: TopicManager): PollingLoop {
  const worker = new MirrorWorker({
    jobs: context.jobs,
    settings: context.settings,
    sender,
    topics: config.relay.stagingTopics ? topics : null,
  });

  return new PollingLoop(() => worker.runOnce(), {
    name: "mirror",
    idleDelayMs: config.relay.pollIntervalMs,
    backoff: context.backoff,
  });
}
