import { encodeContent } from "@/services/content/contentCodec";
import { JobRepository } from "@/services/jobs/jobStore";
import { ProtocolMessage } from "@/types/content";
import { RelayJob } from "@/types/relay";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("dm-ingestor");

export interface InboundDirectMessage {
  senderId: string | null;
  chatId: string;
  messageId: number;
  fromSelf: boolean;
  fromBot: boolean;
  content: ProtocolMessage;
}

export interface DmIngestorDeps {
  jobs: Pick<JobRepository, "createDmJob">;
  onJobCreated?: (job: RelayJob) => void;
}

/** Turns an incoming private message into a NEW DM_FLOW job. */
export class DmIngestor {
  constructor(private readonly deps: DmIngestorDeps) {}

  async ingest(message: InboundDirectMessage): Promise<RelayJob | null> {
    if (message.fromSelf || message.fromBot || !message.senderId) {
      return null;
    }

    const job = await this.deps.jobs.createDmJob({
      senderId: message.senderId,
      targetId: message.chatId,
      dmMessageId: message.messageId,
      inboundContent: encodeContent(message.content),
    });

    log.info("Inbound DM queued", { jobId: job.id, senderId: message.senderId, kind: job.inboundContent?.kind });
    this.deps.onJobCreated?.(job);
    return job;
  }
}
