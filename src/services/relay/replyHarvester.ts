import { encodeContent } from "@/services/content/contentCodec";
import { RelaySettings } from "@/services/config/relaySettings";
import { JobRepository } from "@/services/jobs/jobStore";
import { ProtocolMessage } from "@/types/content";
import { RelayJob } from "@/types/relay";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("reply-harvester");

export interface StagingReply {
  chatId: string;
  replyToMessageId: number | null;
  content: ProtocolMessage;
}

export interface ReplyHarvesterDeps {
  jobs: Pick<JobRepository, "harvestReply">;
  settings: Pick<RelaySettings, "getStagingChatId">;
}

/** Matches an operator reply in the staging chat to the job it answers. */
export class ReplyHarvester {
  constructor(private readonly deps: ReplyHarvesterDeps) {}

  async isStagingChat(chatId: string): Promise<boolean> {
    const stagingChatId = await this.deps.settings.getStagingChatId();
    return stagingChatId !== null && stagingChatId === chatId;
  }

  /** Returns the job moved to READY_TO_SEND, or null when nothing matched. */
  async harvest(reply: StagingReply): Promise<RelayJob | null> {
    if (reply.replyToMessageId === null || !(await this.isStagingChat(reply.chatId))) {
      return null;
    }

    const job = await this.deps.jobs.harvestReply(
      { chatId: reply.chatId, messageId: reply.replyToMessageId },
      encodeContent(reply.content),
    );

    if (job) {
      log.info("Operator reply harvested", { jobId: job.id, kind: job.outboundContent?.kind });
    }

    return job;
  }
}
