import { encodeContent } from "@/services/content/contentCodec";
import { RelaySettings } from "@/services/config/relaySettings";
import { JobRepository } from "@/services/jobs/jobStore";
import { parseCommand, ParsedCommand } from "@/services/operator/commandParser";
import { SessionWizard } from "@/services/operator/sessionWizard";
import { ReplyHarvester } from "@/services/relay/replyHarvester";
import { ProtocolMessage } from "@/types/content";
import { JOB_STATUSES } from "@/types/relay";
import { RelayRole } from "@/config/config";
import { describeError } from "@/utils/errors";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("operator-commands");

export type ChatType = "private" | "group" | "channel";

export interface OperatorMessage {
  chatId: string;
  chatType: ChatType;
  senderId: string | null;
  messageId: number;
  text: string;
  content: ProtocolMessage;
  replyTo?: {
    messageId: number;
    /** Fetches the replied-to message; null when it is gone. */
    load(): Promise<ProtocolMessage | null>;
  };
}

export interface CommandRouterDeps {
  operatorId: string;
  botUsername?: string;
  mirrorOwner: RelayRole;
  settings: Pick<
    RelaySettings,
    "getStagingChatId" | "setStagingChatId" | "hasDeliveryCredential"
  >;
  jobs: Pick<JobRepository, "createManualSendJob" | "countByStatus">;
  wizard: Pick<SessionWizard, "start" | "isActive" | "advance" | "cancel">;
  harvester: Pick<ReplyHarvester, "harvest">;
}

export const HELP_TEXT = [
  "🤖 Protected DM relay",
  "/set_group – run inside the inbox group to stage DMs there",
  "/status – show configuration and job counts",
  "/generate_session – log in the delivery account",
  "/cancel – stop session setup",
  "/send_protected <target_id> – reply to content to send it protected",
].join("\n");

export const HARVESTED_TEXT = "Queued for protected send ✅";

const TARGET_ID_PATTERN = /^-?\d+$/;

/**
 * Operator-facing bot logic. Returns the reply text, or null when the message
 * needs no answer (other users, unrelated chatter).
 */
export class CommandRouter {
  constructor(private readonly deps: CommandRouterDeps) {}

  async handle(message: OperatorMessage): Promise<string | null> {
    if (message.senderId !== this.deps.operatorId) {
      return null;
    }

    try {
      const command = parseCommand(message.text);
      if (command) {
        return await this.handleCommand(command, message);
      }

      return await this.handleMessage(message);
    } catch (error) {
      log.error("Operator command failed", { chatId: message.chatId, error: describeError(error) });
      return `❌ Error: ${describeError(error)}`;
    }
  }

  /** Reminders sent to the operator at startup for missing configuration. */
  async startupNotices(): Promise<string[]> {
    const notices: string[] = [];

    if (!(await this.deps.settings.hasDeliveryCredential())) {
      notices.push("⚙️ No delivery session found. Use /generate_session here to set it up.");
    }

    if (!(await this.deps.settings.getStagingChatId())) {
      notices.push("⚙️ No inbox group set. Run /set_group in your target group.");
    }

    return notices;
  }

  private async handleCommand(command: ParsedCommand, message: OperatorMessage): Promise<string | null> {
    const { botUsername } = this.deps;
    if (command.mention && botUsername && command.mention.toLowerCase() !== botUsername.toLowerCase()) {
      return null;
    }

    switch (command.name) {
      case "start":
      case "help":
        return HELP_TEXT;
      case "set_group":
        return this.setGroup(message);
      case "status":
        return this.status();
      case "generate_session":
        if (message.chatType !== "private") {
          return "Run /generate_session in a private chat with the bot.";
        }
        return this.deps.wizard.start(message.chatId);
      case "cancel":
        return this.deps.wizard.cancel(message.chatId);
      case "send_protected":
        return this.sendProtected(command.args, message);
      default:
        return message.chatType === "private" ? "Unknown command. Send /help for the list." : null;
    }
  }

  private async handleMessage(message: OperatorMessage): Promise<string | null> {
    if (message.chatType === "private") {
      if (await this.deps.wizard.isActive(message.chatId)) {
        return this.deps.wizard.advance(message.chatId, message.text);
      }

      return null;
    }

    if (!message.replyTo) {
      return null;
    }

    const job = await this.deps.harvester.harvest({
      chatId: message.chatId,
      replyToMessageId: message.replyTo.messageId,
      content: message.content,
    });

    return job ? HARVESTED_TEXT : null;
  }

  private async setGroup(message: OperatorMessage): Promise<string> {
    if (message.chatType !== "group") {
      return "Run /set_group inside the inbox group (forum-enabled).";
    }

    await this.deps.settings.setStagingChatId(message.chatId);
    log.info("Staging chat updated", { chatId: message.chatId });
    return `Inbox group saved: ${message.chatId}`;
  }

  private async status(): Promise<string> {
    const { settings, jobs, mirrorOwner } = this.deps;
    const [hasSession, stagingChatId, counts] = await Promise.all([
      settings.hasDeliveryCredential(),
      settings.getStagingChatId(),
      jobs.countByStatus(),
    ]);

    const jobSummary = JOB_STATUSES.filter((status) => (counts[status] ?? 0) > 0)
      .map((status) => `${status} ${counts[status] ?? 0}`)
      .join(", ");

    return [
      "⚙️ Status:",
      `• Delivery session: ${hasSession ? "✅" : "❌"}`,
      `• Inbox group: ${stagingChatId ?? "❌ not set"}`,
      `• Mirroring handled by: ${mirrorOwner} process`,
      `• Jobs: ${jobSummary || "none yet"}`,
    ].join("\n");
  }

  private async sendProtected(args: string, message: OperatorMessage): Promise<string | null> {
    if (message.chatType !== "private") {
      return null;
    }

    if (!args) {
      return "Usage: reply to content with\n/send_protected <TARGET_CHAT_ID>";
    }

    if (!TARGET_ID_PATTERN.test(args)) {
      return "TARGET_CHAT_ID must be numeric.";
    }

    if (!message.replyTo) {
      return "Please REPLY to the content you want to send protected.";
    }

    const content = await message.replyTo.load();
    if (!content) {
      return "The replied-to message could not be loaded.";
    }

    const job = await this.deps.jobs.createManualSendJob({
      senderId: this.deps.operatorId,
      targetId: args,
      outboundContent: encodeContent(content),
    });

    log.info("Manual protected send queued", { jobId: job.id, targetId: args });
    return `Manual protected send queued. Job: ${job.id}`;
  }
}
