import { z } from "zod";

import { RelaySettings } from "@/services/config/relaySettings";
import { withRedisClient } from "@/services/redis.service";
import { SessionAuthenticator } from "@/services/telegram/sessionManager";
import { RateLimitError, TelegramAuthError } from "@/utils/errors";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("session-wizard");

const WIZARD_TTL_SECONDS = 10 * 60;
const SEND_CODE_RATE_LIMIT_SECONDS = 60;
const STATE_KEY_PREFIX = "relay:session-wizard";
const RATE_LIMIT_KEY_PREFIX = "relay:send-code";

const PHONE_PATTERN = /^\+\d{10,15}$/;
const CODE_PATTERN = /^\d{3,6}$/;

export const WIZARD_MESSAGES = {
  askPhone: "📲 Send your phone number with country code (e.g., +15551234567). Send /cancel to stop.",
  invalidPhone: "❌ Phone number must be in international format, e.g. +15551234567.",
  askCode: "🔐 Enter the code you received. Separate the digits with spaces, e.g. 1 2 3 4 5.",
  invalidCode: "❌ The code must contain 3-6 digits.",
  askPassword: "🧩 2FA enabled. Enter your password:",
  saved: "✅ Session saved. The delivery process will start automatically.\nYou can /status to verify.",
  cancelled: "Session setup cancelled.",
  nothingToCancel: "Nothing to cancel.",
  expired: "⌛ Session setup expired. Run /generate_session again.",
} as const;

const wizardStateSchema = z.discriminatedUnion("step", [
  z.object({ step: z.literal("phone") }),
  z.object({
    step: z.literal("code"),
    phoneNumber: z.string(),
    phoneCodeHash: z.string(),
    sessionString: z.string(),
  }),
  z.object({
    step: z.literal("password"),
    phoneNumber: z.string(),
    sessionString: z.string(),
  }),
]);

export type WizardState = z.infer<typeof wizardStateSchema>;

export interface SessionWizardDeps {
  authenticator: SessionAuthenticator;
  settings: Pick<RelaySettings, "setDeliveryCredential">;
}

function stateKey(chatId: string) {
  return `${STATE_KEY_PREFIX}:${chatId}`;
}

export function normalizePhoneNumber(input: string) {
  const sanitized = input.trim().replace(/[\s()-]/g, "");
  return sanitized.startsWith("+") ? sanitized : `+${sanitized}`;
}

export function normalizeLoginCode(input: string) {
  return input.replace(/\D/g, "");
}

/**
 * Multi-step login for the delivery account, driven by operator messages in a
 * private chat. State is kept in Redis so it expires on its own.
 */
export class SessionWizard {
  constructor(private readonly deps: SessionWizardDeps) {}

  async start(chatId: string): Promise<string> {
    await this.saveState(chatId, { step: "phone" });
    return WIZARD_MESSAGES.askPhone;
  }

  async isActive(chatId: string): Promise<boolean> {
    return (await this.loadState(chatId)) !== null;
  }

  async cancel(chatId: string): Promise<string> {
    const active = await this.isActive(chatId);
    await this.clearState(chatId);
    return active ? WIZARD_MESSAGES.cancelled : WIZARD_MESSAGES.nothingToCancel;
  }

  /** Feeds the operator's next message into the wizard and returns the reply. */
  async advance(chatId: string, text: string): Promise<string> {
    const state = await this.loadState(chatId);
    if (!state) {
      return WIZARD_MESSAGES.expired;
    }

    try {
      switch (state.step) {
        case "phone":
          return await this.handlePhone(chatId, text);
        case "code":
          return await this.handleCode(chatId, state, text);
        case "password":
          return await this.handlePassword(chatId, state, text);
      }
    } catch (error) {
      return this.handleFailure(chatId, state, error);
    }
  }

  private async handlePhone(chatId: string, text: string): Promise<string> {
    const phoneNumber = normalizePhoneNumber(text);
    if (!PHONE_PATTERN.test(phoneNumber)) {
      return WIZARD_MESSAGES.invalidPhone;
    }

    await this.enforceSendCodeRateLimit(phoneNumber);
    const { phoneCodeHash, sessionString } = await this.deps.authenticator.sendCode(phoneNumber);
    await this.saveState(chatId, { step: "code", phoneNumber, phoneCodeHash, sessionString });

    log.info("Login code requested", { chatId });
    return WIZARD_MESSAGES.askCode;
  }

  private async handleCode(chatId: string, state: Extract<WizardState, { step: "code" }>, text: string) {
    const code = normalizeLoginCode(text);
    if (!CODE_PATTERN.test(code)) {
      return WIZARD_MESSAGES.invalidCode;
    }

    const result = await this.deps.authenticator.signIn(state, code);
    if (result.status === "password_required") {
      await this.saveState(chatId, {
        step: "password",
        phoneNumber: state.phoneNumber,
        sessionString: result.sessionString,
      });
      return WIZARD_MESSAGES.askPassword;
    }

    return this.complete(chatId, result.sessionString);
  }

  private async handlePassword(chatId: string, state: Extract<WizardState, { step: "password" }>, text: string) {
    const sessionString = await this.deps.authenticator.checkPassword(state.sessionString, text.trim());
    return this.complete(chatId, sessionString);
  }

  private async complete(chatId: string, sessionString: string): Promise<string> {
    await this.deps.settings.setDeliveryCredential(sessionString);
    await this.clearState(chatId);
    log.info("Delivery session saved", { chatId });
    return WIZARD_MESSAGES.saved;
  }

  private async handleFailure(chatId: string, state: WizardState, error: unknown): Promise<string> {
    if (error instanceof RateLimitError) {
      return `⏳ Please wait ${error.retryAfterSeconds} seconds before requesting another code.`;
    }

    if (error instanceof TelegramAuthError) {
      // Wrong code or password: let the operator try again on the same step.
      const retryable =
        (state.step === "code" && error.code === "CODE_INVALID") ||
        (state.step === "password" && error.code === "PASSWORD_INVALID") ||
        (state.step === "phone" && error.code === "INVALID_PHONE_NUMBER");

      if (!retryable) {
        await this.clearState(chatId);
        return `❌ ${error.message}. Run /generate_session to start over.`;
      }

      return `❌ ${error.message}. Try again or send /cancel.`;
    }

    await this.clearState(chatId);
    throw error;
  }

  private async enforceSendCodeRateLimit(phoneNumber: string) {
    const key = `${RATE_LIMIT_KEY_PREFIX}:${phoneNumber}`;
    await withRedisClient(async (client) => {
      const ttl = await client.ttl(key);
      if (ttl > 0) {
        throw new RateLimitError(ttl, "Too many verification requests");
      }

      await client.setEx(key, SEND_CODE_RATE_LIMIT_SECONDS, "1");
    });
  }

  private async loadState(chatId: string): Promise<WizardState | null> {
    const key = stateKey(chatId);
    const payload = await withRedisClient((client) => client.get(key));
    if (!payload) {
      return null;
    }

    try {
      return wizardStateSchema.parse(JSON.parse(payload));
    } catch (error) {
      log.error("Failed to parse session wizard state", { error, chatId });
      await this.clearState(chatId);
      return null;
    }
  }

  private async saveState(chatId: string, state: WizardState) {
    const key = stateKey(chatId);
    await withRedisClient((client) => client.setEx(key, WIZARD_TTL_SECONDS, JSON.stringify(state)));
  }

  private async clearState(chatId: string) {
    const key = stateKey(chatId);
    await withRedisClient((client) => client.del(key));
  }
}
