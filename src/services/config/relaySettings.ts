import { ConfigStore } from "@/services/config/configStore";
import { SessionCipher } from "@/services/telegram/sessionCipher";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("relay-settings");

export const CONFIG_KEYS = {
  stagingChatId: "staging_chat_id",
  deliverySession: "delivery_session",
} as const;

function asChatId(value: unknown): string | null {
  if (typeof value === "number" && Number.isInteger(value)) {
    return String(value);
  }

  if (typeof value === "string" && /^-?\d+$/.test(value)) {
    return value;
  }

  return null;
}

/** Typed accessors over the shared config store. */
export class RelaySettings {
  constructor(
    private readonly store: ConfigStore,
    private readonly cipher: SessionCipher,
  ) {}

  async getStagingChatId(): Promise<string | null> {
    return asChatId(await this.store.get(CONFIG_KEYS.stagingChatId, null));
  }

  async setStagingChatId(chatId: string): Promise<void> {
    await this.store.set(CONFIG_KEYS.stagingChatId, chatId);
  }

  async hasDeliveryCredential(): Promise<boolean> {
    return (await this.getDeliveryCredential()) !== null;
  }

  async getDeliveryCredential(): Promise<string | null> {
    const stored = await this.store.get(CONFIG_KEYS.deliverySession, null);
    if (typeof stored !== "string" || stored.length === 0) {
      return null;
    }

    try {
      const session = this.cipher.decrypt(stored);
      return session.length > 0 ? session : null;
    } catch (error) {
      log.error("Stored delivery session could not be decrypted", { error });
      return null;
    }
  }

  async setDeliveryCredential(session: string): Promise<void> {
    await this.store.set(CONFIG_KEYS.deliverySession, this.cipher.encrypt(session));
  }
}
