import { beforeEach, describe, expect, it } from "vitest";

import { CONFIG_KEYS, RelaySettings } from "@/services/config/relaySettings";
import { SessionCipher } from "@/services/telegram/sessionCipher";
import { InMemoryConfigStore } from "@/test-support/inMemoryConfigStore";

describe("RelaySettings", () => {
  let store: InMemoryConfigStore;
  let settings: RelaySettings;

  beforeEach(() => {
    store = new InMemoryConfigStore();
    settings = new RelaySettings(store, new SessionCipher("test-secret-test-secret-test-secret"));
  });

  it("has no staging chat until one is set", async () => {
    await expect(settings.getStagingChatId()).resolves.toBeNull();

    await settings.setStagingChatId("-1001234567890");

    await expect(settings.getStagingChatId()).resolves.toBe("-1001234567890");
  });

  it("accepts a numeric chat id written by another process", async () => {
    store.values.set(CONFIG_KEYS.stagingChatId, -100555);

    await expect(settings.getStagingChatId()).resolves.toBe("-100555");
  });

  it("stores the delivery session encrypted", async () => {
    await settings.setDeliveryCredential("test-session-string");

    expect(store.values.get(CONFIG_KEYS.deliverySession)).not.toBe("test-session-string");
    await expect(settings.getDeliveryCredential()).resolves.toBe("test-session-string");
    await expect(settings.hasDeliveryCredential()).resolves.toBe(true);
  });

  it("treats an undecryptable session as absent", async () => {
    store.values.set(CONFIG_KEYS.deliverySession, "bm90LWEtcmVhbC1jaXBoZXJ0ZXh0LWF0LWFsbA==");

    await expect(settings.getDeliveryCredential()).resolves.toBeNull();
    await expect(settings.hasDeliveryCredential()).resolves.toBe(false);
  });

  it("reads as unconfigured when the store is down", async () => {
    await settings.setStagingChatId("-100555");
    store.failReads = true;

    await expect(settings.getStagingChatId()).resolves.toBeNull();
    await expect(settings.hasDeliveryCredential()).resolves.toBe(false);
  });
});
