import { ConfigStore } from "@/services/config/configStore";

export class InMemoryConfigStore implements ConfigStore {
  readonly values = new Map<string, unknown>();
  failReads = false;
  failWrites = false;

  async get(key: string, fallback: unknown): Promise<unknown> {
    if (this.failReads || !this.values.has(key)) {
      return fallback;
    }

    return this.values.get(key);
  }

  async set(key: string, value: unknown): Promise<void> {
    if (this.failWrites) {
      throw new Error("config store unavailable");
    }

    this.values.set(key, structuredClone(value));
  }
}
