import { describe, expect, it } from "vitest";

import { validateEnv } from "@/config/validateEnv";
import { ConfigurationError } from "@/utils/errors";

describe("validateEnv", () => {
  it("applies relay defaults", () => {
    const env = validateEnv({});

    expect(env.MIRROR_OWNER).toBe("delivery");
    expect(env.STAGING_TOPICS).toBe(true);
    expect(env.POLL_INTERVAL_MS).toBe(1000);
    expect(env.BACKOFF_STRATEGY).toBe("exponential");
    expect(env.SWEEP_SCHEDULE).toBe("* * * * *");
  });

  it("treats blank values as unset", () => {
    const env = validateEnv({ OPERATOR_ID: "", MIRROR_OWNER: "  ", TELEGRAM_API_ID: "" });

    expect(env.OPERATOR_ID).toBeUndefined();
    expect(env.MIRROR_OWNER).toBe("delivery");
    expect(env.TELEGRAM_API_ID).toBeUndefined();
  });

  it("parses flags and numbers", () => {
    const env = validateEnv({ STAGING_TOPICS: "0", OPERATOR_ID: "-100123", STALE_CLAIM_MINUTES: "2.5" });

    expect(env.STAGING_TOPICS).toBe(false);
    expect(env.OPERATOR_ID).toBe("-100123");
    expect(env.STALE_CLAIM_MINUTES).toBe(2.5);
  });

  it("rejects invalid values as a configuration error", () => {
    expect(() => validateEnv({ MIRROR_OWNER: "both" })).toThrow(ConfigurationError);
    expect(() => validateEnv({ OPERATOR_ID: "alice" })).toThrow("Invalid environment configuration");
  });

  it("caps the stale claim window at one week", () => {
    expect(validateEnv({ STALE_CLAIM_MINUTES: "10080" }).STALE_CLAIM_MINUTES).toBe(10_080);
    expect(() => validateEnv({ STALE_CLAIM_MINUTES: "40000" })).toThrow(ConfigurationError);
  });
});
