import { errors } from "telegram";

import { RateLimitError, TelegramAuthError, TelegramErrorCode } from "@/utils/errors";

const TELEGRAM_AUTH_ERRORS: Record<string, { code: TelegramErrorCode; message: string }> = {
  PHONE_NUMBER_INVALID: { code: "INVALID_PHONE_NUMBER", message: "Invalid phone number" },
  PHONE_NUMBER_BANNED: { code: "INVALID_PHONE_NUMBER", message: "Phone number is banned" },
  PHONE_NUMBER_UNOCCUPIED: { code: "INVALID_PHONE_NUMBER", message: "Phone number is not registered" },
  SESSION_PASSWORD_NEEDED: { code: "SESSION_PASSWORD_NEEDED", message: "Two-factor authentication required" },
  PASSWORD_HASH_INVALID: { code: "PASSWORD_INVALID", message: "Invalid two-factor password" },
  SRP_PASSWORD_CHANGED: { code: "PASSWORD_INVALID", message: "Two-factor authentication password has changed" },
  SRP_ID_INVALID: { code: "PASSWORD_INVALID", message: "Two-factor authentication password is invalid" },
  PHONE_CODE_INVALID: { code: "CODE_INVALID", message: "Invalid verification code" },
  PHONE_CODE_EMPTY: { code: "CODE_INVALID", message: "Verification code is required" },
  PHONE_CODE_HASH_EMPTY: { code: "CODE_INVALID", message: "Verification code is invalid" },
  PHONE_CODE_EXPIRED: { code: "CODE_EXPIRED", message: "Verification code expired" },
  AUTH_KEY_UNREGISTERED: { code: "SESSION_UNAUTHORIZED", message: "Session is not authorized" },
  SESSION_REVOKED: { code: "SESSION_UNAUTHORIZED", message: "Session was revoked" },
  USER_DEACTIVATED: { code: "SESSION_UNAUTHORIZED", message: "Account is deactivated" },
};

const FLOOD_WAIT_PATTERN = /FLOOD_WAIT_(\d+)/;
const MIGRATE_PATTERN = /^PHONE_MIGRATE_(\d+)$/;

/** The RPC error name (e.g. `FLOOD_WAIT_30`) or the plain error message. */
export function rpcErrorMessage(error: unknown): string | null {
  if (error instanceof errors.RPCError) {
    return error.errorMessage;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return null;
}

export function toRateLimitError(error: unknown): RateLimitError | null {
  if (error instanceof RateLimitError) {
    return error;
  }

  if (error instanceof errors.FloodWaitError) {
    return new RateLimitError(error.seconds, "Telegram rate limit exceeded", { seconds: error.seconds });
  }

  const match = FLOOD_WAIT_PATTERN.exec(rpcErrorMessage(error) ?? "");
  if (match) {
    const seconds = Number(match[1]);
    return new RateLimitError(seconds, "Telegram rate limit exceeded", { seconds });
  }

  return null;
}

/**
 * Maps gramjs failures onto the application's error types. Unknown errors are
 * returned unchanged so their message reaches `job.error` verbatim.
 */
export function classifyTelegramError(error: unknown): unknown {
  const rateLimit = toRateLimitError(error);
  if (rateLimit) {
    return rateLimit;
  }

  const message = rpcErrorMessage(error)?.toUpperCase();
  if (!message) {
    return error;
  }

  const migrate = MIGRATE_PATTERN.exec(message);
  if (migrate) {
    return new TelegramAuthError("PHONE_MIGRATE", "Phone number is registered in a different region", {
      dc: Number(migrate[1]),
    });
  }

  const mapped = TELEGRAM_AUTH_ERRORS[message];
  if (mapped) {
    return new TelegramAuthError(mapped.code, mapped.message, { rpcError: message });
  }

  return error;
}

/** Runs a gramjs call and rethrows its failure as a classified error. */
export async function withTelegramErrors<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw classifyTelegramError(error);
  }
}
