import { Api, TelegramClient } from "telegram";
import { computeCheck } from "telegram/Password";
import { StringSession } from "telegram/sessions";

import { classifyTelegramError, rpcErrorMessage, withTelegramErrors } from "@/services/telegram/telegramErrors";
import { ConfigurationError } from "@/utils/errors";
import { componentLogger } from "@/utils/logger";

const log = componentLogger("session-manager");

const CONNECTION_RETRIES = 5;

export interface LoginCodeRequest {
  phoneCodeHash: string;
  sessionString: string;
}

export interface PendingSignIn {
  phoneNumber: string;
  phoneCodeHash: string;
  sessionString: string;
}

export type SignInResult =
  | { status: "authorized"; sessionString: string }
  | { status: "password_required"; sessionString: string };

/** Interactive login for the delivery account. */
export interface SessionAuthenticator {
  sendCode(phoneNumber: string): Promise<LoginCodeRequest>;
  signIn(pending: PendingSignIn, code: string): Promise<SignInResult>;
  /** Completes a two-factor login and returns the final session string. */
  checkPassword(sessionString: string, password: string): Promise<string>;
}

interface SessionClient {
  client: TelegramClient;
  session: StringSession;
}

export class TelegramSessionManager implements SessionAuthenticator {
  constructor(
    private readonly apiId: number,
    private readonly apiHash: string,
  ) {
    if (!apiId || !apiHash) {
      throw new ConfigurationError("Telegram credentials are missing");
    }
  }

  private createClient(sessionString = ""): SessionClient {
    const session = new StringSession(sessionString);
    const client = new TelegramClient(session, this.apiId, this.apiHash, {
      connectionRetries: CONNECTION_RETRIES,
    });

    return { client, session };
  }

  async sendCode(phoneNumber: string): Promise<LoginCodeRequest> {
    const { client, session } = this.createClient();

    try {
      await client.connect();
      const result = await withTelegramErrors(() =>
        client.invoke(
          new Api.auth.SendCode({
            phoneNumber,
            apiId: this.apiId,
            apiHash: this.apiHash,
            settings: new Api.CodeSettings({
              allowFlashcall: false,
              allowAppHash: true,
              currentNumber: true,
              allowMissedCall: false,
            }),
          }),
        ),
      );

      if (!(result instanceof Api.auth.SentCode)) {
        throw new Error("Telegram did not send a login code");
      }

      return { phoneCodeHash: result.phoneCodeHash, sessionString: session.save() };
    } finally {
      await this.safeDisconnect(client);
    }
  }

  async signIn(pending: PendingSignIn, code: string): Promise<SignInResult> {
    const { client, session } = this.createClient(pending.sessionString);

    try {
      await client.connect();

      try {
        await client.invoke(
          new Api.auth.SignIn({
            phoneNumber: pending.phoneNumber,
            phoneCodeHash: pending.phoneCodeHash,
            phoneCode: code,
          }),
        );
      } catch (error) {
        if (rpcErrorMessage(error) === "SESSION_PASSWORD_NEEDED") {
          return { status: "password_required", sessionString: session.save() };
        }

        throw classifyTelegramError(error);
      }

      return { status: "authorized", sessionString: session.save() };
    } finally {
      await this.safeDisconnect(client);
    }
  }

  async checkPassword(sessionString: string, password: string): Promise<string> {
    const { client, session } = this.createClient(sessionString);

    try {
      await client.connect();
      await withTelegramErrors(async () => {
        const passwordInfo = await client.invoke(new Api.account.GetPassword());
        const passwordSrp = await computeCheck(passwordInfo, password);
        return client.invoke(new Api.auth.CheckPassword({ password: passwordSrp }));
      });

      return session.save();
    } finally {
      await this.safeDisconnect(client);
    }
  }

  private async safeDisconnect(client: TelegramClient) {
    try {
      await client.disconnect();
    } catch (error) {
      log.warn("Failed to disconnect Telegram client", { error });
    }
  }
}
