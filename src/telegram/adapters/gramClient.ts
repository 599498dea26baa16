import { TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions";
import { Logger as GramLogger } from "telegram/extensions";
import { LogLevel } from "telegram/extensions/Logger";
import { ITelegramConfig, LibraryLogLevel } from "../../config";
import { IInteractiveAuthHandler, ISessionStore } from "../../app/auth/interfaces";
import { maskPhoneNumber } from "../../app/auth/parts/authHelpers";
import { IMessagingConnection } from "../../app/downloader/interfaces";
import { AuthenticationError, OperationCancelledError } from "../../shared/errors";
import { Logger } from "../../shared/utils/logger";

const p_logLevels: Record<LibraryLogLevel, LogLevel> = {
  none: LogLevel.NONE,
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

/**
 * Соединение с Telegram: загрузка сессии, вход по коду и сохранение сессии
 */
export class GramClient implements IMessagingConnection {
  private readonly p_client: TelegramClient;
  private readonly p_session: StringSession;
  private readonly p_config: ITelegramConfig;
  private readonly p_authHandler: IInteractiveAuthHandler;
  private readonly p_sessionStore: ISessionStore;
  private p_cancellation: OperationCancelledError | null = null;

  constructor(
    _config: ITelegramConfig,
    _authHandler: IInteractiveAuthHandler,
    _sessionStore: ISessionStore
  ) {
    this.p_config = _config;
    this.p_authHandler = _authHandler;
    this.p_sessionStore = _sessionStore;
    this.p_session = new StringSession(_sessionStore.loadSessionString());

    this.p_client = new TelegramClient(this.p_session, _config.apiId, _config.apiHash, {
      connectionRetries: _config.connectionRetries,
      useWSS: false,
      baseLogger: new GramLogger(p_logLevels[_config.libraryLogLevel]),
      autoReconnect: true,
      deviceModel: "Desktop",
      appVersion: "1.0.0",
    });
  }

  async connect(): Promise<void> {
    Logger.info("Connecting to Telegram...");
    await this.p_client.connect();

    if (!(await this.p_client.isUserAuthorized())) {
      await this.p_signInAsync();
      await this.p_sessionStore.saveSessionAsync(this.p_session.save(), this.p_config.phoneNumber);
      Logger.info("Session saved for future runs");
    }

    Logger.success("Successfully authenticated with Telegram!");
  }

  async disconnect(): Promise<void> {
    try {
      // destroy() останавливает и цикл обновлений, иначе процесс не завершается
      await this.p_client.destroy();
    } catch (error) {
      Logger.error("Error while disconnecting:", error);
    }
  }

  getClient(): TelegramClient {
    return this.p_client;
  }

  /**
   * Вход по одноразовому коду и, при необходимости, паролю 2FA
   */
  private async p_signInAsync(): Promise<void> {
    const phoneNumber = this.p_config.phoneNumber;
    this.p_cancellation = null;

    await this.p_client.start({
      phoneNumber: async () => phoneNumber,
      phoneCode: async () => {
        this.p_authHandler.displayMessage(
          `A verification code has been sent to ${maskPhoneNumber(phoneNumber)}`
        );
        return this.p_rememberCancellationAsync(() => this.p_authHandler.requestPhoneCode());
      },
      password: async (hint?: string) => {
        this.p_authHandler.displayMessage("Two-step verification is enabled");
        return this.p_rememberCancellationAsync(() => this.p_authHandler.requestPassword(hint));
      },
      onError: (error: Error) => {
        if (this.p_cancellation) {
          throw this.p_cancellation;
        }
        if (error instanceof OperationCancelledError) {
          throw error;
        }
        throw new AuthenticationError(`Authentication failed: ${error.message}`);
      },
    });
  }

  /**
   * GramJS глушит ошибки из колбэка кода и сообщает только "Code is empty",
   * поэтому отмену запоминаем и пробрасываем из onError
   */
  private async p_rememberCancellationAsync(_request: () => Promise<string>): Promise<string> {
    try {
      return await _request();
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        this.p_cancellation = error;
      }
      throw error;
    }
  }
}
