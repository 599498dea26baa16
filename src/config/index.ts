import * as dotenv from "dotenv";
import { ConfigurationError } from "../shared/errors";

// .env.local имеет приоритет над .env, уже заданные переменные не перезаписываются
dotenv.config({ path: ".env.local" });
dotenv.config();

export type LibraryLogLevel = "none" | "error" | "warn" | "info" | "debug";

const p_libraryLogLevels: readonly LibraryLogLevel[] = ["none", "error", "warn", "info", "debug"];

export interface ITelegramConfig {
  apiId: number;
  apiHash: string;
  phoneNumber: string;
  sessionFile: string;
  connectionRetries: number;
  libraryLogLevel: LibraryLogLevel;
}

export interface IDownloaderConfig {
  telegram: ITelegramConfig;
}

/**
 * Значения по умолчанию для параметров командной строки и окружения
 */
export const defaults = {
  downloadDir: "downloads",
  messageLimit: 100,
  sessionFile: "telegram_downloader.session",
  connectionRetries: 5,
};

/**
 * Собирает конфигурацию из переменных окружения
 * Бросает ConfigurationError, если не хватает учетных данных
 */
export function loadDownloaderConfig(_env: NodeJS.ProcessEnv = process.env): IDownloaderConfig {
  const required = ["TELEGRAM_API_ID", "TELEGRAM_API_HASH", "TELEGRAM_PHONE_NUMBER"];
  const missing = required.filter((name) => !_env[name]?.trim());

  if (missing.length > 0) {
    throw new ConfigurationError(
      `API credentials not found. Please set ${missing.join(", ")} in .env.local file.`
    );
  }

  const apiId = Number(_env.TELEGRAM_API_ID);
  if (!Number.isInteger(apiId) || apiId <= 0) {
    throw new ConfigurationError("TELEGRAM_API_ID must be a positive integer.");
  }

  return {
    telegram: {
      apiId,
      apiHash: (_env.TELEGRAM_API_HASH ?? "").trim(),
      phoneNumber: (_env.TELEGRAM_PHONE_NUMBER ?? "").trim(),
      sessionFile: _env.TELEGRAM_SESSION_FILE?.trim() || defaults.sessionFile,
      connectionRetries: parseRetries(_env.TELEGRAM_CONNECTION_RETRIES),
      libraryLogLevel: parseLogLevel(_env.TELEGRAM_LOG_LEVEL),
    },
  };
}

function parseRetries(_value: string | undefined): number {
  if (!_value) return defaults.connectionRetries;

  const retries = Number(_value);
  if (!Number.isInteger(retries) || retries < 0) {
    throw new ConfigurationError("TELEGRAM_CONNECTION_RETRIES must be a non-negative integer.");
  }
  return retries;
}

function parseLogLevel(_value: string | undefined): LibraryLogLevel {
  if (!_value) return "none";

  const level = p_libraryLogLevels.find((item) => item === _value.trim().toLowerCase());
  if (!level) {
    throw new ConfigurationError(
      `TELEGRAM_LOG_LEVEL must be one of: ${p_libraryLogLevels.join(", ")}.`
    );
  }
  return level;
}
