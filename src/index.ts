#!/usr/bin/env node
import { createProgram, parseCliOptions } from "./cli/program";
import { runDownloaderAsync } from "./cli/runner";
import { loadDownloaderConfig } from "./config";
import { InteractiveAuthAdapter } from "./app/auth/adapters/interactiveAuthAdapter";
import { SessionFileAdapter } from "./app/auth/adapters/sessionFileAdapter";
import { TelegramDownloaderService } from "./app/downloader/services/telegramDownloaderService";
import { GramClient } from "./telegram/adapters/gramClient";
import { TelegramGateway } from "./telegram/adapters/telegramGateway";
import { OperationCancelledError, getErrorMessage } from "./shared/errors";
import { Logger } from "./shared/utils/logger";

async function main() {
  const program = createProgram();
  const options = parseCliOptions(process.argv.slice(2), program);

  await runDownloaderAsync(() => createDownloader(options.downloadDir), options, () => program.outputHelp());
}

/**
 * Учетные данные проверяются здесь, до любого сетевого запроса
 */
function createDownloader(_downloadDir: string): TelegramDownloaderService {
  const config = loadDownloaderConfig();

  const gramClient = new GramClient(
    config.telegram,
    new InteractiveAuthAdapter(),
    new SessionFileAdapter(config.telegram.sessionFile)
  );

  return new TelegramDownloaderService(
    gramClient,
    new TelegramGateway(gramClient.getClient()),
    _downloadDir
  );
}

function handleFatalError(error: unknown): void {
  if (error instanceof OperationCancelledError) {
    Logger.plain(`\n${error.message}`);
    process.exit(0);
  }

  Logger.plain(`\nError: ${getErrorMessage(error)}`);
  process.exit(1);
}

// Запуск скрипта
if (require.main === module) {
  process.once("SIGINT", () => {
    Logger.plain("\nOperation cancelled by user.");
    process.exit(0);
  });

  main().catch(handleFatalError);
}
