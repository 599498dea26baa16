import { ITelegramDownloader } from "../app/downloader/interfaces";
import { buildDownloadJob } from "../app/downloader/parts/downloadHelpers";
import { Logger } from "../shared/utils/logger";
import { ICliOptions } from "./program";

/**
 * Один запуск: подключение, список диалогов или загрузка, отключение
 * Без --list и --download только выводит справку: загрузчик не создается
 */
export async function runDownloaderAsync(
  _createDownloader: () => ITelegramDownloader,
  _options: ICliOptions,
  _showHelp: () => void,
  _now: Date = new Date()
): Promise<void> {
  if (!_options.list && !_options.download) {
    _showHelp();
    return;
  }

  const downloader = _createDownloader();
  try {
    await downloader.connectAsync();

    if (_options.list) {
      await downloader.listDialogsAsync();
      return;
    }

    if (_options.entityId === undefined) {
      Logger.error("--entity-id is required for downloading.");
      await downloader.listDialogsAsync();
      return;
    }

    await downloader.downloadMediaAsync(
      buildDownloadJob(
        {
          entityId: _options.entityId,
          mediaType: _options.mediaType,
          limit: _options.limit,
          days: _options.days,
          contains: _options.contains,
        },
        _now
      )
    );
  } finally {
    await downloader.closeAsync();
  }
}
