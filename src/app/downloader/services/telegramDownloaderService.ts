/**
 * Сервис массовой загрузки медиа и ссылок из диалога Telegram
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    ITelegramDownloader,
    IMessagingConnection,
    IMessagingGateway,
    IConversation,
    IChatMessage,
    IDownloadJob,
    IDownloadResult,
    MediaType
} from '../interfaces';
import {
    buildConversationDirName,
    buildMediaFileName,
    filterMessagesByDate,
    filterMessagesByText,
    getServerFilter,
    shouldDownloadFiles,
    shouldExtractLinks
} from '../parts/downloadHelpers';
import { formatDialogTable } from '../parts/dialogHelpers';
import { LinkExtractor } from '../adapters/linkExtractor';
import { LinksFileWriter } from '../adapters/linksFileWriter';
import { Logger } from '../../../shared/utils/logger';
import { getErrorMessage, isFatalFileSystemError } from '../../../shared/errors';

export class TelegramDownloaderService implements ITelegramDownloader {
    private readonly p_connection: IMessagingConnection;
    private readonly p_gateway: IMessagingGateway;
    private readonly p_downloadDir: string;

    constructor(_connection: IMessagingConnection, _gateway: IMessagingGateway, _downloadDir: string) {
        this.p_connection = _connection;
        this.p_gateway = _gateway;
        this.p_downloadDir = _downloadDir;
    }

    async connectAsync(): Promise<void> {
        await this.p_connection.connect();
    }

    async closeAsync(): Promise<void> {
        await this.p_connection.disconnect();
    }

    /**
     * Выводит таблицу всех диалогов аккаунта
     */
    async listDialogsAsync(): Promise<IConversation[]> {
        const conversations = await this.p_gateway.getDialogsAsync();

        Logger.plain('');
        for (const line of formatDialogTable(conversations)) {
            Logger.plain(line);
        }

        return conversations;
    }

    /**
     * Скачивает вложения и извлекает ссылки из одного диалога
     */
    async downloadMediaAsync(_job: IDownloadJob): Promise<IDownloadResult> {
        const conversation = await this.p_gateway.resolveConversationAsync(_job.conversationId);
        const directory = path.join(this.p_downloadDir, buildConversationDirName(conversation));
        await fs.promises.mkdir(directory, { recursive: true });

        Logger.plain(`\nDownloading ${_job.mediaType} from ${conversation.name}`);
        Logger.plain(`Saving to: ${directory}`);

        const fetched = await this.p_gateway.fetchMessagesAsync(conversation.id, {
            filter: getServerFilter(_job.mediaType),
            limit: _job.limit,
            minDate: _job.offsetDate
        });
        const messages = filterMessagesByText(filterMessagesByDate(fetched, _job.offsetDate), _job.contains);

        const result: IDownloadResult = {
            conversation,
            directory,
            matchedMessages: messages.length,
            downloaded: 0,
            skipped: 0,
            errors: []
        };

        if (messages.length === 0) {
            Logger.warn('No matching messages found.');
            return result;
        }

        Logger.info(`Found ${messages.length} messages to process.`);

        const linksWriter = shouldExtractLinks(_job.mediaType) ? new LinksFileWriter(directory) : null;
        if (linksWriter) {
            await linksWriter.openAsync();
            result.linksFile = linksWriter.filePath;
        }

        try {
            for (const [index, message] of messages.entries()) {
                Logger.progress(index + 1, messages.length, `Message ${message.id}`);
                try {
                    await this.p_processMessageAsync(message, _job.mediaType, directory, linksWriter, result);
                } catch (error) {
                    if (isFatalFileSystemError(error)) {
                        throw error;
                    }
                    Logger.error(`Error processing message ${message.id}: ${getErrorMessage(error)}`);
                    result.errors.push(`Message ${message.id}: ${getErrorMessage(error)}`);
                }
            }
        } finally {
            await linksWriter?.closeAsync();
        }

        Logger.plain(`\nDownloaded/extracted ${result.downloaded} items from ${conversation.name}.`);
        if (result.skipped > 0) {
            Logger.plain(`Skipped ${result.skipped} already existing files.`);
        }
        if (result.errors.length > 0) {
            Logger.warn(`Failed to process ${result.errors.length} messages.`);
        }

        return result;
    }

    /**
     * Обработка одного сообщения: вложение, превью ссылки, ссылки в тексте
     */
    private async p_processMessageAsync(
        _message: IChatMessage,
        _mediaType: MediaType,
        _directory: string,
        _linksWriter: LinksFileWriter | null,
        _result: IDownloadResult
    ): Promise<void> {
        const media = _message.media;

        if (media && (media.kind === 'photo' || media.kind === 'document')) {
            if (shouldDownloadFiles(_mediaType)) {
                const fileName = buildMediaFileName(_message, media);
                const filePath = path.join(_directory, fileName);

                if (fs.existsSync(filePath)) {
                    Logger.info(`Skipping existing file: ${fileName}`);
                    _result.skipped++;
                } else if (await this.p_gateway.downloadMediaAsync(_message, filePath)) {
                    _result.downloaded++;
                    Logger.success(`Downloaded ${fileName}`);
                }
            }
        } else if (media?.kind === 'webpage' && media.url && _linksWriter) {
            await _linksWriter.appendAsync(media.url);
            _result.downloaded++;
        }

        if (_message.text && _linksWriter) {
            for (const url of LinkExtractor.extractUrls(_message.text)) {
                await _linksWriter.appendAsync(url);
                _result.downloaded++;
            }
        }
    }
}
