/**
 * Тесты сервиса загрузки медиа
 * Telegram заменен мок-шлюзом, файлы пишутся во временную директорию
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TelegramDownloaderService } from '../services/telegramDownloaderService';
import {
    IChatMessage,
    IConversation,
    IDownloadJob,
    IFetchMessagesOptions,
    IMessagingConnection,
    IMessagingGateway
} from '../interfaces';

/**
 * Мок шлюза Telegram API
 */
class MockMessagingGateway implements IMessagingGateway {
    public readonly fetchCalls: IFetchMessagesOptions[] = [];
    public readonly downloadedPaths: string[] = [];
    private readonly p_conversation: IConversation;
    private readonly p_messages: IChatMessage[];
    private readonly p_failures = new Map<number, Error>();

    constructor(_conversation: IConversation, _messages: IChatMessage[]) {
        this.p_conversation = _conversation;
        this.p_messages = _messages;
    }

    failDownload(_messageId: number, _error: Error): void {
        this.p_failures.set(_messageId, _error);
    }

    async getDialogsAsync(): Promise<IConversation[]> {
        return [this.p_conversation];
    }

    async resolveConversationAsync(_conversationId: number): Promise<IConversation> {
        if (_conversationId !== this.p_conversation.id) {
            throw new Error(`Conversation ${_conversationId} not found`);
        }
        return this.p_conversation;
    }

    async fetchMessagesAsync(_conversationId: number, _options: IFetchMessagesOptions): Promise<IChatMessage[]> {
        this.fetchCalls.push(_options);
        return _options.limit === undefined ? [...this.p_messages] : this.p_messages.slice(0, _options.limit);
    }

    async downloadMediaAsync(_message: IChatMessage, _filePath: string): Promise<boolean> {
        const failure = this.p_failures.get(_message.id);
        if (failure) {
            throw failure;
        }

        fs.writeFileSync(_filePath, `media ${_message.id}`);
        this.downloadedPaths.push(_filePath);
        return true;
    }
}

class MockConnection implements IMessagingConnection {
    public connectCalls = 0;
    public disconnectCalls = 0;

    async connect(): Promise<void> {
        this.connectCalls++;
    }

    async disconnect(): Promise<void> {
        this.disconnectCalls++;
    }
}

/**
 * Тестовые данные
 */
const conversation: IConversation = { id: -1001234, name: 'Test Group', type: 'Group' };

const createPhotoMessage = (_id: number, _date: string = '2024-03-05T14:07:09Z'): IChatMessage => ({
    id: _id,
    date: new Date(_date),
    media: { kind: 'photo' }
});

const createDocumentMessage = (_id: number, _fileName: string): IChatMessage => ({
    id: _id,
    date: new Date('2024-03-01T00:00:00Z'),
    media: { kind: 'document', fileName: _fileName, mimeType: 'application/pdf', isGif: false }
});

const createTextMessage = (_id: number, _text: string): IChatMessage => ({
    id: _id,
    text: _text,
    date: new Date('2024-03-01T00:00:00Z'),
    media: null
});

describe('TelegramDownloaderService', () => {
    let tmpRoot: string;
    let conversationDir: string;
    let logSpy: jest.SpyInstance;

    const createService = (_messages: IChatMessage[]) => {
        const gateway = new MockMessagingGateway(conversation, _messages);
        const connection = new MockConnection();
        const service = new TelegramDownloaderService(connection, gateway, tmpRoot);
        return { gateway, connection, service };
    };

    const createJob = (_overrides: Partial<IDownloadJob> = {}): IDownloadJob => ({
        conversationId: conversation.id,
        mediaType: 'all',
        limit: 100,
        ..._overrides
    });

    beforeEach(() => {
        tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'tg-downloader-'));
        conversationDir = path.join(tmpRoot, 'Test Group_-1001234');
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        logSpy.mockRestore();
        fs.rmSync(tmpRoot, { recursive: true, force: true });
    });

    describe('Подключение', () => {
        test('должен делегировать подключение и отключение соединению', async () => {
            const { service, connection } = createService([]);

            await service.connectAsync();
            await service.closeAsync();

            expect(connection.connectCalls).toBe(1);
            expect(connection.disconnectCalls).toBe(1);
        });
    });

    describe('Список диалогов', () => {
        test('должен выводить таблицу и возвращать диалоги', async () => {
            const { service } = createService([]);

            const dialogs = await service.listDialogsAsync();

            expect(dialogs).toEqual([conversation]);
            expect(logSpy).toHaveBeenCalledWith('Available Telegram Groups/Channels:');
            expect(logSpy).toHaveBeenCalledWith(`1      -1001234     Group      Test Group${' '.repeat(20)}`);
        });
    });

    describe('Загрузка файлов', () => {
        test('должен пропускать документы, которые уже есть в папке', async () => {
            fs.mkdirSync(conversationDir, { recursive: true });
            fs.writeFileSync(path.join(conversationDir, 'report.pdf'), 'old');

            const { service, gateway } = createService([
                createDocumentMessage(1, 'report.pdf'),
                createDocumentMessage(2, 'notes.pdf')
            ]);

            const result = await service.downloadMediaAsync(createJob({ mediaType: 'documents' }));

            expect(result.downloaded).toBe(1);
            expect(result.skipped).toBe(1);
            expect(gateway.downloadedPaths).toEqual([path.join(conversationDir, 'notes.pdf')]);
            expect(fs.readFileSync(path.join(conversationDir, 'report.pdf'), 'utf-8')).toBe('old');
            expect(result.linksFile).toBeUndefined();
            expect(fs.existsSync(path.join(conversationDir, 'extracted_links.txt'))).toBe(false);
            expect(gateway.fetchCalls).toEqual([{ filter: 'documents', limit: 100, minDate: undefined }]);
        });

        test.each(['all', 'photos', 'documents', 'gifs'] as const)(
            'должен считать существующее фото пропущенным в режиме %s',
            async (_mediaType) => {
                fs.mkdirSync(conversationDir, { recursive: true });
                fs.writeFileSync(path.join(conversationDir, 'photo_7_2024-03-05_14-07-09.jpg'), 'old');

                const { service, gateway } = createService([createPhotoMessage(7)]);

                const result = await service.downloadMediaAsync(createJob({ mediaType: _mediaType }));

                expect(result.skipped).toBe(1);
                expect(result.downloaded).toBe(0);
                expect(gateway.downloadedPaths).toEqual([]);
            }
        );

        test('должен продолжать обработку после ошибки в одном сообщении', async () => {
            const { service, gateway } = createService([
                createDocumentMessage(1, 'a.pdf'),
                createDocumentMessage(2, 'b.pdf')
            ]);
            gateway.failDownload(1, new Error('FILE_REFERENCE_EXPIRED'));

            const result = await service.downloadMediaAsync(createJob({ mediaType: 'documents' }));

            expect(result.downloaded).toBe(1);
            expect(result.errors).toEqual(['Message 1: FILE_REFERENCE_EXPIRED']);
            expect(gateway.downloadedPaths).toEqual([path.join(conversationDir, 'b.pdf')]);
        });

        test('должен прерывать загрузку при нехватке места на диске', async () => {
            const { service, gateway } = createService([
                createDocumentMessage(1, 'a.pdf'),
                createDocumentMessage(2, 'b.pdf')
            ]);
            gateway.failDownload(1, Object.assign(new Error('no space left on device'), { code: 'ENOSPC' }));

            await expect(service.downloadMediaAsync(createJob({ mediaType: 'documents' })))
                .rejects.toThrow('no space left on device');
            expect(gateway.downloadedPaths).toEqual([]);
        });
    });

    describe('Извлечение ссылок', () => {
        test('должен записывать каждую ссылку из текста отдельной строкой', async () => {
            const { service, gateway } = createService([
                createTextMessage(1, 'See https://example.com/a and http://test.org/b.'),
                createPhotoMessage(2)
            ]);

            const result = await service.downloadMediaAsync(createJob({ mediaType: 'links' }));

            const linksFile = path.join(conversationDir, 'extracted_links.txt');
            expect(result.linksFile).toBe(linksFile);
            expect(fs.readFileSync(linksFile, 'utf-8')).toBe('https://example.com/a\nhttp://test.org/b\n');
            expect(result.downloaded).toBe(2);
            expect(gateway.downloadedPaths).toEqual([]);
            expect(gateway.fetchCalls[0].filter).toBeUndefined();
        });

        test('должен скачивать фото и извлекать ссылки в режиме all', async () => {
            const { service, gateway } = createService([
                createPhotoMessage(7),
                {
                    id: 8,
                    text: 'Read https://news.example.com/post',
                    date: new Date('2024-03-05T15:00:00Z'),
                    media: { kind: 'webpage', url: 'https://news.example.com/post' }
                }
            ]);

            const result = await service.downloadMediaAsync(createJob());

            expect(result.downloaded).toBe(3);
            expect(gateway.downloadedPaths).toEqual([path.join(conversationDir, 'photo_7_2024-03-05_14-07-09.jpg')]);
            expect(fs.readFileSync(path.join(conversationDir, 'extracted_links.txt'), 'utf-8'))
                .toBe('https://news.example.com/post\nhttps://news.example.com/post\n');
        });

        test('должен перезаписывать файл ссылок при новом запуске', async () => {
            fs.mkdirSync(conversationDir, { recursive: true });
            fs.writeFileSync(path.join(conversationDir, 'extracted_links.txt'), 'https://stale.example.com\n');

            const { service } = createService([createTextMessage(1, 'https://fresh.example.com')]);

            await service.downloadMediaAsync(createJob({ mediaType: 'links' }));

            expect(fs.readFileSync(path.join(conversationDir, 'extracted_links.txt'), 'utf-8'))
                .toBe('https://fresh.example.com\n');
        });
    });

    describe('Фильтры', () => {
        test('должен сообщать об отсутствии сообщений и не создавать файлов', async () => {
            const { service, gateway } = createService([]);

            const result = await service.downloadMediaAsync(createJob());

            expect(result.matchedMessages).toBe(0);
            expect(fs.readdirSync(conversationDir)).toEqual([]);
            expect(gateway.downloadedPaths).toEqual([]);
            expect(logSpy).toHaveBeenCalledWith('⚠️  No matching messages found.');
        });

        test('должен оставлять только сообщения с подстрокой без учета регистра', async () => {
            const { service, gateway } = createService([
                createTextMessage(1, 'Invoice for March'),
                createTextMessage(2, 'random chat'),
                createPhotoMessage(3)
            ]);

            const result = await service.downloadMediaAsync(createJob({ contains: 'INVOICE' }));

            expect(result.matchedMessages).toBe(1);
            expect(gateway.downloadedPaths).toEqual([]);
        });

        test('не должен ничего писать, если подстрока не найдена', async () => {
            const { service } = createService([createTextMessage(1, 'hello https://a.example.com')]);

            const result = await service.downloadMediaAsync(createJob({ contains: 'invoice' }));

            expect(result.matchedMessages).toBe(0);
            expect(fs.readdirSync(conversationDir)).toEqual([]);
        });

        test('должен отбрасывать сообщения старше даты отсечки', async () => {
            const offsetDate = new Date('2024-01-10T00:00:00Z');
            const { service, gateway } = createService([
                createPhotoMessage(1, '2024-01-12T00:00:00Z'),
                createPhotoMessage(2, '2024-01-10T00:00:00Z'),
                createPhotoMessage(3, '2024-01-05T00:00:00Z')
            ]);

            const result = await service.downloadMediaAsync(createJob({ mediaType: 'photos', offsetDate }));

            expect(result.matchedMessages).toBe(2);
            expect(gateway.downloadedPaths).toEqual([
                path.join(conversationDir, 'photo_1_2024-01-12_00-00-00.jpg'),
                path.join(conversationDir, 'photo_2_2024-01-10_00-00-00.jpg')
            ]);
            expect(gateway.fetchCalls[0]).toEqual({ filter: 'photos', limit: 100, minDate: offsetDate });
        });

        test('должен передавать неограниченный лимит шлюзу', async () => {
            const { service, gateway } = createService([createTextMessage(1, 'no links here')]);

            await service.downloadMediaAsync(createJob({ limit: undefined }));

            expect(gateway.fetchCalls[0].limit).toBeUndefined();
        });
    });
});
