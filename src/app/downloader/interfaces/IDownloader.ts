/**
 * Интерфейсы модуля массовой загрузки медиа из чатов Telegram
 */

/**
 * Тип диалога
 */
export type ConversationType = 'Group' | 'Channel' | 'Private';

/**
 * Тип медиа для загрузки
 */
export type MediaType = 'all' | 'photos' | 'documents' | 'links' | 'gifs';

export const MEDIA_TYPES: readonly MediaType[] = ['all', 'photos', 'documents', 'links', 'gifs'];

/**
 * Диалог (группа, канал или личная переписка)
 */
export interface IConversation {
    /** ID диалога (с префиксом -100 для каналов) */
    id: number;
    /** Отображаемое имя */
    name: string;
    /** Тип диалога */
    type: ConversationType;
}

/**
 * Флаги диалога в том виде, в котором их отдает библиотека
 */
export interface IDialogFlags {
    isGroup: boolean;
    isChannel: boolean;
}

/**
 * Медиа вложение сообщения
 */
export type MessageMedia =
    | { kind: 'photo' }
    | { kind: 'document'; fileName?: string; mimeType?: string; isGif: boolean }
    | { kind: 'webpage'; url?: string };

/**
 * Сообщение из истории чата
 */
export interface IChatMessage {
    /** ID сообщения */
    id: number;
    /** Текст сообщения */
    text?: string;
    /** Дата сообщения */
    date: Date;
    /** Вложение */
    media: MessageMedia | null;
}

/**
 * Параметры задания загрузки
 */
export interface IDownloadJob {
    readonly conversationId: number;
    readonly mediaType: MediaType;
    /** undefined = без ограничений */
    readonly limit?: number;
    /** Только сообщения не старше этой даты */
    readonly offsetDate?: Date;
    /** Подстрока для поиска в тексте (без учета регистра) */
    readonly contains?: string;
}

/**
 * Результат загрузки
 */
export interface IDownloadResult {
    conversation: IConversation;
    /** Папка назначения */
    directory: string;
    /** Сообщений после фильтрации */
    matchedMessages: number;
    /** Скачано файлов и извлечено ссылок */
    downloaded: number;
    /** Пропущено уже существующих файлов */
    skipped: number;
    /** Путь к файлу ссылок, если извлечение ссылок включено */
    linksFile?: string;
    /** Ошибки обработки отдельных сообщений */
    errors: string[];
}

/**
 * Параметры выборки сообщений
 */
export interface IFetchMessagesOptions {
    /** Фильтр на стороне сервера */
    filter?: Exclude<MediaType, 'all' | 'links'>;
    /** undefined = без ограничений */
    limit?: number;
    /** Остановить выборку на первом сообщении старше этой даты */
    minDate?: Date;
}

/**
 * Шлюз к API мессенджера
 * Единственное место, где используются типы клиентской библиотеки
 */
export interface IMessagingGateway {
    /** Все диалоги аккаунта */
    getDialogsAsync(): Promise<IConversation[]>;

    /** Диалог по ID */
    resolveConversationAsync(_conversationId: number): Promise<IConversation>;

    /** Сообщения диалога, от новых к старым */
    fetchMessagesAsync(_conversationId: number, _options: IFetchMessagesOptions): Promise<IChatMessage[]>;

    /** Скачивание вложения сообщения в файл */
    downloadMediaAsync(_message: IChatMessage, _filePath: string): Promise<boolean>;
}

/**
 * Соединение с мессенджером
 */
export interface IMessagingConnection {
    connect(): Promise<void>;
    disconnect(): Promise<void>;
}

/**
 * Основной интерфейс загрузчика
 */
export interface ITelegramDownloader {
    /** Подключение и авторизация */
    connectAsync(): Promise<void>;

    /** Вывод таблицы диалогов */
    listDialogsAsync(): Promise<IConversation[]>;

    /** Загрузка медиа и извлечение ссылок из одного диалога */
    downloadMediaAsync(_job: IDownloadJob): Promise<IDownloadResult>;

    /** Отключение */
    closeAsync(): Promise<void>;
}
