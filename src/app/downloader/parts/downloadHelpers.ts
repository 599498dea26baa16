/**
 * Вспомогательные функции для загрузки медиа
 */

import {
    IChatMessage,
    IConversation,
    IDownloadJob,
    IFetchMessagesOptions,
    MediaType,
    MessageMedia
} from '../interfaces';

export type DownloadableMedia = Extract<MessageMedia, { kind: 'photo' | 'document' }>;

const DAY_MS = 24 * 60 * 60 * 1000;

const p_mimeExtensions: Record<string, string> = {
    'image/jpeg': 'jpg',
    'image/png': 'png',
    'image/gif': 'gif',
    'image/webp': 'webp',
    'video/mp4': 'mp4',
    'video/webm': 'webm',
    'video/quicktime': 'mov',
    'audio/mpeg': 'mp3',
    'audio/ogg': 'ogg',
    'audio/wav': 'wav',
    'application/pdf': 'pdf',
    'application/zip': 'zip',
    'text/plain': 'txt'
};

/**
 * Лимит 0 означает "без ограничений"
 */
export function resolveFetchLimit(_limit: number): number | undefined {
    return _limit === 0 ? undefined : _limit;
}

/**
 * Дата отсечки для --days
 */
export function computeOffsetDate(_days: number | undefined, _now: Date = new Date()): Date | undefined {
    if (!_days) return undefined;
    return new Date(_now.getTime() - _days * DAY_MS);
}

/**
 * Собирает неизменяемое задание загрузки из параметров командной строки
 */
export function buildDownloadJob(
    _params: { entityId: number; mediaType: MediaType; limit: number; days?: number; contains?: string },
    _now: Date = new Date()
): IDownloadJob {
    return Object.freeze({
        conversationId: _params.entityId,
        mediaType: _params.mediaType,
        limit: resolveFetchLimit(_params.limit),
        offsetDate: computeOffsetDate(_params.days, _now),
        contains: _params.contains || undefined
    });
}

/**
 * Фильтр на стороне сервера; ссылки фильтруются на клиенте
 */
export function getServerFilter(_mediaType: MediaType): IFetchMessagesOptions['filter'] {
    switch (_mediaType) {
        case 'photos':
        case 'documents':
        case 'gifs':
            return _mediaType;
        default:
            return undefined;
    }
}

export function shouldDownloadFiles(_mediaType: MediaType): boolean {
    return _mediaType !== 'links';
}

export function shouldExtractLinks(_mediaType: MediaType): boolean {
    return _mediaType === 'all' || _mediaType === 'links';
}

/**
 * Оставляет сообщения не старше даты отсечки
 */
export function filterMessagesByDate(_messages: IChatMessage[], _offsetDate?: Date): IChatMessage[] {
    if (!_offsetDate) return _messages;

    const cutoff = _offsetDate.getTime();
    return _messages.filter(message => message.date.getTime() >= cutoff);
}

/**
 * Оставляет сообщения, текст которых содержит подстроку (без учета регистра)
 */
export function filterMessagesByText(_messages: IChatMessage[], _contains?: string): IChatMessage[] {
    if (!_contains) return _messages;

    const needle = _contains.toLowerCase();
    return _messages.filter(message => !!message.text && message.text.toLowerCase().includes(needle));
}

/**
 * Заменяет символы, недопустимые в именах файлов
 */
export function sanitizeFileName(_name: string): string {
    const clean = _name.replace(/[\/\\:*?"<>|\x00-\x1f]/g, '_').trim();
    return clean.length > 0 && clean !== '.' && clean !== '..' ? clean : 'unnamed';
}

/**
 * Имя папки диалога: <имя>_<id>
 */
export function buildConversationDirName(_conversation: IConversation): string {
    return `${sanitizeFileName(_conversation.name)}_${_conversation.id}`;
}

/**
 * Имя файла вложения
 * Для документов берется имя из атрибутов, иначе генерируется из ID и даты сообщения
 */
export function buildMediaFileName(_message: IChatMessage, _media: DownloadableMedia): string {
    if (_media.kind === 'document' && _media.fileName) {
        return sanitizeFileName(_media.fileName);
    }

    const prefix = _media.kind === 'photo' ? 'photo' : _media.isGif ? 'gif' : 'document';
    const extension = _media.kind === 'photo'
        ? 'jpg'
        : p_mimeExtensions[_media.mimeType ?? ''] ?? 'bin';

    return `${prefix}_${_message.id}_${formatFileTimestamp(_message.date)}.${extension}`;
}

/**
 * YYYY-MM-DD_HH-MM-SS в UTC
 */
export function formatFileTimestamp(_date: Date): string {
    return _date.toISOString().slice(0, 19).replace('T', '_').replace(/:/g, '-');
}
