/**
 * Вспомогательные функции для работы с диалогами
 */

import { ConversationType, IConversation, IDialogFlags } from '../interfaces';

const TABLE_WIDTH = 60;

/**
 * Тип диалога: группа > канал > личный чат
 * Супергруппа помечена и как группа, и как канал, поэтому группа проверяется первой
 */
export function classifyDialog(_flags: IDialogFlags): ConversationType {
    if (_flags.isGroup) return 'Group';
    if (_flags.isChannel) return 'Channel';
    return 'Private';
}

/**
 * Строки таблицы диалогов фиксированной ширины
 */
export function formatDialogTable(_conversations: IConversation[]): string[] {
    const rule = '-'.repeat(TABLE_WIDTH);
    const lines = [
        'Available Telegram Groups/Channels:',
        rule,
        formatRow('Index', 'ID', 'Type', 'Name'),
        rule
    ];

    _conversations.forEach((conversation, index) => {
        lines.push(formatRow(String(index + 1), String(conversation.id), conversation.type, conversation.name));
    });

    return lines;
}

function formatRow(_index: string, _id: string, _type: string, _name: string): string {
    return `${_index.padEnd(6)} ${_id.padEnd(12)} ${_type.padEnd(10)} ${_name.padEnd(30)}`;
}
