/**
 * Вспомогательные функции для авторизации
 */

import { IStoredSession } from '../interfaces';

/**
 * Маскировка номера телефона для логов и файла сессии
 */
export function maskPhoneNumber(_phoneNumber: string): string {
    const clean = _phoneNumber.replace(/[^\d+]/g, '');
    if (clean.length <= 6) return clean;

    return `${clean.slice(0, 4)}${'*'.repeat(clean.length - 6)}${clean.slice(-2)}`;
}

/**
 * Проверка кода подтверждения: от 4 до 6 цифр
 */
export function validatePhoneCode(_code: string): true | string {
    if (!_code || _code.trim().length === 0) {
        return 'Verification code is required';
    }

    const cleanCode = _code.replace(/[^\d]/g, '');
    if (cleanCode.length < 4 || cleanCode.length > 6) {
        return 'Verification code must contain 4 to 6 digits';
    }

    return true;
}

/**
 * Разбор содержимого файла сессии
 */
export function parseStoredSession(_raw: string): IStoredSession | null {
    const data = parseJson(_raw);

    if (typeof data !== 'object' || data === null) return null;
    if (!('sessionString' in data) || typeof data.sessionString !== 'string') return null;

    return {
        sessionString: data.sessionString,
        phoneNumber: 'phoneNumber' in data && typeof data.phoneNumber === 'string' ? data.phoneNumber : '',
        savedAt: 'savedAt' in data && typeof data.savedAt === 'string' ? data.savedAt : ''
    };
}

function parseJson(_raw: string): unknown {
    try {
        return JSON.parse(_raw);
    } catch {
        return null;
    }
}
