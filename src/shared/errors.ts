/**
 * Классы ошибок загрузчика
 * Драйвер командной строки сопоставляет их с кодами выхода в одном месте
 */

/**
 * Ошибка конфигурации: не заданы или неверны учетные данные
 */
export class ConfigurationError extends Error {
    constructor(_message: string) {
        super(_message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Ошибка авторизации: неверный код или пароль 2FA
 */
export class AuthenticationError extends Error {
    constructor(_message: string) {
        super(_message);
        this.name = 'AuthenticationError';
    }
}

/**
 * Операция отменена пользователем (Ctrl+C в промпте)
 */
export class OperationCancelledError extends Error {
    constructor(_message: string = 'Operation cancelled by user.') {
        super(_message);
        this.name = 'OperationCancelledError';
    }
}

/** Коды ошибок файловой системы, после которых продолжать загрузку бессмысленно */
const p_fatalFsCodes = new Set<string>(['ENOSPC', 'EROFS', 'EDQUOT']);

/**
 * Проверяет, является ли ошибка фатальной ошибкой файловой системы
 */
export function isFatalFileSystemError(_error: unknown): boolean {
    if (!(_error instanceof Error) || !('code' in _error)) {
        return false;
    }

    const code = _error.code;
    return typeof code === 'string' && p_fatalFsCodes.has(code);
}

/**
 * Текст ошибки для вывода в консоль
 */
export function getErrorMessage(_error: unknown): string {
    if (_error instanceof Error) {
        return _error.message;
    }
    return String(_error);
}
