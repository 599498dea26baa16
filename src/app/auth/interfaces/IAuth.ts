/**
 * Интерфейсы модуля авторизации и хранения сессии
 */

/**
 * Интерфейс для интерактивной авторизации
 */
export interface IInteractiveAuthHandler {
    /**
     * Запрос кода подтверждения
     */
    requestPhoneCode(): Promise<string>;

    /**
     * Запрос пароля двухфакторной аутентификации
     */
    requestPassword(_hint?: string): Promise<string>;

    /**
     * Отображение сообщения
     */
    displayMessage(_message: string): void;
}

/**
 * Содержимое файла сессии
 */
export interface IStoredSession {
    /** Строка сессии GramJS */
    sessionString: string;
    /** Замаскированный номер телефона */
    phoneNumber: string;
    /** Дата сохранения в ISO формате */
    savedAt: string;
}

/**
 * Интерфейс для хранения сессии
 */
export interface ISessionStore {
    /**
     * Строка сохраненной сессии или пустая строка
     */
    loadSessionString(): string;

    /**
     * Сохранение сессии
     */
    saveSessionAsync(_sessionString: string, _phoneNumber: string): Promise<void>;
}
