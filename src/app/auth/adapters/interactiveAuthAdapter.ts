/**
 * Адаптер для интерактивной авторизации через консоль
 */

import prompts from 'prompts';
import { IInteractiveAuthHandler } from '../interfaces';
import { validatePhoneCode } from '../parts/authHelpers';
import { OperationCancelledError } from '../../../shared/errors';

export class InteractiveAuthAdapter implements IInteractiveAuthHandler {

    /**
     * Запрос кода подтверждения
     */
    async requestPhoneCode(): Promise<string> {
        const response = await prompts({
            type: 'text',
            name: 'phoneCode',
            message: '🔐 Enter the verification code:',
            validate: (value: string) => validatePhoneCode(value)
        });

        const phoneCode: unknown = response.phoneCode;
        if (typeof phoneCode !== 'string' || !phoneCode) {
            throw new OperationCancelledError();
        }

        return phoneCode.trim();
    }

    /**
     * Запрос пароля двухфакторной аутентификации
     */
    async requestPassword(_hint?: string): Promise<string> {
        const hint = _hint ? ` (hint: ${_hint})` : '';
        const response = await prompts({
            type: 'password',
            name: 'password',
            message: `🔒 Enter your two-step verification password${hint}:`,
            validate: (value: string) => value && value.length > 0 ? true : 'Password is required'
        });

        const password: unknown = response.password;
        if (typeof password !== 'string' || !password) {
            throw new OperationCancelledError();
        }

        return password;
    }

    /**
     * Отображение обычного сообщения
     */
    displayMessage(_message: string): void {
        console.log(_message);
    }
}
