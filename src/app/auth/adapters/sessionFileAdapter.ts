/**
 * Адаптер для хранения сессии в файле
 */

import * as fs from 'fs';
import * as path from 'path';
import { ISessionStore, IStoredSession } from '../interfaces';
import { maskPhoneNumber, parseStoredSession } from '../parts/authHelpers';
import { Logger } from '../../../shared/utils/logger';

export class SessionFileAdapter implements ISessionStore {
    private readonly p_filePath: string;

    constructor(_filePath: string) {
        this.p_filePath = _filePath;
    }

    /**
     * Загрузка строки сессии; поврежденный файл считается отсутствующим
     */
    loadSessionString(): string {
        if (!fs.existsSync(this.p_filePath)) {
            return '';
        }

        const stored = parseStoredSession(fs.readFileSync(this.p_filePath, 'utf-8'));
        if (!stored) {
            Logger.warn(`Session file ${this.p_filePath} is corrupted, a new sign-in is required`);
            return '';
        }

        if (stored.savedAt) {
            Logger.info(`Using session saved at ${stored.savedAt}`);
        }
        return stored.sessionString;
    }

    /**
     * Сохранение сессии в файл
     */
    async saveSessionAsync(_sessionString: string, _phoneNumber: string): Promise<void> {
        const stored: IStoredSession = {
            sessionString: _sessionString,
            phoneNumber: maskPhoneNumber(_phoneNumber),
            savedAt: new Date().toISOString()
        };

        await fs.promises.mkdir(path.dirname(path.resolve(this.p_filePath)), { recursive: true });
        await fs.promises.writeFile(this.p_filePath, JSON.stringify(stored, null, 2), { encoding: 'utf-8', mode: 0o600 });
    }
}
