/**
 * Утилита для форматированного вывода логов
 */
export class Logger {
    /**
     * Информационное сообщение
     */
    static info(message: string): void {
        console.log(`ℹ️  ${message}`);
    }

    /**
     * Успешная операция
     */
    static success(message: string): void {
        console.log(`✅ ${message}`);
    }

    /**
     * Ошибка
     */
    static error(message: string, error?: unknown): void {
        console.log(`❌ ${message}`);
        if (error) {
            console.error(error);
        }
    }

    /**
     * Предупреждение
     */
    static warn(message: string): void {
        console.log(`⚠️  ${message}`);
    }

    /**
     * Строка без префикса (таблицы, итоги)
     */
    static plain(message: string): void {
        console.log(message);
    }

    /**
     * Прогресс обработки сообщения
     */
    static progress(current: number, total: number, message: string): void {
        const width = String(total).length;
        console.log(`[${String(current).padStart(width)}/${total}] ${message}`);
    }
}
