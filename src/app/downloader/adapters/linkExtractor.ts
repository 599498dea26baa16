/**
 * Адаптер для извлечения ссылок из текста сообщений
 */
export class LinkExtractor {
    /**
     * Извлечение всех http/https ссылок в порядке появления
     * Повторы не удаляются: каждое вхождение - отдельная ссылка
     */
    static extractUrls(_text: string): string[] {
        const matches = _text.match(/https?:\/\/\S+/gi);
        if (!matches) return [];

        return matches
            .map(url => this.cleanUrl(url))
            .filter(url => this.isValidUrl(url));
    }

    /**
     * Очистка URL от знаков препинания в конце
     * Закрывающая скобка отрезается, только если у нее нет пары внутри URL
     */
    private static cleanUrl(_url: string): string {
        let url = this.trimPunctuation(_url);
        while (url.endsWith(')') && this.countChar(url, '(') < this.countChar(url, ')')) {
            url = this.trimPunctuation(url.slice(0, -1));
        }
        return url;
    }

    private static trimPunctuation(_url: string): string {
        return _url.replace(/[.,;:!?'"\]}>]+$/, '');
    }

    private static countChar(_text: string, _char: string): number {
        return _text.split(_char).length - 1;
    }

    /**
     * После протокола должен остаться хотя бы один символ
     */
    private static isValidUrl(_url: string): boolean {
        return /^https?:\/\/.+/i.test(_url);
    }
}
