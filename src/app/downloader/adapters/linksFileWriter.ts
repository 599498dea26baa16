import * as fs from 'fs';
import * as path from 'path';

/**
 * Запись извлеченных ссылок в extracted_links.txt
 * Файл перезаписывается при открытии, затем дописывается построчно
 */
export class LinksFileWriter {
    static readonly FILE_NAME = 'extracted_links.txt';

    private readonly p_filePath: string;
    private p_handle: fs.promises.FileHandle | null = null;

    constructor(_directory: string) {
        this.p_filePath = path.join(_directory, LinksFileWriter.FILE_NAME);
    }

    get filePath(): string {
        return this.p_filePath;
    }

    async openAsync(): Promise<void> {
        this.p_handle = await fs.promises.open(this.p_filePath, 'w');
    }

    async appendAsync(_url: string): Promise<void> {
        if (!this.p_handle) {
            throw new Error(`Links file ${this.p_filePath} is not open`);
        }
        await this.p_handle.write(`${_url}\n`, null, 'utf-8');
    }

    async closeAsync(): Promise<void> {
        if (this.p_handle) {
            const handle = this.p_handle;
            this.p_handle = null;
            await handle.close();
        }
    }
}
