import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { DocumentSource, Period, WeekLetterDocument } from '../types/delivery.js';

export const DEFAULT_LETTERS_DIR = 'memory/letters';

/** `<year>-W<ww>.html`, e.g. `2024-W07.html`. */
export function letterFileName(period: Period): string {
    return `${period.year}-W${String(period.week).padStart(2, '0')}.html`;
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Reads letters that an upstream fetcher drops under
 * `<lettersDir>/<recipientId>/<year>-W<ww>.html`. A missing or blank file
 * means the letter is not published yet.
 */
export class FileDocumentSource implements DocumentSource {
    readonly #lettersDir: string;

    constructor(lettersDir: string = DEFAULT_LETTERS_DIR) {
        this.#lettersDir = path.resolve(lettersDir);
    }

    pathFor(recipientId: string, period: Period): string {
        const recipientDir = path.resolve(this.#lettersDir, recipientId);
        if (path.dirname(recipientDir) !== this.#lettersDir) {
            throw new Error(`Recipient id '${recipientId}' is not a valid directory name.`);
        }
        return path.join(recipientDir, letterFileName(period));
    }

    async fetch(recipientId: string, period: Period): Promise<WeekLetterDocument | null> {
        const filePath = this.pathFor(recipientId, period);
        let rawContent: string;
        try {
            rawContent = await readFile(filePath, 'utf8');
        } catch (err) {
            if (isMissingFile(err)) return null;
            throw err;
        }

        if (rawContent.trim().length === 0) return null;
        return { recipientId, period, rawContent };
    }
}
