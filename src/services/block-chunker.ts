export interface BlockChunkerOptions {
    /** Chunks shorter than this are merged into their predecessor when they fit. */
    minChars: number;
    /** Hard ceiling; no returned chunk is longer. */
    maxChars: number;
    breakOn: 'paragraph' | 'sentence';
    coalesce: boolean;
}

const DEFAULT_OPTIONS: BlockChunkerOptions = {
    minChars: 50,
    maxChars: 800,
    breakOn: 'paragraph',
    coalesce: true,
};

const PARAGRAPH_BREAK = /\n\n+/;
const SENTENCE_BREAK = /(?<=[.!?])\s+/;
const INLINE_TAG = /<(\/?)([a-zA-Z]+)>/g;
const DANGLING_MARKUP = /(?:<[^>]*|&[a-zA-Z0-9#]*)$/;

/**
 * Make every chunk of an inline-HTML message well formed on its own. A
 * tag or entity cut in half moves whole into the next chunk. Tags still
 * open at a cut are closed there and reopened at the start of the next
 * chunk, so a chunk grows by the tags it closes and reopens.
 */
export function balanceInlineTags(chunks: readonly string[]): string[] {
    const result: string[] = [];
    const open: string[] = [];
    let carry = '';

    chunks.forEach((raw, index) => {
        let chunk = carry + raw;
        carry = '';

        const dangling = index < chunks.length - 1 ? DANGLING_MARKUP.exec(chunk) : null;
        if (dangling) {
            carry = dangling[0];
            chunk = chunk.slice(0, dangling.index);
        }
        if (!chunk.trim()) return;

        const reopen = open.map((tag) => `<${tag}>`).join('');
        for (const match of chunk.matchAll(INLINE_TAG)) {
            const tag = match[2].toLowerCase();
            if (match[1] === '/') {
                const at = open.lastIndexOf(tag);
                if (at >= 0) open.splice(at, 1);
            } else {
                open.push(tag);
            }
        }
        const close = [...open].reverse().map((tag) => `</${tag}>`).join('');

        result.push(`${reopen}${chunk}${close}`);
    });

    return result;
}

/**
 * Splits a message that is too long for one platform send. Paragraph
 * boundaries are preferred, then sentence boundaries, then the last
 * whitespace before the limit, then a cut at exactly `maxChars`.
 */
export class EmbeddedBlockChunker {
    readonly #minChars: number;
    readonly #maxChars: number;
    readonly #breakOn: 'paragraph' | 'sentence';
    readonly #coalesce: boolean;

    constructor(options: Partial<BlockChunkerOptions> = {}) {
        this.#maxChars = Math.max(2, Math.floor(options.maxChars ?? DEFAULT_OPTIONS.maxChars));
        this.#minChars = Math.min(
            this.#maxChars - 1,
            Math.max(1, Math.floor(options.minChars ?? DEFAULT_OPTIONS.minChars)),
        );
        this.#breakOn = options.breakOn ?? DEFAULT_OPTIONS.breakOn;
        this.#coalesce = options.coalesce ?? DEFAULT_OPTIONS.coalesce;
    }

    get minChars(): number {
        return this.#minChars;
    }

    get maxChars(): number {
        return this.#maxChars;
    }

    chunk(text: string): string[] {
        const trimmed = text.trim();
        if (trimmed.length === 0) return [];
        if (trimmed.length <= this.#maxChars) return [trimmed];

        const pieces = this.#breakOn === 'paragraph'
            ? this.#chunkByParagraph(trimmed)
            : this.#chunkBySentence(trimmed);

        const bounded = pieces.flatMap((piece) => this.#hardSplit(piece));
        return this.#coalesce ? this.#coalesceChunks(bounded) : bounded;
    }

    #chunkByParagraph(text: string): string[] {
        const chunks: string[] = [];
        let current = '';

        for (const raw of text.split(PARAGRAPH_BREAK)) {
            const paragraph = raw.trim();
            if (!paragraph) continue;

            if (paragraph.length > this.#maxChars) {
                if (current) chunks.push(current);
                current = '';
                chunks.push(...this.#chunkBySentence(paragraph));
                continue;
            }

            if (current && current.length + 2 + paragraph.length > this.#maxChars) {
                chunks.push(current);
                current = paragraph;
            } else {
                current = current ? `${current}\n\n${paragraph}` : paragraph;
            }
        }

        if (current) chunks.push(current);
        return chunks;
    }

    #chunkBySentence(text: string): string[] {
        const chunks: string[] = [];
        let current = '';

        for (const raw of text.split(SENTENCE_BREAK)) {
            const sentence = raw.trim();
            if (!sentence) continue;

            if (current && current.length + 1 + sentence.length > this.#maxChars) {
                chunks.push(current);
                current = sentence;
            } else {
                current = current ? `${current} ${sentence}` : sentence;
            }
        }

        if (current) chunks.push(current);
        return chunks;
    }

    #hardSplit(text: string): string[] {
        const chunks: string[] = [];
        let rest = text;

        while (rest.length > this.#maxChars) {
            const window = rest.slice(0, this.#maxChars + 1);
            let cut = Math.max(window.lastIndexOf(' '), window.lastIndexOf('\n'));
            if (cut < Math.floor(this.#maxChars / 2)) {
                cut = this.#maxChars;
            }
            chunks.push(rest.slice(0, cut).trimEnd());
            rest = rest.slice(cut).trimStart();
        }

        if (rest) chunks.push(rest);
        return chunks;
    }

    #coalesceChunks(chunks: string[]): string[] {
        const result: string[] = [];

        for (const chunk of chunks) {
            const last = result[result.length - 1];
            if (last !== undefined && last.length < this.#minChars && last.length + 2 + chunk.length <= this.#maxChars) {
                result[result.length - 1] = `${last}\n\n${chunk}`;
            } else {
                result.push(chunk);
            }
        }

        return result;
    }
}
