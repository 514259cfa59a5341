import type { MessageFormat } from '../../types/channels.js';

/** Turns one HTML document into text for a single platform dialect. */
export interface ContentRenderer {
    readonly format: MessageFormat;
    /** May throw; the content adapter falls back to plain text. */
    render(html: string): string;
}
