import type { MessageFormat, RenderedContent } from '../types/channels.js';
import { logThought } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { ContentRenderer } from './rendering/types.js';
import { MarkdownRenderer } from './rendering/markdown-renderer.js';
import { InlineHtmlRenderer } from './rendering/inline-html-renderer.js';
import { PlainTextRenderer, stripHtmlTags } from './rendering/plain-text-renderer.js';
import { escapeHtmlText } from './rendering/dom.js';

function formatTitle(format: MessageFormat, title: string): string {
    switch (format) {
        case 'markdown':
            return `*${escapeHtmlText(title)}*`;
        case 'html':
            return `<b>${escapeHtmlText(title)}</b>`;
        case 'plain':
            return title;
    }
}

/**
 * Put a heading line above every non-empty rendering. An empty rendering
 * stays empty so the dispatcher still refuses to send it.
 */
export function withTitle(rendered: RenderedContent, title: string): RenderedContent {
    const titled: RenderedContent = { plain: '' };
    for (const format of ['plain', 'markdown', 'html'] as const) {
        const body = rendered[format];
        if (body === undefined) continue;
        titled[format] = body.trim() ? `${formatTitle(format, title)}\n\n${body}` : body;
    }
    return titled;
}

/**
 * Renders one HTML document into every format the active channels prefer.
 * Never throws and never truncates: a renderer that fails degrades to the
 * plain rendering of the same document.
 */
export class ContentAdapter {
    readonly #renderers: Map<MessageFormat, ContentRenderer> = new Map();

    constructor(
        renderers: ContentRenderer[] = [new MarkdownRenderer(), new InlineHtmlRenderer(), new PlainTextRenderer()],
    ) {
        for (const renderer of renderers) {
            this.register(renderer);
        }
    }

    /** Add or replace the renderer for its format. */
    register(renderer: ContentRenderer): void {
        this.#renderers.set(renderer.format, renderer);
    }

    get formats(): MessageFormat[] {
        return [...this.#renderers.keys()];
    }

    render(html: string, formats: Iterable<MessageFormat> = []): RenderedContent {
        const plain = this.#renderPlain(html);
        const rendered: RenderedContent = { plain };

        for (const format of new Set(formats)) {
            if (format === 'plain') continue;
            const renderer = this.#renderers.get(format);
            if (!renderer) {
                void logThought(`[ContentAdapter] No renderer for '${format}'; channels using it receive plain text.`);
                continue;
            }
            rendered[format] = this.#safeRender(renderer, html, plain);
        }

        return rendered;
    }

    #renderPlain(html: string): string {
        const renderer = this.#renderers.get('plain');
        if (!renderer) return stripHtmlTags(html);
        return this.#safeRender(renderer, html, null);
    }

    #safeRender(renderer: ContentRenderer, html: string, plain: string | null): string {
        try {
            return renderer.render(html);
        } catch (err) {
            void logThought(`[ContentAdapter] ${renderer.format} rendering failed, using plain text: ${errorMessage(err)}`);
            return plain ?? stripHtmlTags(html);
        }
    }
}
