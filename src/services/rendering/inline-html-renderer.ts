import type { ContentRenderer } from './types.js';
import { escapeHtmlText, isElement, isHeading, isText, parseFragment } from './dom.js';

function renderChildren(node: Node): string {
    let out = '';
    for (const child of Array.from(node.childNodes)) {
        out += renderNode(child);
    }
    return out;
}

function renderNode(node: Node): string {
    if (isText(node)) {
        return escapeHtmlText(node.textContent ?? '');
    }
    if (!isElement(node)) return '';

    const tag = node.tagName.toLowerCase();
    if (tag === 'style' || tag === 'script') return '';

    const content = renderChildren(node);

    if (isHeading(tag)) return `<b>${content}</b>\n\n`;

    switch (tag) {
        case 'b':
        case 'strong':
            return `<b>${content}</b>`;
        case 'i':
        case 'em':
            return `<i>${content}</i>`;
        case 'u':
            return `<u>${content}</u>`;
        case 'p':
            return `${content}\n\n`;
        case 'br':
            return '\n';
        case 'div':
            return `${content}\n`;
        default:
            return content;
    }
}

function fallback(html: string): string {
    return html
        .replace(/<[^>]+>/g, ' ')
        .replace(/\s+/g, ' ')
        .replace(/&nbsp;/g, ' ')
        .trim();
}

/**
 * Telegram `parse_mode: 'HTML'` rendering. Only `<b>`, `<i>` and `<u>` are
 * emitted; everything else is flattened to text with `&`, `<`, `>` escaped.
 */
export class InlineHtmlRenderer implements ContentRenderer {
    readonly format = 'html' as const;

    render(html: string): string {
        if (!html || html.trim().length === 0) return '';

        try {
            return renderChildren(parseFragment(html))
                .replace(/\u00A0/g, ' ')
                .replace(/[ \t]+/g, ' ')
                .replace(/ *\n */g, '\n')
                .replace(/\n{3,}/g, '\n\n')
                .trim();
        } catch {
            return fallback(html);
        }
    }
}
