import type { ContentRenderer } from './types.js';

const NAMED_ENTITIES: ReadonlyArray<[string, string]> = [
    ['&nbsp;', ' '],
    ['&amp;', '&'],
    ['&lt;', '<'],
    ['&gt;', '>'],
    ['&quot;', '"'],
    ['&#39;', "'"],
    ['&apos;', "'"],
    ['&copy;', '©'],
    ['&reg;', '®'],
    ['&trade;', '™'],
];

/** Block boundaries keep a space between the words on either side. */
const BLOCK_TAG = /<\/?(?:p|div|br|hr|h[1-6]|li|ul|ol|table|tr|td|th|blockquote|section|article|header|footer)\b[^>]*>/gi;

/**
 * Regex-only tag stripping. Used as the plain rendering and as the last
 * resort of the richer renderers, so it must not depend on a DOM parser.
 * Inline tags are removed outright: `a<b>c</b>` reads `ac`.
 */
export function stripHtmlTags(html: string): string {
    if (!html || html.trim().length === 0) return '';

    let text = html
        .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
        .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
        .replace(/<!--[\s\S]*?-->/g, '')
        .replace(BLOCK_TAG, ' ')
        .replace(/<[^>]*>/g, '');

    for (const [entity, value] of NAMED_ENTITIES) {
        text = text.split(entity).join(value);
    }

    return text
        .replace(/&[a-zA-Z0-9#]+;/g, '')
        .replace(/\s+/g, ' ')
        .trim();
}

export class PlainTextRenderer implements ContentRenderer {
    readonly format = 'plain' as const;

    render(html: string): string {
        return stripHtmlTags(html);
    }
}
