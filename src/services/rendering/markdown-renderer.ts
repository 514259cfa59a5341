import type { ContentRenderer } from './types.js';
import { escapeHtmlText, isElement, isHeading, isText, parseFragment } from './dom.js';
import { stripHtmlTags } from './plain-text-renderer.js';

const DROPPED_TAGS = new Set(['style', 'script', 'head', 'title']);

function renderChildren(node: Node): string {
    let out = '';
    for (const child of Array.from(node.childNodes)) {
        out += renderNode(child);
    }
    return out;
}

function bold(content: string): string {
    const inner = content.trim();
    return inner ? `**${inner}**` : '';
}

function renderNode(node: Node): string {
    if (isText(node)) {
        return escapeHtmlText((node.textContent ?? '').replace(/\u00A0/g, ' '));
    }
    if (!isElement(node)) return '';

    const tag = node.tagName.toLowerCase();
    if (DROPPED_TAGS.has(tag)) return '';

    const content = renderChildren(node);

    if (isHeading(tag)) return `${bold(content)}\n\n`;

    switch (tag) {
        case 'br':
            return '\n';
        case 'b':
        case 'strong':
            return bold(content);
        case 'i':
        case 'em': {
            const inner = content.trim();
            return inner ? `_${inner}_` : '';
        }
        case 'li':
            return `- ${content.trim()}\n`;
        case 'ul':
        case 'ol':
            return `${content}\n`;
        case 'p':
            return `${content}\n\n`;
        case 'div':
            return `${content}\n`;
        case 'a': {
            const href = node.getAttribute('href');
            const label = content.trim();
            if (!href) return content;
            return label && label !== href ? `<${href}|${label}>` : `<${href}>`;
        }
        default:
            return content;
    }
}

/** Slack wants `*bold*`; the walk emits `**bold**` like a standard converter does. */
function toSlackMarkers(markdown: string): string {
    return markdown.replace(/\*\*/g, '*');
}

function tidy(text: string): string {
    return text
        .replace(/[ \t]+/g, ' ')
        .replace(/ *\n */g, '\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

/** Empty, or nothing but angle brackets (raw or already escaped). */
function isDegenerate(text: string): boolean {
    const trimmed = text.trim();
    return trimmed.length === 0 || /^(?:[<>]|&lt;|&gt;)+$/.test(trimmed);
}

/**
 * Slack mrkdwn rendering. Container tags keep only their text, and literal
 * `&`, `<` and `>` are escaped the way Slack requires outside link markup.
 */
export class MarkdownRenderer implements ContentRenderer {
    readonly format = 'markdown' as const;

    render(html: string): string {
        if (!html || html.trim().length === 0) return '';

        try {
            const result = tidy(toSlackMarkers(renderChildren(parseFragment(html))));
            return isDegenerate(result) ? stripHtmlTags(html) : result;
        } catch {
            return stripHtmlTags(html);
        }
    }
}
