import { JSDOM } from 'jsdom';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

export function parseFragment(html: string): DocumentFragment {
    return JSDOM.fragment(html);
}

export function isElement(node: Node): node is Element {
    return node.nodeType === ELEMENT_NODE;
}

export function isText(node: Node): boolean {
    return node.nodeType === TEXT_NODE;
}

export function escapeHtmlText(text: string): string {
    return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

const HEADING_TAG = /^h[1-6]$/;

export function isHeading(tag: string): boolean {
    return HEADING_TAG.test(tag);
}
