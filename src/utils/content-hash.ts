import { createHash } from 'node:crypto';
import type { ContentHash } from '../types/delivery.js';

/** SHA-256 of the UTF-8 content as 64 lowercase hex characters. */
export function computeContentHash(content: string): ContentHash {
    return createHash('sha256').update(content, 'utf8').digest('hex');
}
