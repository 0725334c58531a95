import { createHash, randomUUID } from 'node:crypto';

export const randomId = (): string => randomUUID();

export const sha256Hex = (value: string): string => createHash('sha256').update(value, 'utf8').digest('hex');

/**
 * Canonical form used for content identity: NFKC, lower-cased, whitespace collapsed.
 */
export const normalizeForIdentity = (text: string): string =>
  text.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();

export const contentId = (text: string): string => sha256Hex(normalizeForIdentity(text)).slice(0, 16);
