import type { AppConfig } from '../../shared/config';
import { ClassificationError } from './errors';

export type TextLimits = Pick<AppConfig['classification'], 'minTextLength' | 'maxTextLength'>;

/** Strips NUL bytes and collapses whitespace. */
export const sanitizeText = (text: string): string => text.replace(/\0/g, '').replace(/\s+/g, ' ').trim();

const countAlphanumeric = (text: string): number => (text.match(/[\p{L}\p{N}]/gu) ?? []).length;

/**
 * Returns the sanitized text or throws `TooShort` / `TooLong`.
 */
export const validateText = (raw: unknown, limits: TextLimits): string => {
  if (typeof raw !== 'string') {
    throw new ClassificationError('TooShort', 'Text must be a non-empty string');
  }
  const text = sanitizeText(raw);
  if (text.length < limits.minTextLength) {
    throw new ClassificationError('TooShort', `Text must be at least ${limits.minTextLength} characters`);
  }
  if (text.length > limits.maxTextLength) {
    throw new ClassificationError('TooLong', `Text must be at most ${limits.maxTextLength} characters`);
  }
  const required = Math.floor(limits.minTextLength / 2);
  if (countAlphanumeric(text) < required) {
    throw new ClassificationError('TooShort', `Text must contain at least ${required} letters or digits`);
  }
  return text;
};
