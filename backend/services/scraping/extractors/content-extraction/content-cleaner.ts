import type { Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';

/**
 * Clean and normalize extracted content
 */
export function cleanAndNormalizeContent(content: string): string {
  if (!content) return "";

  return content
    // Replace multiple whitespace with single space
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Whitespace-normalized text of a selection (empty string for an empty selection)
 */
export function extractText<T extends AnyNode>(element: Cheerio<T>): string {
  if (element.length === 0) return "";
  return cleanAndNormalizeContent(element.text());
}

/**
 * Join text parts and cut the result to a character limit
 */
export function joinAndTruncate(parts: string[], maxChars: number): string {
  return parts.join(' ').slice(0, maxChars);
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
