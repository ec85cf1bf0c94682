import { InputTooShortError } from './input-too-short-error';

/**
 * Number of whitespace-separated words
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

/**
 * @returns The document's word count
 * @throws {InputTooShortError} When the document is empty or shorter than `minWords`
 */
export function validateDocument(text: string, minWords: number): number {
  const wordCount = countWords(text);
  if (wordCount === 0 || wordCount < minWords) {
    throw new InputTooShortError(wordCount, minWords);
  }
  return wordCount;
}
