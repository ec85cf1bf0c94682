/**
 * InputTooShortError
 *
 * The document is empty or has fewer words than the profile requires.
 * Raised before any oracle call.
 */
export class InputTooShortError extends Error {
  readonly wordCount: number;
  readonly minWords: number;

  constructor(wordCount: number, minWords: number) {
    super(
      wordCount === 0
        ? 'Document is empty'
        : `Document has ${wordCount} words, at least ${minWords} required`,
    );
    this.name = 'InputTooShortError';
    this.wordCount = wordCount;
    this.minWords = minWords;
  }
}
