export { countWords, validateDocument } from './document-validator';
export { InputTooShortError } from './input-too-short-error';
