const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F]/g;
const REPEATED_PUNCTUATION = /([^\p{L}\p{N}\s])\1{2,}/gu;
const ISOLATED_SYMBOL = /(?<=^|\s)[^\p{L}\p{N}\s](?=\s|$)/gu;
// Single letters standing alone are OCR specks, except real one-letter words.
const ISOLATED_LETTER = /(?<=^|\s)(?![aAI](?=\s|$))\p{L}(?=\s|$)/gu;
const PAGE_NUMBER_LINE = /^(?:page\s*)?\d{1,4}(?:\s*(?:of|\/)\s*\d{1,4})?$/i;
const LETTER = /\p{L}/gu;
const NON_WHITESPACE = /\S/g;

/**
 * Normalize a single OCR line: unicode compatibility forms, control
 * characters, runs of repeated punctuation and isolated noise characters.
 */
export function cleanLine(line: string): string {
  return line
    .normalize("NFKC")
    .replace(/\t/g, " ")
    .replace(CONTROL_CHARS, "")
    .replace(REPEATED_PUNCTUATION, "$1")
    .replace(ISOLATED_SYMBOL, "")
    .replace(ISOLATED_LETTER, "")
    .replace(/\s+/g, " ")
    .trim();
}

/** `12`, `Page 3`, `Page 3 of 9`, `3/9` once cleaned. */
export function isPageNumberLine(line: string): boolean {
  return PAGE_NUMBER_LINE.test(line);
}

/** Lowercased and whitespace-collapsed; the basis of every content hash. */
export function normalizeForHash(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/** Letters divided by non-whitespace characters; 0 for blank text. */
export function alphaRatio(text: string): number {
  const visible = text.match(NON_WHITESPACE)?.length ?? 0;
  if (visible === 0) return 0;
  const letters = text.match(LETTER)?.length ?? 0;
  return letters / visible;
}
