const SENTENCE_REGEX = /(?<=[.!?])\s+/;
const HYPHENATED_END = /\p{L}-$/u;
const LOWERCASE_START = /^\p{Ll}/u;

/**
 * Group cleaned lines into paragraphs on blank lines. Words hyphenated
 * across a line break are re-joined; other lines are joined with a space.
 */
export function toParagraphs(lines: readonly string[]): string[] {
  const paragraphs: string[] = [];
  let current = "";

  for (const line of lines) {
    if (line.length === 0) {
      if (current.length > 0) paragraphs.push(current);
      current = "";
      continue;
    }
    if (current.length === 0) {
      current = line;
    } else if (HYPHENATED_END.test(current) && LOWERCASE_START.test(line)) {
      current = current.slice(0, -1) + line;
    } else {
      current = `${current} ${line}`;
    }
  }
  if (current.length > 0) paragraphs.push(current);

  return paragraphs;
}

function words(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/** Break one sentence into runs of at most `maxWords` words. */
function splitWords(sentence: string, maxWords: number): string[] {
  const all = words(sentence);
  const parts: string[] = [];
  for (let i = 0; i < all.length; i += maxWords) {
    parts.push(all.slice(i, i + maxWords).join(" "));
  }
  return parts;
}

/**
 * Pieces of a paragraph that each fit in `maxWords`: the paragraph itself,
 * or its sentences, with oversized sentences broken at word boundaries.
 */
export function splitParagraph(paragraph: string, maxWords: number): string[] {
  if (words(paragraph).length <= maxWords) return [paragraph];

  const pieces: string[] = [];
  for (const sentence of paragraph.split(SENTENCE_REGEX)) {
    if (sentence.trim().length === 0) continue;
    if (words(sentence).length <= maxWords) {
      pieces.push(sentence.trim());
    } else {
      pieces.push(...splitWords(sentence, maxWords));
    }
  }
  return pieces;
}

/** Greedily pack consecutive paragraphs into chunks of at most `maxWords` words. */
export function packParagraphs(paragraphs: readonly string[], maxWords: number): string[] {
  const chunks: string[] = [];
  let current = "";
  let currentWords = 0;

  for (const paragraph of paragraphs) {
    for (const piece of splitParagraph(paragraph, maxWords)) {
      const pieceWords = words(piece).length;
      if (currentWords > 0 && currentWords + pieceWords > maxWords) {
        chunks.push(current);
        current = "";
        currentWords = 0;
      }
      current = currentWords === 0 ? piece : `${current} ${piece}`;
      currentWords += pieceWords;
    }
  }
  if (currentWords > 0) chunks.push(current);

  return chunks;
}
