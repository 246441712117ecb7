import bytewordList from "../data/bytewords.json" with { type: "json" };

export const BYTEWORD_COUNT = 256;
export const BYTEWORD_LEN = 4;

const ALPHABET_SIZE = 26;
const CHAR_CODE_A = "a".charCodeAt(0);
const WORD_PATTERN = /^[a-z]{4}$/;

export type WordTable = {
  readonly words: readonly string[];
  /** Indexed by `(last - 'a') * 26 + (first - 'a')`; -1 marks an unused pair. */
  readonly lookup: Int16Array;
};

function letterIndex(ch: string): number | null {
  if (ch.length !== 1) return null;
  const idx = ch.charCodeAt(0) - CHAR_CODE_A;
  return idx >= 0 && idx < ALPHABET_SIZE ? idx : null;
}

function lookupOffset(first: string, last: string): number | null {
  const x = letterIndex(first);
  const y = letterIndex(last);
  if (x === null || y === null) return null;
  return y * ALPHABET_SIZE + x;
}

export function buildWordTable(words: readonly string[]): WordTable {
  if (words.length !== BYTEWORD_COUNT) {
    throw new Error(`word list must have ${BYTEWORD_COUNT} entries, got ${words.length}`);
  }

  const lookup = new Int16Array(ALPHABET_SIZE * ALPHABET_SIZE).fill(-1);
  words.forEach((word, value) => {
    if (!WORD_PATTERN.test(word)) throw new Error(`word ${value} must be 4 lowercase letters, got: ${word}`);
    const offset = lookupOffset(word.charAt(0), word.charAt(BYTEWORD_LEN - 1));
    if (offset === null) throw new Error(`word ${value} is outside a-z: ${word}`);
    const existing = lookup[offset];
    if (existing !== -1) {
      throw new Error(`word ${value} (${word}) shares its first and last letters with word ${existing}`);
    }
    lookup[offset] = value;
  });

  return { words: Object.freeze([...words]), lookup };
}

let defaultTable: WordTable | null = null;

/** The process-wide table, built from the bundled word list on first use. */
export function getWordTable(): WordTable {
  if (defaultTable === null) defaultTable = buildWordTable(bytewordList);
  return defaultTable;
}

function assertByte(value: number): number {
  if (!Number.isInteger(value) || value < 0 || value >= BYTEWORD_COUNT) {
    throw new RangeError(`byte out of range: ${value}`);
  }
  return value;
}

export function wordForByte(value: number, table: WordTable = getWordTable()): string {
  return table.words[assertByte(value)];
}

/** First and last letter of the word for `value`. */
export function minimalWordForByte(value: number, table: WordTable = getWordTable()): string {
  const word = wordForByte(value, table);
  return word.charAt(0) + word.charAt(BYTEWORD_LEN - 1);
}

/** Reverse lookup by first and last letter (lowercase); null when no word matches. */
export function byteForChars(first: string, last: string, table: WordTable = getWordTable()): number | null {
  const offset = lookupOffset(first, last);
  if (offset === null) return null;
  const value = table.lookup[offset];
  return value < 0 ? null : value;
}
