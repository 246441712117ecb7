import { appendChecksum, CHECKSUM_LEN, verifyChecksum } from "./checksum.js";
import { BytewordsDecodeError } from "./errors.js";
import { BYTEWORD_LEN, byteForChars, getWordTable, minimalWordForByte, wordForByte, type WordTable } from "./words.js";

export type BytewordsStyle = "standard" | "uri" | "minimal";

export const BYTEWORDS_STYLES: readonly BytewordsStyle[] = ["standard", "uri", "minimal"];

type StyleLayout = { wordLen: 2 | 4; separator: string };

const STYLE_LAYOUTS: Record<BytewordsStyle, StyleLayout> = {
  standard: { wordLen: BYTEWORD_LEN, separator: " " },
  uri: { wordLen: BYTEWORD_LEN, separator: "-" },
  minimal: { wordLen: 2, separator: "" },
};

const MIN_PAYLOAD_LEN = CHECKSUM_LEN + 1;
const LETTERS_PATTERN = /^[A-Za-z]+$/;

export function isBytewordsStyle(value: string): value is BytewordsStyle {
  return Object.prototype.hasOwnProperty.call(STYLE_LAYOUTS, value);
}

export function encodeBytewords(body: Uint8Array, style: BytewordsStyle = "minimal"): string {
  const { wordLen, separator } = STYLE_LAYOUTS[style];
  const table = getWordTable();
  const words: string[] = [];
  for (const b of appendChecksum(body)) {
    words.push(wordLen === 2 ? minimalWordForByte(b, table) : wordForByte(b, table));
  }
  return words.join(separator);
}

function tokenize(input: string, layout: StyleLayout): string[] {
  if (layout.separator.length > 0) return input.split(layout.separator);

  if (input.length % layout.wordLen !== 0) {
    throw new BytewordsDecodeError(
      "malformed-token",
      `minimal bytewords must have even length, got ${input.length} characters`,
      { position: Math.floor(input.length / layout.wordLen) },
    );
  }
  const tokens: string[] = [];
  for (let i = 0; i < input.length; i += layout.wordLen) tokens.push(input.slice(i, i + layout.wordLen));
  return tokens;
}

function decodeToken(token: string, position: number, layout: StyleLayout, table: WordTable): number {
  if (token.length !== layout.wordLen) {
    throw new BytewordsDecodeError(
      "malformed-token",
      `token ${position}: expected ${layout.wordLen} characters, got ${token.length}`,
      { position },
    );
  }
  if (!LETTERS_PATTERN.test(token)) {
    throw new BytewordsDecodeError("malformed-token", `token ${position}: invalid characters in "${token}"`, {
      position,
    });
  }

  const word = token.toLowerCase();
  const value = byteForChars(word.charAt(0), word.charAt(word.length - 1), table);
  if (value === null) {
    throw new BytewordsDecodeError("unknown-word", `token ${position}: "${token}" is not a byteword`, { position });
  }
  if (layout.wordLen === BYTEWORD_LEN && word !== wordForByte(value, table)) {
    throw new BytewordsDecodeError(
      "corrupt-word",
      `token ${position}: "${token}" does not match "${wordForByte(value, table)}"`,
      { position },
    );
  }
  return value;
}

/** Decode a bytewords string and strip its checksum. */
export function decodeBytewords(input: string, style: BytewordsStyle = "minimal"): Uint8Array {
  const layout = STYLE_LAYOUTS[style];
  const table = getWordTable();

  const tokens = tokenize(input, layout);
  const payload = new Uint8Array(tokens.length);
  tokens.forEach((token, position) => {
    payload[position] = decodeToken(token, position, layout, table);
  });

  if (payload.length < MIN_PAYLOAD_LEN) {
    throw new BytewordsDecodeError(
      "too-short",
      `bytewords payload must be at least ${MIN_PAYLOAD_LEN} bytes, got ${payload.length}`,
    );
  }

  const body = payload.slice(0, payload.length - CHECKSUM_LEN);
  const checksum = payload.subarray(payload.length - CHECKSUM_LEN);
  if (!verifyChecksum(body, checksum)) {
    throw new BytewordsDecodeError("checksum-mismatch", "bytewords checksum mismatch");
  }
  return body;
}
