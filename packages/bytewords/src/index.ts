export { appendChecksum, CHECKSUM_LEN, computeChecksum, crc32, verifyChecksum } from "./checksum.js";
export { BYTEWORDS_STYLES, decodeBytewords, encodeBytewords, isBytewordsStyle, type BytewordsStyle } from "./codec.js";
export { BytewordsDecodeError, isBytewordsDecodeError, type BytewordsDecodeErrorKind } from "./errors.js";
export {
  BYTEWORD_COUNT,
  BYTEWORD_LEN,
  buildWordTable,
  byteForChars,
  getWordTable,
  minimalWordForByte,
  wordForByte,
  type WordTable,
} from "./words.js";
