export type BytewordsDecodeErrorKind =
  | "malformed-token"
  | "unknown-word"
  | "corrupt-word"
  | "too-short"
  | "checksum-mismatch";

/**
 * Raised by {@link decodeBytewords}. `position` is the zero-based index of the
 * offending token, or null when the failure concerns the payload as a whole.
 */
export class BytewordsDecodeError extends Error {
  readonly kind: BytewordsDecodeErrorKind;
  readonly position: number | null;

  constructor(kind: BytewordsDecodeErrorKind, message: string, opts: { position?: number } = {}) {
    super(message);
    this.name = "BytewordsDecodeError";
    this.kind = kind;
    this.position = opts.position ?? null;
  }
}

export function isBytewordsDecodeError(err: unknown): err is BytewordsDecodeError {
  return err instanceof BytewordsDecodeError;
}
