export type AccountExportErrorKind = "container-decode" | "schema-mismatch";

export class AccountExportError extends Error {
  readonly kind: AccountExportErrorKind;
  /** Field path of a schema mismatch, e.g. `accounts[0].wallet.name`. */
  readonly path: string | null;

  constructor(kind: AccountExportErrorKind, message: string, opts: { path?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "AccountExportError";
    this.kind = kind;
    this.path = opts.path ?? null;
  }
}

export function isAccountExportError(err: unknown): err is AccountExportError {
  return err instanceof AccountExportError;
}

export function containerError(message: string, cause?: unknown): AccountExportError {
  return new AccountExportError("container-decode", message, { cause });
}

export function schemaError(path: string, message: string): AccountExportError {
  return new AccountExportError("schema-mismatch", `${path} ${message}`, { path });
}
