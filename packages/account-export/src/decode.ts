import { decodeBytewords, encodeBytewords, type BytewordsStyle } from "@bytewords/codec";

import { unwrapContainer, wrapContainer, type UnwrapContainerOptions } from "./container.js";
import { accountExportToTree, mapAccountExport } from "./records.js";
import type { AccountExport } from "./types.js";

export type DecodeAccountExportOptions = UnwrapContainerOptions & {
  style?: BytewordsStyle;
};

/**
 * Decode a bytewords-encoded account export.
 *
 * Throws `BytewordsDecodeError` for text or checksum problems and
 * `AccountExportError` for container or schema problems. Nothing partial is returned.
 */
export function decodeAccountExport(input: string, opts: DecodeAccountExportOptions = {}): AccountExport {
  const style = opts.style ?? "minimal";
  const debug = Boolean(opts.debug);
  const log = opts.log ?? ((line) => console.debug(line));

  const body = decodeBytewords(input, style);
  if (debug) log(`[account-export] bytewords (${style}): ${body.length} body bytes`);

  const tree = unwrapContainer(body, { maxInflatedBytes: opts.maxInflatedBytes, debug, log });
  const record = mapAccountExport(tree);
  if (debug) log(`[account-export] version ${record.version}, ${record.accounts.length} account(s)`);
  return record;
}

export function encodeAccountExport(record: AccountExport, opts: { style?: BytewordsStyle } = {}): string {
  return encodeBytewords(wrapContainer(accountExportToTree(record)), opts.style ?? "minimal");
}
