/**
 * Untyped result of decoding a CBOR item with maps enabled: numbers, bigints,
 * strings, booleans, null/undefined, `Uint8Array` byte strings, arrays and `Map`s.
 */
export type ValueTree = unknown;

export type WalletInfo = {
  readonly derivationPath: string;
  readonly chainCode: string;
  readonly name: string;
  readonly flagA: boolean;
  readonly flagB: boolean;
  /** Text as exported, or standard base64 when the export carried a byte string. */
  readonly opaque: string;
  readonly xpub: string;
};

export type Account = {
  readonly id: number;
  readonly index: number;
  readonly type: string;
  readonly block: number;
  readonly wallet: WalletInfo;
};

export type AccountExport = {
  readonly version: number;
  /** In the order the exporting wallet listed them. */
  readonly accounts: readonly Account[];
};
