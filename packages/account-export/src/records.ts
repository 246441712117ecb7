import {
  assertArray,
  assertBoolean,
  assertInteger,
  assertString,
  assertStringOrBytes,
  elementAt,
} from "./internal/util.js";
import type { Account, AccountExport, ValueTree, WalletInfo } from "./types.js";

// Positional layout of the export. Trailing extra elements are ignored.
//   root:    [version, accounts[]]
//   account: [id, index, type, block, wallet]
//   wallet:  [derivationPath, chainCode, name, flagA, flagB, opaque, xpub]

function mapWalletInfo(val: unknown, field: string): WalletInfo {
  const arr = assertArray(val, field);
  return Object.freeze({
    derivationPath: assertString(elementAt(arr, 0, `${field}.derivationPath`), `${field}.derivationPath`),
    chainCode: assertString(elementAt(arr, 1, `${field}.chainCode`), `${field}.chainCode`),
    name: assertString(elementAt(arr, 2, `${field}.name`), `${field}.name`),
    flagA: assertBoolean(elementAt(arr, 3, `${field}.flagA`), `${field}.flagA`),
    flagB: assertBoolean(elementAt(arr, 4, `${field}.flagB`), `${field}.flagB`),
    opaque: assertStringOrBytes(elementAt(arr, 5, `${field}.opaque`), `${field}.opaque`),
    xpub: assertString(elementAt(arr, 6, `${field}.xpub`), `${field}.xpub`),
  });
}

function mapAccount(val: unknown, field: string): Account {
  const arr = assertArray(val, field);
  return Object.freeze({
    id: assertInteger(elementAt(arr, 0, `${field}.id`), `${field}.id`),
    index: assertInteger(elementAt(arr, 1, `${field}.index`), `${field}.index`),
    type: assertString(elementAt(arr, 2, `${field}.type`), `${field}.type`),
    block: assertInteger(elementAt(arr, 3, `${field}.block`), `${field}.block`),
    wallet: mapWalletInfo(elementAt(arr, 4, `${field}.wallet`), `${field}.wallet`),
  });
}

/** Map a decoded value tree onto typed records; throws `schema-mismatch` on any deviation. */
export function mapAccountExport(tree: ValueTree): AccountExport {
  const root = assertArray(tree, "root");
  const version = assertInteger(elementAt(root, 0, "version"), "version");
  const entries = assertArray(elementAt(root, 1, "accounts"), "accounts");
  const accounts = entries.map((entry, i) => mapAccount(entry, `accounts[${i}]`));
  return Object.freeze({ version, accounts: Object.freeze(accounts) });
}

export function accountExportToTree(record: AccountExport): ValueTree {
  return [
    record.version,
    record.accounts.map((account) => [
      account.id,
      account.index,
      account.type,
      account.block,
      [
        account.wallet.derivationPath,
        account.wallet.chainCode,
        account.wallet.name,
        account.wallet.flagA,
        account.wallet.flagB,
        account.wallet.opaque,
        account.wallet.xpub,
      ],
    ]),
  ];
}
