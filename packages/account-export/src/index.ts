export { loadConfig, parseMaxInflatedBytes, parseStyle, type AccountExportConfig } from "./config.js";
export {
  DEFAULT_MAX_INFLATED_BYTES,
  unwrapContainer,
  wrapContainer,
  type UnwrapContainerOptions,
} from "./container.js";
export { decodeAccountExport, encodeAccountExport, type DecodeAccountExportOptions } from "./decode.js";
export { AccountExportError, isAccountExportError, type AccountExportErrorKind } from "./errors.js";
export { createCli, describeError, type CliIo } from "./program.js";
export { accountExportToTree, mapAccountExport } from "./records.js";
export type { Account, AccountExport, ValueTree, WalletInfo } from "./types.js";
