import { Command, InvalidArgumentError } from "commander";

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

import { decodeBytewords, encodeBytewords, isBytewordsDecodeError, type BytewordsStyle } from "@bytewords/codec";

import { loadConfig, parseMaxInflatedBytes, parseStyle } from "./config.js";
import { decodeAccountExport } from "./decode.js";
import { isAccountExportError } from "./errors.js";

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function styleArg(val: string): BytewordsStyle {
  try {
    return parseStyle(val);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

function maxInflatedBytesArg(val: string): number {
  try {
    return parseMaxInflatedBytes(val);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

function hexArg(val: string): Uint8Array {
  try {
    return hexToBytes(val.trim());
  } catch (err) {
    throw new InvalidArgumentError(`invalid hex: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function describeError(err: unknown): string {
  if (isBytewordsDecodeError(err) || isAccountExportError(err)) return `${err.name} [${err.kind}]: ${err.message}`;
  return err instanceof Error ? err.message : String(err);
}

/**
 * Build the `bytewords-export` program. `exitOverride` makes commander throw
 * instead of exiting, for callers that embed the CLI.
 */
export function createCli(opts: { io?: CliIo; env?: NodeJS.ProcessEnv; exitOverride?: boolean } = {}): Command {
  const io = opts.io ?? consoleIo;
  const env = opts.env ?? process.env;

  const program = new Command()
    .name("bytewords-export")
    .description("Decode and encode bytewords account exports.")
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });
  // Subcommands copy this setting when they are created.
  if (opts.exitOverride) program.exitOverride();

  program
    .command("decode")
    .description("Decode an account export and print it as JSON")
    .argument("<input>", "bytewords text")
    .option("-s, --style <style>", "standard | uri | minimal (default: BYTEWORDS_STYLE or minimal)", styleArg)
    .option("--max-inflated-bytes <n>", "cap on the decompressed payload size", maxInflatedBytesArg)
    .option("--debug", "print pipeline steps to stderr")
    .action((input: string, flags: { style?: BytewordsStyle; maxInflatedBytes?: number; debug?: boolean }) => {
      const config = loadConfig(env);
      const record = decodeAccountExport(input.trim(), {
        style: flags.style ?? config.style,
        maxInflatedBytes: flags.maxInflatedBytes ?? config.maxInflatedBytes,
        debug: flags.debug ?? config.debug,
        log: (line) => io.err(line),
      });
      io.out(JSON.stringify(record, null, 2));
    });

  program
    .command("decode-raw")
    .description("Decode bytewords text and print the body as hex")
    .argument("<input>", "bytewords text")
    .option("-s, --style <style>", "standard | uri | minimal (default: BYTEWORDS_STYLE or minimal)", styleArg)
    .action((input: string, flags: { style?: BytewordsStyle }) => {
      const config = loadConfig(env);
      io.out(bytesToHex(decodeBytewords(input.trim(), flags.style ?? config.style)));
    });

  program
    .command("encode")
    .description("Encode raw bytes as bytewords")
    .argument("<hex>", "bytes to encode, as hex", hexArg)
    .option("-s, --style <style>", "standard | uri | minimal (default: BYTEWORDS_STYLE or minimal)", styleArg)
    .action((bytes: Uint8Array, flags: { style?: BytewordsStyle }) => {
      const config = loadConfig(env);
      io.out(encodeBytewords(bytes, flags.style ?? config.style));
    });

  return program;
}
