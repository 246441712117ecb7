import { isBytewordsStyle, type BytewordsStyle } from "@bytewords/codec";

import { DEFAULT_MAX_INFLATED_BYTES } from "./container.js";

export type AccountExportConfig = {
  style: BytewordsStyle;
  maxInflatedBytes: number;
  debug: boolean;
};

export function parseStyle(raw: string): BytewordsStyle {
  const style = raw.trim().toLowerCase();
  if (!isBytewordsStyle(style)) throw new Error(`invalid bytewords style: ${raw} (allowed: standard, uri, minimal)`);
  return style;
}

export function parseMaxInflatedBytes(raw: string): number {
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n <= 0) throw new Error(`invalid max inflated bytes: ${raw}`);
  return n;
}

function parseFlag(raw: string | undefined): boolean {
  if (raw === undefined) return false;
  const v = raw.trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AccountExportConfig {
  return {
    style: env.BYTEWORDS_STYLE ? parseStyle(env.BYTEWORDS_STYLE) : "minimal",
    maxInflatedBytes: env.BYTEWORDS_MAX_INFLATED_BYTES
      ? parseMaxInflatedBytes(env.BYTEWORDS_MAX_INFLATED_BYTES)
      : DEFAULT_MAX_INFLATED_BYTES,
    debug: parseFlag(env.BYTEWORDS_DEBUG),
  };
}
