import type { AccountExport } from "../src/types.js";

// [1, [[1, 0, "abc", 0, ["m/0", "cc==", "name", true, false, "bytes", "xpub..."]]]]
// as CBOR, gzipped, wrapped in a CBOR byte string, then bytewords-encoded.
export const SAMPLE_EXPORT_MINIMAL =
  "hdfmctluayaeaeaeaeaeaozmjeidjzjzihiefdglgsgeiyisgwtotlemfdgaglrpregtsogrsfgtzczsdaecptprdkreetryoenbeegagwgwbsaevsyafebadraeaeaecpmtwkcy";

export const SAMPLE_EXPORT_STANDARD =
  "hard film cost luau away able able able able able also zoom jade iced jazz jazz inch idle fund girl gems game inky iris glow taco toil exam fund gala girl ramp race gift solo gear surf gift zinc zaps data epic part purr dark race exit ruby oboe numb edge gala glow glow bias able vows yoga free beta door able able able cusp mint work city";

export const SAMPLE_EXPORT: AccountExport = {
  version: 1,
  accounts: [
    {
      id: 1,
      index: 0,
      type: "abc",
      block: 0,
      wallet: {
        derivationPath: "m/0",
        chainCode: "cc==",
        name: "name",
        flagA: true,
        flagB: false,
        opaque: "bytes",
        xpub: "xpub...",
      },
    },
  ],
};

export function sampleTree(): unknown[] {
  return [1, [[1, 0, "abc", 0, ["m/0", "cc==", "name", true, false, "bytes", "xpub..."]]]];
}
