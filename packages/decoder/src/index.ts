/**
 * @flagcraft/decoder
 *
 * Decodes command-line arguments into values of a declared record.
 */

export { parseCharToken, parseFloatToken, parseIntegerToken } from "./convert.js";
export {
  type Decoded,
  decodeFlags,
  type DecodeOptions,
  type DecodeResult,
  safeDecodeFlags,
} from "./decode.js";
export { type DecoderState, FlagDecoder } from "./flag-decoder.js";

export const PACKAGE_NAME = "@flagcraft/decoder" as const;
