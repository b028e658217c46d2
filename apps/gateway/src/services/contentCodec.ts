// ═══════════════════════════════════════════════════════════════
// Tapgate — Content Codec
// apps/gateway/src/services/contentCodec.ts
//
// Decodes compressed upstream bodies before hooks see them.
// Unknown or absent encodings pass through untouched.
// ═══════════════════════════════════════════════════════════════

import { promisify } from "node:util";
import { brotliDecompress, gunzip, inflate } from "node:zlib";
import { CodecError, describeError } from "../errors";

type Decoder = (input: Buffer) => Promise<Buffer>;

const DECODERS = new Map<string, Decoder>([
  ["gzip", promisify(gunzip)],
  ["x-gzip", promisify(gunzip)],
  ["br", promisify(brotliDecompress)],
  ["deflate", promisify(inflate)],
]);

const IDENTITY = "identity";

/** Split a Content-Encoding value into its codings, in applied order. */
export function parseEncodings(encoding: string | null | undefined): string[] {
  if (!encoding) return [];
  return encoding
    .split(",")
    .map((e) => e.trim().toLowerCase())
    .filter((e) => e.length > 0 && e !== IDENTITY);
}

/** Whether every coding in the header value can be decoded. */
export function isSupportedEncoding(encoding: string | null | undefined): boolean {
  return parseEncodings(encoding).every((e) => DECODERS.has(e));
}

/**
 * Decode `body` according to a Content-Encoding value.
 *
 * Codings are undone last-applied first. If any coding is unknown
 * the body is returned as is. A corrupt payload raises CodecError
 * carrying the original bytes.
 */
export async function decompress(body: Buffer, encoding: string | null | undefined): Promise<Buffer> {
  const codings = parseEncodings(encoding);
  if (codings.length === 0) return body;

  if (!isSupportedEncoding(encoding)) {
    console.log(`[Codec] No decompression for encoding: ${encoding}`);
    return body;
  }

  let output = body;
  for (const coding of [...codings].reverse()) {
    const decode = DECODERS.get(coding);
    if (!decode) return body;
    try {
      output = await decode(output);
    } catch (err) {
      console.error(`[Codec] Failed to decompress ${coding}: ${describeError(err)}`);
      throw new CodecError(`Failed to decompress ${coding} body: ${describeError(err)}`, coding, body);
    }
  }

  console.log(`[Codec] Decompressed ${codings.join(", ")} ${body.length} bytes -> ${output.length} bytes`);
  return output;
}
