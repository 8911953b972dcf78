/**
 * Byte-level decode utilities for DER content octets.
 * Every function reads only the bytes it is given.
 */

import { DecodeErrorCode, TLVDecodeError, captureDecode } from "./errors.js";
import type { DecodeResult } from "./errors.js";

export function toHex(input: Uint8Array, upper = false): string {
  const hex = Array.from(input)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
  return upper ? hex.toUpperCase() : hex;
}

export function fromHex(hexString: string): Uint8Array {
  const clean = hexString.replace(/\s+/g, "");
  if (clean.length % 2 !== 0 || /[^0-9a-fA-F]/.test(clean)) {
    throw new Error(`Invalid hex string of length ${clean.length}`);
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function encodeUtf8(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder("utf-8").decode(bytes);
}

// BMPString is UCS-2 big-endian; a trailing odd byte is ignored.
export function decodeBmpString(bytes: Uint8Array): string {
  let out = "";
  for (let i = 0; i + 1 < bytes.length; i += 2) {
    out += String.fromCharCode((bytes[i] << 8) | bytes[i + 1]);
  }
  return out;
}

/**
 * Two's-complement big-endian INTEGER content as a bigint.
 * Empty content decodes to 0.
 */
export function decodeSignedInteger(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return 0n;
  let n = 0n;
  for (const b of bytes) n = (n << 8n) | BigInt(b);
  return BigInt.asIntN(bytes.length * 8, n);
}

class MalformedOidError extends TLVDecodeError {
  public readonly partial: string;

  constructor(partial: string, index: number) {
    super(
      DecodeErrorCode.MalformedOid,
      `Unterminated OID arc at content byte ${index}`,
      { offset: index },
    );
    this.partial = partial;
  }
}

function decodeOIDStrict(bytes: Uint8Array): string {
  if (bytes.length === 0) return "";
  const arcs: bigint[] = [];
  let i = 0;
  while (i < bytes.length) {
    let val = 0n;
    let b: number;
    do {
      if (i >= bytes.length) {
        throw new MalformedOidError(arcs.join("."), i);
      }
      b = bytes[i++];
      val = (val << 7n) | BigInt(b & 0x7f);
    } while (b & 0x80);
    if (arcs.length > 0) {
      arcs.push(val);
    } else if (val < 80n) {
      // the first sub-identifier packs the first two arcs
      arcs.push(val / 40n, val % 40n);
    } else {
      arcs.push(2n, val - 80n);
    }
  }
  return arcs.join(".");
}

/**
 * Decode OBJECT IDENTIFIER content octets to dotted-decimal text.
 * Fails with MalformedOid when the last arc never terminates.
 */
export function tryDecodeOID(bytes: Uint8Array): DecodeResult<string> {
  return captureDecode(() => decodeOIDStrict(bytes));
}

/**
 * Best-effort variant of {@link tryDecodeOID}: a malformed encoding yields
 * the arcs decoded before the unterminated one.
 */
export function decodeOID(bytes: Uint8Array): string {
  const result = tryDecodeOID(bytes);
  if (result.ok) return result.value;
  return result.error instanceof MalformedOidError ? result.error.partial : "";
}

export function decodeBitStringHex(bytes: Uint8Array): {
  unusedBits: number;
  hex: string;
} {
  const unusedBits = bytes.length > 0 ? bytes[0] : 0;
  const content = bytes.length > 0 ? bytes.subarray(1) : new Uint8Array();
  return { unusedBits, hex: toHex(content) };
}
