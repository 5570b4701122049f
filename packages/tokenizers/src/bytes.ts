/**
 * Conversions between text, byte arrays and byte strings.
 */
import type { ByteString } from "@ranktok/core";

const textEncoder = new TextEncoder();

/** UTF-8 encode `text` into a byte string. */
export function utf8ByteString(text: string): ByteString {
  // ASCII fast path: the text already is its own byte string.
  let ascii = true;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0x7f) {
      ascii = false;
      break;
    }
  }
  if (ascii) return text;
  return bytesToByteString(textEncoder.encode(text));
}

export function bytesToByteString(bytes: Uint8Array): ByteString {
  let out = "";
  // Chunked to stay under the argument limit of String.fromCharCode.
  for (let i = 0; i < bytes.length; i += 8192) {
    out += String.fromCharCode(...bytes.subarray(i, i + 8192));
  }
  return out;
}

export function byteStringToBytes(key: ByteString): Uint8Array {
  const out = new Uint8Array(key.length);
  for (let i = 0; i < key.length; i++) out[i] = key.charCodeAt(i);
  return out;
}

/** True when every code unit fits in a byte. */
export function isByteString(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    if (value.charCodeAt(i) > 0xff) return false;
  }
  return true;
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const p of parts) total += p.length;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}
