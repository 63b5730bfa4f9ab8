/**
 * Async SHA-256 hash function
 *
 * Uses the Web Crypto API, which Node.js exposes on `globalThis.crypto`.
 */

import { bytesToHex } from "../utils/index.js";

const encoder = new TextEncoder();

/**
 * Check if Web Crypto API is available
 */
function hasWebCrypto(): boolean {
  return (
    typeof globalThis !== "undefined" &&
    typeof globalThis.crypto !== "undefined" &&
    typeof globalThis.crypto.subtle !== "undefined" &&
    typeof globalThis.crypto.subtle.digest === "function"
  );
}

/**
 * Compute SHA-256 hash of data
 *
 * @param data Data to hash
 * @returns Promise resolving to 32-byte SHA-256 hash
 *
 * @example
 * ```typescript
 * const hash = await sha256(new TextEncoder().encode("hello"));
 * // hash is Uint8Array(32)
 * ```
 */
export async function sha256(data: Uint8Array): Promise<Uint8Array> {
  if (!hasWebCrypto()) {
    throw new Error("SHA-256 requires the Web Crypto API (globalThis.crypto.subtle)");
  }
  let buffer = data.buffer;
  if (data.byteOffset !== 0 || data.byteLength !== data.buffer.byteLength) {
    buffer = data.buffer.slice(data.byteOffset, data.byteOffset + data.byteLength);
  }
  const hashBuffer = await globalThis.crypto.subtle.digest("SHA-256", buffer as ArrayBuffer);
  return new Uint8Array(hashBuffer);
}

/**
 * Hash a UTF-8 string and return the digest as lowercase hex (64 characters).
 */
export async function sha256Hex(content: string | Uint8Array): Promise<string> {
  const data = typeof content === "string" ? encoder.encode(content) : content;
  return bytesToHex(await sha256(data));
}
