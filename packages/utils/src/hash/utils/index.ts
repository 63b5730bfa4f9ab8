/**
 * Utility functions for hash operations
 */

/**
 * Convert Uint8Array to lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

/**
 * Check that a value looks like a lowercase hex digest of the given length.
 */
export function isHexDigest(value: string, length = 64): boolean {
  return value.length === length && /^[0-9a-f]+$/.test(value);
}
