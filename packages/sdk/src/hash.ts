/**
 * URL hash codec
 *
 * Vendors publish prefixes of SHA-256(url + "/"), so the terminator is part
 * of the wire convention and must not change.
 */

import { createHash } from "node:crypto";
import { ConfigurationError } from "./errors.js";

export const HASH_LENGTH = 32;

const URL_TERMINATOR = "/";
const HEX_PATTERN = /^(?:[0-9a-f]{2})+$/i;

/**
 * Hash a url the way vendor prefix feeds do
 */
export function hashUrl(url: string): Buffer {
  return createHash("sha256").update(`${url}${URL_TERMINATOR}`, "utf8").digest();
}

/**
 * First `length` bytes of a hash
 */
export function truncateHash(hash: Uint8Array, length: number): Buffer {
  return Buffer.from(hash.subarray(0, length));
}

/**
 * Check a vendor prefix is usable for matching
 * @throws {ConfigurationError} If the prefix is empty or longer than a full hash
 */
export function validatePrefix(prefix: Uint8Array): void {
  if (prefix.byteLength < 1 || prefix.byteLength > HASH_LENGTH) {
    throw new ConfigurationError(
      `Hash prefix must be 1-${HASH_LENGTH} bytes, got ${prefix.byteLength}`
    );
  }
}

/**
 * Decode a hex-encoded prefix as found in feed files
 * @throws {ConfigurationError} If the text is not 1-32 bytes of hex
 */
export function parsePrefix(text: string): Buffer {
  const trimmed = text.trim();
  if (!HEX_PATTERN.test(trimmed)) {
    throw new ConfigurationError(`Malformed hash prefix "${trimmed}": expected an even number of hex digits`);
  }
  const prefix = Buffer.from(trimmed, "hex");
  validatePrefix(prefix);
  return prefix;
}

/**
 * Hex form of a prefix or hash
 */
export function formatPrefix(prefix: Uint8Array): string {
  return Buffer.from(prefix).toString("hex");
}
