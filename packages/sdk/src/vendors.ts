/**
 * Closed enumeration of verification vendors and the status column each one owns
 */

import { ConfigurationError } from "./errors.js";

export const VENDORS = ["Google", "Yandex"] as const;

export type Vendor = (typeof VENDORS)[number];

/**
 * Shard column holding the last time each vendor confirmed a url malicious
 */
export const MALICIOUS_COLUMNS = {
  Google: "last_google_malicious",
  Yandex: "last_yandex_malicious",
} as const satisfies Record<Vendor, string>;

export type MaliciousColumn = (typeof MALICIOUS_COLUMNS)[Vendor];

export function isVendor(value: unknown): value is Vendor {
  return VENDORS.some((vendor) => vendor === value);
}

/**
 * Resolve a vendor name, case-insensitively
 * @throws {ConfigurationError} If the name is not a known vendor
 */
export function parseVendor(value: string): Vendor {
  const match = VENDORS.find((vendor) => vendor.toLowerCase() === value.trim().toLowerCase());
  if (!match) {
    throw new ConfigurationError(
      `Unknown vendor "${value}"; expected one of: ${VENDORS.join(", ")}`
    );
  }
  return match;
}

/**
 * Narrow a runtime value to a Vendor before any write
 * @throws {ConfigurationError} If the value is not a known vendor
 */
export function assertVendor(value: unknown): asserts value is Vendor {
  if (!isVendor(value)) {
    throw new ConfigurationError(
      `Unknown vendor "${String(value)}"; expected one of: ${VENDORS.join(", ")}`
    );
  }
}

/**
 * Build a value for every vendor
 */
export function vendorRecord<T>(fn: (vendor: Vendor) => T): Record<Vendor, T> {
  return { Google: fn("Google"), Yandex: fn("Yandex") };
}
