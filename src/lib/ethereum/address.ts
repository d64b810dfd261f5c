/**
 * Address helpers — validation and checksumming through viem.
 */

import { getAddress, isAddress, zeroAddress } from "viem";
import type { Address } from "./types.js";

/** The null/sentinel address. */
export const ZERO_ADDRESS = zeroAddress as Address;

/**
 * Validate and checksum a raw address string.
 * @throws Error if the value is not a 20-byte hex address
 */
export function toAddress(value: string): Address {
	const trimmed = value.trim();
	if (!isAddress(trimmed, { strict: false })) {
		throw new Error(`Invalid address: ${value}`);
	}
	return getAddress(trimmed) as Address;
}

/** True if `value` parses as a 20-byte hex address (any casing). */
export function isValidAddress(value: string): boolean {
	return isAddress(value.trim(), { strict: false });
}

export function isZeroAddress(value: Address): boolean {
	return value === ZERO_ADDRESS;
}

/** Case-insensitive address comparison. */
export function sameAddress(a: string, b: string): boolean {
	return a.toLowerCase() === b.toLowerCase();
}
