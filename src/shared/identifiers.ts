/**
 * Domain identifiers — branded types for compile-time safety.
 *
 * A PoolId is only produced by hashing a PoolKey or by validating a 32-byte
 * hex string, so a raw address can never be passed where a pool is expected.
 */

import { type Address, type Bytes32, toAddress } from "../lib/ethereum/index.js";

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

export type { Address };

/** Opaque pool identifier: keccak256 of the encoded pool key. */
export type PoolId = Brand<Bytes32, "PoolId">;

const BYTES32_RE = /^0x[0-9a-fA-F]{64}$/;

/** Validate a 32-byte hex string as a PoolId. Throws if malformed. */
export function poolId(value: string): PoolId {
	const trimmed = value.trim();
	if (!BYTES32_RE.test(trimmed)) {
		throw new Error(`PoolId must be 32-byte hex, got: ${value}`);
	}
	return trimmed.toLowerCase() as PoolId;
}

/** Validate and checksum an address. Throws if malformed. */
export function address(value: string): Address {
	return toAddress(value);
}
