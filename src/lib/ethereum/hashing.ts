/**
 * ABI encoding, keccak hashing and selector derivation through viem.
 */

import { encodeAbiParameters, keccak256, parseAbiParameters, toFunctionSelector } from "viem";
import type { Address, Bytes32, Selector } from "./types.js";

const POOL_KEY_PARAMS = parseAbiParameters(
	"address currency0, address currency1, uint24 fee, int24 tickSpacing, address hooks",
);

/** Tuple shape hashed into a pool identifier. */
export interface PoolKeyTuple {
	readonly currency0: Address;
	readonly currency1: Address;
	readonly fee: number;
	readonly tickSpacing: number;
	readonly hooks: Address;
}

/** `keccak256(abi.encode(currency0, currency1, fee, tickSpacing, hooks))`. */
export function hashPoolKey(key: PoolKeyTuple): Bytes32 {
	const encoded = encodeAbiParameters(POOL_KEY_PARAMS, [
		key.currency0,
		key.currency1,
		key.fee,
		key.tickSpacing,
		key.hooks,
	]);
	return keccak256(encoded) as Bytes32;
}

/**
 * Four-byte selector of a canonical function signature.
 * @example functionSelector("transfer(address,uint256)") // "0xa9059cbb"
 */
export function functionSelector(signature: string): Selector {
	return toFunctionSelector(signature) as Selector;
}
