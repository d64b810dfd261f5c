/**
 * Pool keys — identifier derivation and LP fee flag handling.
 */

import { addressSchema, hashPoolKey } from "../lib/ethereum/index.js";
import type { __brand } from "../lib/ethereum/types.js";
import { type ValidationError, validate, z } from "../lib/validation/index.js";
import type { PoolId } from "../shared/identifiers.js";
import { type Result, map } from "../shared/result.js";
import type { PoolKey } from "./types.js";

/** Pool fee marker: the LP fee is supplied by the hook on every swap. */
export const DYNAMIC_FEE_FLAG = 0x800000;

/** Set on a fee returned from beforeSwap to make the resource manager apply it. */
export const OVERRIDE_FEE_FLAG = 0x400000;

const MAX_UINT24 = 0xffffff;
const MIN_INT24 = -0x800000;
const MAX_INT24 = 0x7fffff;

export const poolKeySchema = z.object({
	currency0: addressSchema,
	currency1: addressSchema,
	fee: z.number().int().min(0).max(MAX_UINT24),
	tickSpacing: z.number().int().min(MIN_INT24).max(MAX_INT24),
	hooks: addressSchema,
});

/** Opaque identifier of a pool: keccak256 of its ABI-encoded key. */
export function poolIdOf(key: PoolKey): PoolId {
	return hashPoolKey(key) as PoolId;
}

/**
 * Like `poolIdOf`, for keys from outside the process.
 * Fails when a field does not fit its ABI slot (uint24 fee, int24 tick spacing, address).
 */
export function validatePoolKey(key: unknown): Result<PoolId, ValidationError> {
	return map(validate(poolKeySchema, key, "pool key"), poolIdOf);
}

export function isDynamicFee(fee: number): boolean {
	return fee === DYNAMIC_FEE_FLAG;
}

export function withOverrideFlag(fee: number): number {
	return fee | OVERRIDE_FEE_FLAG;
}

/**
 * Fee value of an override, without the flag bit.
 * Values outside uint24 come back unchanged so fee validation still rejects them.
 */
export function stripOverrideFlag(fee: number): number {
	if (!Number.isInteger(fee) || fee < 0 || fee > MAX_UINT24) return fee;
	return (fee & OVERRIDE_FEE_FLAG) !== 0 ? fee - OVERRIDE_FEE_FLAG : fee;
}
