/**
 * Acknowledgement selectors — four-byte selectors of the v4 hook interface.
 *
 * A sub-hook acknowledges an event by echoing the selector of that event's
 * function; the adapter returns the same selector to the resource manager.
 */

import { type Selector, functionSelector } from "../lib/ethereum/index.js";
import type { HookEvent } from "./types.js";

const POOL_KEY = "(address,address,uint24,int24,address)";
const MODIFY_LIQUIDITY_PARAMS = "(int24,int24,int256,bytes32)";
const SWAP_PARAMS = "(bool,int256,uint160)";

/** Canonical ABI signature of each lifecycle function. */
export const HOOK_SIGNATURES: Readonly<Record<HookEvent, string>> = {
	beforeInitialize: `beforeInitialize(address,${POOL_KEY},uint160)`,
	afterInitialize: `afterInitialize(address,${POOL_KEY},uint160,int24)`,
	beforeAddLiquidity: `beforeAddLiquidity(address,${POOL_KEY},${MODIFY_LIQUIDITY_PARAMS},bytes)`,
	afterAddLiquidity: `afterAddLiquidity(address,${POOL_KEY},${MODIFY_LIQUIDITY_PARAMS},int256,int256,bytes)`,
	beforeRemoveLiquidity: `beforeRemoveLiquidity(address,${POOL_KEY},${MODIFY_LIQUIDITY_PARAMS},bytes)`,
	afterRemoveLiquidity: `afterRemoveLiquidity(address,${POOL_KEY},${MODIFY_LIQUIDITY_PARAMS},int256,int256,bytes)`,
	beforeSwap: `beforeSwap(address,${POOL_KEY},${SWAP_PARAMS},bytes)`,
	afterSwap: `afterSwap(address,${POOL_KEY},${SWAP_PARAMS},int256,bytes)`,
	beforeDonate: `beforeDonate(address,${POOL_KEY},uint256,uint256,bytes)`,
	afterDonate: `afterDonate(address,${POOL_KEY},uint256,uint256,bytes)`,
};

export const HOOK_SELECTORS: Readonly<Record<HookEvent, Selector>> = Object.freeze({
	beforeInitialize: functionSelector(HOOK_SIGNATURES.beforeInitialize),
	afterInitialize: functionSelector(HOOK_SIGNATURES.afterInitialize),
	beforeAddLiquidity: functionSelector(HOOK_SIGNATURES.beforeAddLiquidity),
	afterAddLiquidity: functionSelector(HOOK_SIGNATURES.afterAddLiquidity),
	beforeRemoveLiquidity: functionSelector(HOOK_SIGNATURES.beforeRemoveLiquidity),
	afterRemoveLiquidity: functionSelector(HOOK_SIGNATURES.afterRemoveLiquidity),
	beforeSwap: functionSelector(HOOK_SIGNATURES.beforeSwap),
	afterSwap: functionSelector(HOOK_SIGNATURES.afterSwap),
	beforeDonate: functionSelector(HOOK_SIGNATURES.beforeDonate),
	afterDonate: functionSelector(HOOK_SIGNATURES.afterDonate),
});

/** Whether `selector` acknowledges `event`. */
export function acknowledges(event: HookEvent, selector: unknown): boolean {
	return typeof selector === "string" && selector.toLowerCase() === HOOK_SELECTORS[event];
}
