/**
 * Test fixtures — addresses, pool keys and lifecycle argument builders.
 */

import { ZERO_BALANCE_DELTA } from "../delta/types.js";
import { poolIdOf } from "../hooks/pool-key.js";
import type {
	AfterInitializeArgs,
	AfterModifyLiquidityArgs,
	AfterSwapArgs,
	BeforeInitializeArgs,
	BeforeModifyLiquidityArgs,
	BeforeSwapArgs,
	DonateArgs,
	PoolKey,
} from "../hooks/types.js";
import type { AdapterConfigInput } from "../shared/config.js";
import { type Address, type PoolId, address } from "../shared/identifiers.js";

/** Deterministic address whose low bytes hold `n`. */
export function testAddress(n: number): Address {
	return address(`0x${n.toString(16).padStart(40, "0")}`);
}

export const ADAPTER_ADDRESS = testAddress(0xada);
export const POOL_MANAGER = testAddress(0x9a11);
export const GOVERNANCE_OWNER = testAddress(0x60f);
export const HOOK_MANAGER = testAddress(0x4a9);
export const ROUTER = testAddress(0x7007);
export const ALICE = testAddress(0xa11ce);
export const BOB = testAddress(0xb0b);

/** Raw adapter config wired to the fixture addresses. */
export function adapterConfigInput(overrides: Partial<AdapterConfigInput> = {}): AdapterConfigInput {
	return {
		address: ADAPTER_ADDRESS,
		poolManager: POOL_MANAGER,
		owner: GOVERNANCE_OWNER,
		hookManager: HOOK_MANAGER,
		logLevel: "silent",
		...overrides,
	};
}

/** Pool key on the test adapter; `salt` varies the currencies to get distinct pools. */
export function buildPoolKey(overrides: Partial<PoolKey> = {}, salt = 0): PoolKey {
	return {
		currency0: testAddress(0x1000 + salt * 2),
		currency1: testAddress(0x1001 + salt * 2),
		fee: 3000,
		tickSpacing: 60,
		hooks: ADAPTER_ADDRESS,
		...overrides,
	};
}

export function buildPoolId(overrides: Partial<PoolKey> = {}, salt = 0): PoolId {
	return poolIdOf(buildPoolKey(overrides, salt));
}

export function initializeArgs(key: PoolKey): AfterInitializeArgs {
	return { sender: ROUTER, key, sqrtPriceX96: 79228162514264337593543950336n, tick: 0 };
}

export function beforeInitializeArgs(key: PoolKey): BeforeInitializeArgs {
	return { sender: ROUTER, key, sqrtPriceX96: 79228162514264337593543950336n };
}

export function liquidityArgs(key: PoolKey, liquidityDelta = 1_000n): BeforeModifyLiquidityArgs {
	return {
		sender: ROUTER,
		key,
		params: { tickLower: -120, tickUpper: 120, liquidityDelta, salt: `0x${"00".repeat(32)}` },
		hookData: "0x",
	};
}

export function afterLiquidityArgs(key: PoolKey, liquidityDelta = 1_000n): AfterModifyLiquidityArgs {
	return {
		...liquidityArgs(key, liquidityDelta),
		delta: { amount0: -500n, amount1: -500n },
		feesAccrued: ZERO_BALANCE_DELTA,
	};
}

export function swapArgs(key: PoolKey, amountSpecified = -1_000n): BeforeSwapArgs {
	return {
		sender: ROUTER,
		key,
		params: { zeroForOne: true, amountSpecified, sqrtPriceLimitX96: 4295128740n },
		hookData: "0x",
	};
}

export function afterSwapArgs(key: PoolKey, amountSpecified = -1_000n): AfterSwapArgs {
	return { ...swapArgs(key, amountSpecified), delta: { amount0: -1_000n, amount1: 990n } };
}

export function donateArgs(key: PoolKey): DonateArgs {
	return { sender: ROUTER, key, amount0: 100n, amount1: 200n, hookData: "0x" };
}
