/**
 * Permissioned pool — a pool creator composes two sub-hooks behind one adapter.
 *
 * A size-based fee hook and a swap counter are approved by the hook manager,
 * registered by the pool creator, then driven through one swap.
 * Run: npx tsx examples/permissioned-pool.ts
 */

import {
	type AfterSwapAck,
	type AfterSwapArgs,
	type BeforeSwapAck,
	type BeforeSwapArgs,
	FeeCalculationMethod,
	HOOK_SELECTORS,
	type HookPermissions,
	type PoolKey,
	type SubHook,
	ZERO_BEFORE_SWAP_DELTA,
	address,
	createLogger,
	createPermissionedAdapter,
	permissions,
	poolIdOf,
	unwrap,
} from "../src/index.js";

const ADAPTER = address("0x00000000000000000000000000000000000ada00");
const POOL_MANAGER = address("0x0000000000000000000000000000000000009a11");
const GOVERNANCE = address("0x000000000000000000000000000000000000060f");
const CREATOR = address("0x00000000000000000000000000000000000c4ea7");

// ── Sub-hook: charge more on larger swaps ───────────────────────────

class SizeTieredFeeHook implements SubHook {
	readonly address = address("0x0000000000000000000000000000000000000f11");

	getHookPermissions(): HookPermissions {
		return permissions({ beforeSwap: true, beforeSwapReturnDelta: true });
	}

	beforeSwap(args: BeforeSwapArgs): BeforeSwapAck {
		const amount = args.params.amountSpecified;
		const size = amount < 0n ? -amount : amount;
		return {
			selector: HOOK_SELECTORS.beforeSwap,
			delta: ZERO_BEFORE_SWAP_DELTA,
			lpFeeOverride: size > 1_000_000n ? 10_000 : 2_500,
			feeWeight: 2,
		};
	}
}

// ── Sub-hook: count completed swaps ─────────────────────────────────

class SwapCounterHook implements SubHook {
	readonly address = address("0x000000000000000000000000000000000000c047");
	swaps = 0;

	getHookPermissions(): HookPermissions {
		return permissions({ beforeSwap: true, beforeSwapReturnDelta: true, afterSwap: true });
	}

	beforeSwap(_args: BeforeSwapArgs): BeforeSwapAck {
		return {
			selector: HOOK_SELECTORS.beforeSwap,
			delta: ZERO_BEFORE_SWAP_DELTA,
			lpFeeOverride: 500,
		};
	}

	afterSwap(_args: AfterSwapArgs): AfterSwapAck {
		this.swaps++;
		return { selector: HOOK_SELECTORS.afterSwap, delta: 0n };
	}
}

// ── Wiring ──────────────────────────────────────────────────────────

const logger = createLogger({ level: "info" });
const adapter = unwrap(
	createPermissionedAdapter(
		{ address: ADAPTER, poolManager: POOL_MANAGER, owner: GOVERNANCE },
		{ logger },
	),
);

adapter.events.on("hooksRegistered", (e) => {
	logger.info({ poolId: e.poolId, hooks: e.current }, "pool hooks now");
});

const sizeFee = new SizeTieredFeeHook();
const counter = new SwapCounterHook();
// The hook manager defaults to the global owner.
unwrap(adapter.approveHooks(GOVERNANCE, [sizeFee.address, counter.address]));

const key: PoolKey = {
	currency0: address("0x0000000000000000000000000000000000001000"),
	currency1: address("0x0000000000000000000000000000000000001001"),
	fee: 3000,
	tickSpacing: 60,
	hooks: ADAPTER,
};
unwrap(
	adapter.registerHooks(CREATOR, key, [sizeFee, counter], {
		method: FeeCalculationMethod.WeightedAverage,
	}),
);

const swap: BeforeSwapArgs = {
	sender: CREATOR,
	key,
	params: { zeroForOne: true, amountSpecified: -5_000_000n, sqrtPriceLimitX96: 4295128740n },
	hookData: "0x",
};
const quoted = unwrap(adapter.beforeSwap(POOL_MANAGER, swap));
// (10_000 * 2 + 500 * 1) / 3
logger.info({ fee: quoted.fee }, "swap fee resolved");

const settled = { ...swap, delta: { amount0: -5_000_000n, amount1: 4_900_000n } };
unwrap(adapter.afterSwap(POOL_MANAGER, settled));
logger.info({ swaps: counter.swaps, owner: adapter.poolOwner(poolIdOf(key)) }, "swap settled");
