/**
 * Immutable pool — hooks and fee method are fixed at registration.
 *
 * Run: npx tsx examples/immutable-pool.ts
 */

import {
	type BeforeSwapAck,
	type BeforeSwapArgs,
	FeeCalculationMethod,
	HOOK_SELECTORS,
	type HookPermissions,
	type PoolKey,
	type SubHook,
	ZERO_BEFORE_SWAP_DELTA,
	address,
	configFromEnv,
	createImmutableAdapter,
	createLogger,
	permissions,
	poolIdOf,
} from "../src/index.js";

const ADAPTER = address("0x00000000000000000000000000000000000ada01");
const POOL_MANAGER = address("0x0000000000000000000000000000000000009a11");
const DEPLOYER = address("0x00000000000000000000000000000000000de910");

/** Quotes a fixed fee; the pool takes the cheapest quote. */
function quoteHook(hookAddress: string, fee: number): SubHook {
	return {
		address: address(hookAddress),
		getHookPermissions: (): HookPermissions =>
			permissions({ beforeSwap: true, beforeSwapReturnDelta: true }),
		beforeSwap: (_args: BeforeSwapArgs): BeforeSwapAck => ({
			selector: HOOK_SELECTORS.beforeSwap,
			delta: ZERO_BEFORE_SWAP_DELTA,
			lpFeeOverride: fee,
		}),
	};
}

const logger = createLogger({ level: "info" });
const created = createImmutableAdapter(
	{ address: ADAPTER, poolManager: POOL_MANAGER, owner: DEPLOYER, ...configFromEnv() },
	{ logger },
);
if (!created.ok) {
	logger.error({ error: created.error.toJSON() }, "adapter config rejected");
	process.exit(1);
}
const adapter = created.value;

const key: PoolKey = {
	currency0: address("0x0000000000000000000000000000000000002000"),
	currency1: address("0x0000000000000000000000000000000000002001"),
	fee: 500,
	tickSpacing: 10,
	hooks: ADAPTER,
};

const registered = adapter.registerHooks(
	DEPLOYER,
	key,
	[
		quoteHook("0x000000000000000000000000000000000000a001", 1200),
		quoteHook("0x000000000000000000000000000000000000a002", 900),
	],
	{ method: FeeCalculationMethod.MinFee },
);
if (!registered.ok) {
	logger.error({ error: registered.error.toJSON() }, "registration failed");
	process.exit(1);
}

const result = adapter.beforeSwap(POOL_MANAGER, {
	sender: DEPLOYER,
	key,
	params: { zeroForOne: false, amountSpecified: 10_000n, sqrtPriceLimitX96: 2n ** 159n },
	hookData: "0x",
});
logger.info({ fee: result.ok ? result.value.fee : null }, "cheapest quote");

const change = adapter.setFeeMethod(DEPLOYER, poolIdOf(key), FeeCalculationMethod.MaxFee);
logger.info({ code: change.ok ? null : change.error.code }, "fee method change attempted");
