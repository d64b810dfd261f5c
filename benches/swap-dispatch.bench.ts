import { bench, describe } from "vitest";
import { createPermissionedAdapter } from "../src/adapter/factory.js";
import { silentLogger } from "../src/lib/logger/index.js";
import { unwrap } from "../src/shared/result.js";
import {
	ALICE,
	HOOK_MANAGER,
	MockSubHook,
	POOL_MANAGER,
	adapterConfigInput,
	afterSwapArgs,
	buildPoolKey,
	swapArgs,
	testAddress,
} from "../src/testing/index.js";

describe("swap dispatch", () => {
	const key = buildPoolKey();
	const before = swapArgs(key);
	const after = afterSwapArgs(key);

	const adapterWith = (count: number) => {
		const adapter = unwrap(createPermissionedAdapter(adapterConfigInput(), { logger: silentLogger() }));
		const hooks = Array.from({ length: count }, (_, i) =>
			MockSubHook.create(testAddress(i + 1), {
				beforeSwap: true,
				beforeSwapReturnDelta: true,
				afterSwap: true,
			}).returnBeforeSwap({ lpFeeOverride: 1000 + i * 100, feeWeight: i + 1 }),
		);
		unwrap(adapter.approveHooks(HOOK_MANAGER, hooks.map((h) => h.address)));
		unwrap(adapter.registerHooks(ALICE, key, hooks));
		return adapter;
	};

	for (const count of [1, 4, 16]) {
		const adapter = adapterWith(count);
		bench(`beforeSwap + afterSwap with ${count} hooks 100x`, () => {
			for (let i = 0; i < 100; i++) {
				adapter.beforeSwap(POOL_MANAGER, before);
				adapter.afterSwap(POOL_MANAGER, after);
			}
		});
	}
});
