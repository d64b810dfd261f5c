import { describe, expect, it } from "vitest";
import {
	ALL_HOOK_FLAGS,
	ALL_PERMISSIONS,
	HookFlag,
	NO_PERMISSIONS,
	decodeFlags,
	encodePermissions,
	hasFlag,
	permissions,
	validatePermissions,
} from "./permissions.js";
import { HOOK_SELECTORS } from "./selectors.js";
import type { SubHookHandlers } from "./types.js";

describe("permission encoding", () => {
	it("encodes nothing as zero and everything as the full mask", () => {
		expect(encodePermissions(NO_PERMISSIONS)).toBe(0);
		expect(encodePermissions(ALL_PERMISSIONS)).toBe(ALL_HOOK_FLAGS);
		expect(ALL_HOOK_FLAGS).toBe(0x3fff);
	});

	it("uses the address-encoding bit positions", () => {
		expect(encodePermissions(permissions({ beforeInitialize: true }))).toBe(1 << 13);
		expect(encodePermissions(permissions({ beforeSwap: true, afterSwap: true }))).toBe(0xc0);
		expect(encodePermissions(permissions({ afterRemoveLiquidityReturnDelta: true }))).toBe(1);
	});

	it("decodeFlags inverts encodePermissions", () => {
		const p = permissions({ beforeSwap: true, beforeSwapReturnDelta: true, afterDonate: true });
		expect(decodeFlags(encodePermissions(p))).toEqual(p);
	});

	it("hasFlag tests single bits", () => {
		const flags = HookFlag.BeforeSwap | HookFlag.AfterSwap;
		expect(hasFlag(flags, HookFlag.BeforeSwap)).toBe(true);
		expect(hasFlag(flags, HookFlag.BeforeDonate)).toBe(false);
	});
});

describe("validatePermissions", () => {
	const swapHandlers: SubHookHandlers = {
		beforeSwap: () => ({
			selector: HOOK_SELECTORS.beforeSwap,
			delta: { specified: 0n, unspecified: 0n },
			lpFeeOverride: 0,
		}),
	};

	it("accepts a consistent descriptor", () => {
		const flags = HookFlag.BeforeSwap | HookFlag.BeforeSwapReturnsDelta;
		expect(validatePermissions(flags, swapHandlers, "0xhook").ok).toBe(true);
	});

	it("accepts an empty descriptor", () => {
		expect(validatePermissions(0, {}, "0xhook").ok).toBe(true);
	});

	it("rejects a return-delta flag without its event flag", () => {
		const result = validatePermissions(HookFlag.AfterSwapReturnsDelta, {}, "0xhook");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("INVALID_HOOK_CAPABILITIES");
			expect(result.error.message).toBe(
				"Hook 0xhook returns a delta for an event it does not handle",
			);
		}
	});

	it("rejects a declared event without a handler method", () => {
		const result = validatePermissions(HookFlag.BeforeSwap | HookFlag.AfterSwap, swapHandlers, "0xhook");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("Hook 0xhook declares afterSwap but does not implement it");
		}
	});
});
