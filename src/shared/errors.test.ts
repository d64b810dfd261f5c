import { describe, expect, it } from "vitest";
import {
	AdapterError,
	ArrayLengthMismatchError,
	ConfigError,
	ErrorCategory,
	HookAlreadyRegisteredError,
	HookNotApprovedError,
	HookNotRegisteredError,
	ImmutableConfigurationError,
	InvalidFeeError,
	InvalidHookAddressError,
	InvalidHookCapabilitiesError,
	InvalidHookResponseError,
	PoolAlreadyRegisteredError,
	ReentrancyError,
	SubHookCallError,
	UnauthorizedCode,
	UnauthorizedError,
	classifyError,
	isAdapterError,
	isAuthorizationError,
	isSubHookFailure,
} from "./errors.js";

describe("AdapterError hierarchy", () => {
	describe("categories and codes", () => {
		const cases: Array<[AdapterError, ErrorCategory, string]> = [
			[new InvalidFeeError(2_000_000), ErrorCategory.Configuration, "INVALID_FEE"],
			[new ArrayLengthMismatchError(2, 3), ErrorCategory.Configuration, "ARRAY_LENGTH_MISMATCH"],
			[new InvalidHookAddressError("zero"), ErrorCategory.Configuration, "INVALID_HOOK_ADDRESS"],
			[
				new InvalidHookCapabilitiesError("bad"),
				ErrorCategory.Configuration,
				"INVALID_HOOK_CAPABILITIES",
			],
			[new ConfigError("bad config"), ErrorCategory.Configuration, "CONFIG_ERROR"],
			[new UnauthorizedError(UnauthorizedCode.NotOwner, "0x1"), ErrorCategory.Authorization, "NOT_OWNER"],
			[new HookNotApprovedError("0x1"), ErrorCategory.Authorization, "HOOK_NOT_APPROVED"],
			[new PoolAlreadyRegisteredError("0xp"), ErrorCategory.Consistency, "POOL_ALREADY_REGISTERED"],
			[new HookAlreadyRegisteredError("0xp", "0x1"), ErrorCategory.Consistency, "HOOK_ALREADY_REGISTERED"],
			[new HookNotRegisteredError("0xp", "0x1"), ErrorCategory.Consistency, "HOOK_NOT_REGISTERED"],
			[new ImmutableConfigurationError("setFeeMethod"), ErrorCategory.Consistency, "IMMUTABLE_CONFIGURATION"],
			[new SubHookCallError("threw"), ErrorCategory.SubHook, "SUB_HOOK_CALL_FAILED"],
			[
				new InvalidHookResponseError("0x1", "beforeSwap", "0x575e24b4", "0x00"),
				ErrorCategory.SubHook,
				"INVALID_HOOK_RESPONSE",
			],
			[new ReentrancyError("afterSwap", "beforeSwap"), ErrorCategory.Reentrancy, "REENTRANT_CALL"],
		];

		it.each(cases)("%s", (error, category, code) => {
			expect(error.category).toBe(category);
			expect(error.code).toBe(code);
			expect(error).toBeInstanceOf(AdapterError);
			expect(error).toBeInstanceOf(Error);
		});
	});

	it("names each subclass", () => {
		expect(new InvalidFeeError(5).name).toBe("InvalidFeeError");
		expect(new ReentrancyError("a", "b").name).toBe("ReentrancyError");
	});

	it("carries structured context", () => {
		const error = new InvalidFeeError(1_000_001, { field: "governanceFee" });
		expect(error.message).toBe("Invalid fee: 1000001");
		expect(error.context).toEqual({ fee: 1_000_001, field: "governanceFee" });
	});

	it("keeps cause out of context", () => {
		const cause = new Error("root");
		const error = new SubHookCallError("wrapped", { hook: "0x1", cause });
		expect(error.cause).toBe(cause);
		expect(error.context).toEqual({ hook: "0x1" });
	});

	it("formats unauthorized callers", () => {
		const error = new UnauthorizedError(UnauthorizedCode.NotPoolOwner, "0xabc", { poolId: "0xp" });
		expect(error.message).toBe("Unauthorized (NOT_POOL_OWNER): 0xabc");
		expect(error.context).toEqual({ caller: "0xabc", poolId: "0xp" });
	});

	it("serializes to JSON", () => {
		const json = new ArrayLengthMismatchError(1, 2).toJSON();
		expect(json).toEqual({
			name: "ArrayLengthMismatchError",
			message: "Array length mismatch: 1 != 2",
			code: "ARRAY_LENGTH_MISMATCH",
			category: "configuration",
			context: { left: 1, right: 2 },
		});
	});
});

describe("classifyError", () => {
	it("wraps thrown Errors with their message", () => {
		const cause = new Error("insufficient liquidity");
		const wrapped = classifyError(cause, { hook: "0xh", event: "beforeSwap" });
		expect(wrapped).toBeInstanceOf(SubHookCallError);
		expect(wrapped.message).toBe("Sub-hook 0xh failed in beforeSwap: insufficient liquidity");
		expect(wrapped.cause).toBe(cause);
		expect(wrapped.context).toEqual({ hook: "0xh", event: "beforeSwap" });
	});

	it("stringifies non-Error throws", () => {
		const wrapped = classifyError("plain", { hook: "0xh", event: "afterDonate" });
		expect(wrapped.message).toBe("Sub-hook 0xh failed in afterDonate: plain");
	});
});

describe("type guards", () => {
	it("isAdapterError", () => {
		expect(isAdapterError(new ConfigError("x"))).toBe(true);
		expect(isAdapterError(new Error("x"))).toBe(false);
	});

	it("isAuthorizationError", () => {
		expect(isAuthorizationError(new HookNotApprovedError("0x1"))).toBe(true);
		expect(isAuthorizationError(new ConfigError("x"))).toBe(false);
	});

	it("isSubHookFailure", () => {
		expect(isSubHookFailure(new SubHookCallError("x"))).toBe(true);
		expect(isSubHookFailure(new InvalidHookResponseError("0x1", "afterSwap", "0x", undefined))).toBe(
			true,
		);
		expect(isSubHookFailure(new ReentrancyError("a", "b"))).toBe(false);
	});
});
