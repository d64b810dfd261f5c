import { describe, expect, it } from "vitest";
import { address } from "../shared/identifiers.js";
import {
	DYNAMIC_FEE_FLAG,
	OVERRIDE_FEE_FLAG,
	isDynamicFee,
	poolIdOf,
	stripOverrideFlag,
	validatePoolKey,
	withOverrideFlag,
} from "./pool-key.js";
import type { PoolKey } from "./types.js";

const key: PoolKey = {
	currency0: address("0x0000000000000000000000000000000000000001"),
	currency1: address("0x0000000000000000000000000000000000000002"),
	fee: 3000,
	tickSpacing: 60,
	hooks: address("0x0000000000000000000000000000000000003fff"),
};

describe("poolIdOf", () => {
	it("is a 32-byte hex digest", () => {
		expect(poolIdOf(key)).toMatch(/^0x[0-9a-f]{64}$/);
	});

	it("is stable for equal keys and distinct for different keys", () => {
		expect(poolIdOf({ ...key })).toBe(poolIdOf(key));
		expect(poolIdOf({ ...key, fee: DYNAMIC_FEE_FLAG })).not.toBe(poolIdOf(key));
	});
});

describe("validatePoolKey", () => {
	it("derives the same id as poolIdOf and accepts lowercase addresses", () => {
		const lower = { ...key, hooks: key.hooks.toLowerCase() };
		expect(validatePoolKey(lower)).toEqual({ ok: true, value: poolIdOf(key) });
	});

	it("rejects a fee wider than uint24", () => {
		const result = validatePoolKey({ ...key, fee: 0x1000000 });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("VALIDATION_FAILED");
			expect(result.error.issues.map((i) => i.path)).toEqual([["fee"]]);
		}
	});

	it("rejects a tick spacing outside int24", () => {
		expect(validatePoolKey({ ...key, tickSpacing: -0x800001 }).ok).toBe(false);
		expect(validatePoolKey({ ...key, tickSpacing: -0x800000 }).ok).toBe(true);
	});

	it("rejects a malformed currency address", () => {
		const result = validatePoolKey({ ...key, currency1: "0x1234" });
		expect(result.ok ? [] : result.error.issues.map((i) => i.path)).toEqual([["currency1"]]);
	});
});

describe("fee flags", () => {
	it("detects dynamic-fee pools", () => {
		expect(isDynamicFee(DYNAMIC_FEE_FLAG)).toBe(true);
		expect(isDynamicFee(3000)).toBe(false);
	});

	it("sets and strips the override flag", () => {
		expect(withOverrideFlag(3000)).toBe(0x400bb8);
		expect(stripOverrideFlag(withOverrideFlag(3000))).toBe(3000);
		expect(stripOverrideFlag(2500)).toBe(2500);
		expect(OVERRIDE_FEE_FLAG).toBe(4194304);
	});

	it("leaves values outside uint24 unchanged", () => {
		expect(stripOverrideFlag(2 ** 32 + 5000)).toBe(2 ** 32 + 5000);
		expect(stripOverrideFlag(0x1400bb8)).toBe(0x1400bb8);
		expect(stripOverrideFlag(-1)).toBe(-1);
	});
});
