import { describe, expect, it } from "vitest";
import {
	aggregateBalanceDeltas,
	aggregateBeforeSwapDeltas,
	aggregateScalarDeltas,
	isZeroBalanceDelta,
	isZeroBeforeSwapDelta,
} from "./delta-aggregator.js";
import { INT128_MAX, INT128_MIN } from "./int128.js";
import { ZERO_BALANCE_DELTA, ZERO_BEFORE_SWAP_DELTA } from "./types.js";

describe("aggregateBalanceDeltas", () => {
	it("returns the zero delta for no contributions", () => {
		expect(aggregateBalanceDeltas([])).toBe(ZERO_BALANCE_DELTA);
	});

	it("sums each component independently", () => {
		const result = aggregateBalanceDeltas([
			{ returnsDelta: true, delta: { amount0: 100n, amount1: -50n } },
			{ returnsDelta: true, delta: { amount0: -30n, amount1: 20n } },
		]);
		expect(result).toEqual({ amount0: 70n, amount1: -30n });
	});

	it("skips hooks that do not declare a returned delta", () => {
		const result = aggregateBalanceDeltas([
			{ returnsDelta: true, delta: { amount0: 5n, amount1: 5n } },
			{ returnsDelta: false, delta: { amount0: 1_000n, amount1: 1_000n } },
		]);
		expect(result).toEqual({ amount0: 5n, amount1: 5n });
	});

	it("returns the zero delta when nobody declares a returned delta", () => {
		const result = aggregateBalanceDeltas([
			{ returnsDelta: false, delta: { amount0: 9n, amount1: 9n } },
		]);
		expect(isZeroBalanceDelta(result)).toBe(true);
	});

	it("handles large mixed-sign contributions without intermediate overflow", () => {
		const result = aggregateBalanceDeltas([
			{ returnsDelta: true, delta: { amount0: INT128_MAX, amount1: INT128_MIN } },
			{ returnsDelta: true, delta: { amount0: INT128_MAX, amount1: INT128_MIN } },
			{ returnsDelta: true, delta: { amount0: INT128_MIN, amount1: INT128_MAX } },
			{ returnsDelta: true, delta: { amount0: INT128_MIN, amount1: INT128_MAX } },
		]);
		expect(result).toEqual({ amount0: -2n, amount1: -2n });
	});

	it("wraps a sum beyond int128", () => {
		const result = aggregateBalanceDeltas([
			{ returnsDelta: true, delta: { amount0: INT128_MAX, amount1: 0n } },
			{ returnsDelta: true, delta: { amount0: 1n, amount1: 0n } },
		]);
		expect(result.amount0).toBe(INT128_MIN);
	});
});

describe("aggregateBeforeSwapDeltas", () => {
	it("returns the zero delta for no contributions", () => {
		expect(aggregateBeforeSwapDeltas([])).toBe(ZERO_BEFORE_SWAP_DELTA);
		expect(isZeroBeforeSwapDelta(ZERO_BEFORE_SWAP_DELTA)).toBe(true);
	});

	it("sums specified and unspecified separately", () => {
		const result = aggregateBeforeSwapDeltas([
			{ returnsDelta: true, delta: { specified: 10n, unspecified: -4n } },
			{ returnsDelta: false, delta: { specified: 99n, unspecified: 99n } },
			{ returnsDelta: true, delta: { specified: -3n, unspecified: 8n } },
		]);
		expect(result).toEqual({ specified: 7n, unspecified: 4n });
	});
});

describe("aggregateScalarDeltas", () => {
	it("sums declared scalars", () => {
		expect(
			aggregateScalarDeltas([
				{ returnsDelta: true, delta: 12n },
				{ returnsDelta: false, delta: 100n },
				{ returnsDelta: true, delta: -2n },
			]),
		).toBe(10n);
	});

	it("is zero with no declared contributions", () => {
		expect(aggregateScalarDeltas([{ returnsDelta: false, delta: 1n }])).toBe(0n);
	});
});
