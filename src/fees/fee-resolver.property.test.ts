import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { isValidFee, resolveFee, weightedFee } from "./fee-resolver.js";
import {
	FEE_CALCULATION_METHODS,
	FeeCalculationMethod,
	type FeeConfiguration,
	MAX_FEE,
} from "./types.js";

const validFee = fc.integer({ min: 1, max: MAX_FEE });
const anyFee = fc.integer({ min: 0, max: MAX_FEE * 2 });
const weight = fc.integer({ min: 0, max: 1_000_000 });

function config(method: FeeCalculationMethod, defaultFee: number): FeeConfiguration {
	return {
		defaultFee,
		governanceFee: 0,
		governanceFeeSet: false,
		poolSpecificFee: 0,
		poolSpecificFeeSet: false,
		method,
	};
}

describe("resolveFee (property-based)", () => {
	it("weighted_average equals floor(sum(fee*weight)/sum(weight)) over valid entries", () => {
		fc.assert(
			fc.property(
				fc.array(fc.tuple(anyFee, weight), { minLength: 1, maxLength: 12 }),
				validFee,
				(pairs, defaultFee) => {
					const list = pairs.map(([f, w]) => weightedFee(f, w));
					const valid = pairs.filter(([f, w]) => isValidFee(f) && w > 0);
					const expected =
						valid.length === 0
							? defaultFee
							: Math.floor(
									valid.reduce((acc, [f, w]) => acc + f * w, 0) /
										valid.reduce((acc, [, w]) => acc + w, 0),
								);
					expect(resolveFee(list, config(FeeCalculationMethod.WeightedAverage, defaultFee))).toBe(
						expected,
					);
				},
			),
			{ numRuns: 500 },
		);
	});

	it("every method returns a fee within the valid contributions' range", () => {
		const contributionMethods = FEE_CALCULATION_METHODS.filter(
			(m) => m !== FeeCalculationMethod.GovernanceOnly,
		);
		fc.assert(
			fc.property(
				fc.array(validFee, { minLength: 1, maxLength: 12 }),
				fc.constantFrom(...contributionMethods),
				(values, method) => {
					const result = resolveFee(
						values.map((v) => weightedFee(v, 1)),
						config(method, 1),
					);
					expect(result).toBeGreaterThanOrEqual(Math.min(...values));
					expect(result).toBeLessThanOrEqual(Math.max(...values));
				},
			),
			{ numRuns: 500 },
		);
	});

	it("governance_only never depends on contributions", () => {
		fc.assert(
			fc.property(fc.array(validFee, { maxLength: 8 }), validFee, (values, defaultFee) => {
				const c = config(FeeCalculationMethod.GovernanceOnly, defaultFee);
				expect(resolveFee(values.map((v) => weightedFee(v)), c)).toBe(defaultFee);
			}),
			{ numRuns: 200 },
		);
	});
});
