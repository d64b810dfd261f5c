import { bench, describe } from "vitest";
import { resolveFee, weightedFee } from "../src/fees/fee-resolver.js";
import { FEE_CALCULATION_METHODS, type FeeConfiguration } from "../src/fees/types.js";

describe("fee resolution", () => {
	const contributions = Array.from({ length: 16 }, (_, i) => weightedFee(500 + i * 250, 1 + (i % 4)));
	const base: FeeConfiguration = {
		defaultFee: 3000,
		governanceFee: 0,
		governanceFeeSet: false,
		method: "weighted_average",
		poolSpecificFee: 0,
		poolSpecificFeeSet: false,
	};

	for (const method of FEE_CALCULATION_METHODS) {
		const config: FeeConfiguration = { ...base, method };
		bench(`${method} over 16 hooks 1000x`, () => {
			for (let i = 0; i < 1000; i++) {
				resolveFee(contributions, config);
			}
		});
	}
});
