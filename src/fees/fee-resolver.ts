/**
 * Fee resolution — collapses sub-hook fee contributions into one fee.
 *
 * Pure functions. Contributions are filtered first (fee in `1..MAX_FEE`,
 * weight a positive safe integer); when nothing survives, or the method is
 * governance-only, the fallback chain pool-specific → governance → default
 * decides. All division floors.
 */

import {
	type FeeCalculationMethod,
	type FeeConfiguration,
	MAX_FEE,
	type WeightedFee,
} from "./types.js";

type Strategy = (valid: readonly WeightedFee[]) => number;

/** True for a usable contribution fee: `1..MAX_FEE`. */
export function isValidFee(fee: number): boolean {
	return Number.isInteger(fee) && fee >= 1 && fee <= MAX_FEE;
}

/** True for a setter argument: `0..MAX_FEE`, where `0` means unset. */
export function isValidFeeSetting(fee: number): boolean {
	return Number.isInteger(fee) && fee >= 0 && fee <= MAX_FEE;
}

function isValidWeight(weight: number): boolean {
	return Number.isSafeInteger(weight) && weight > 0;
}

/** Build a contribution with its validity precomputed. */
export function weightedFee(fee: number, weight = 1): WeightedFee {
	return { fee, weight, isValid: isValidFee(fee) && isValidWeight(weight) };
}

/** Re-checks the range even when `isValid` is claimed. */
export function isValidContribution(c: WeightedFee): boolean {
	return c.isValid && isValidFee(c.fee) && isValidWeight(c.weight);
}

/** pool-specific fee if set, else a valid governance fee if set, else the default fee. */
export function fallbackFee(config: FeeConfiguration): number {
	if (config.poolSpecificFeeSet) return config.poolSpecificFee;
	if (config.governanceFeeSet && isValidFee(config.governanceFee)) return config.governanceFee;
	return config.defaultFee;
}

// ── Strategies ──────────────────────────────────────────────────────

function weightedAverage(valid: readonly WeightedFee[]): number {
	let weighted = 0n;
	let total = 0n;
	for (const c of valid) {
		weighted += BigInt(c.fee) * BigInt(c.weight);
		total += BigInt(c.weight);
	}
	return Number(weighted / total);
}

function mean(valid: readonly WeightedFee[]): number {
	let sum = 0;
	for (const c of valid) sum += c.fee;
	return Math.floor(sum / valid.length);
}

function median(valid: readonly WeightedFee[]): number {
	const fees = valid.map((c) => c.fee).sort((a, b) => a - b);
	const mid = Math.floor(fees.length / 2);
	if (fees.length % 2 === 1) return fees[mid] ?? 0;
	return Math.floor(((fees[mid - 1] ?? 0) + (fees[mid] ?? 0)) / 2);
}

function firstOverride(valid: readonly WeightedFee[]): number {
	return valid[0]?.fee ?? 0;
}

function lastOverride(valid: readonly WeightedFee[]): number {
	return valid[valid.length - 1]?.fee ?? 0;
}

function minFee(valid: readonly WeightedFee[]): number {
	return valid.reduce((min, c) => Math.min(min, c.fee), MAX_FEE);
}

function maxFee(valid: readonly WeightedFee[]): number {
	return valid.reduce((max, c) => Math.max(max, c.fee), 0);
}

/** `null` marks the method that never looks at contributions. */
const STRATEGIES: Readonly<Record<FeeCalculationMethod, Strategy | null>> = {
	weighted_average: weightedAverage,
	mean,
	median,
	first_override: firstOverride,
	last_override: lastOverride,
	min_fee: minFee,
	max_fee: maxFee,
	governance_only: null,
};

/**
 * Resolve the fee for one swap.
 *
 * @param contributions - One entry per sub-hook, in registration order
 * @example
 * ```ts
 * resolveFee([weightedFee(2000, 3), weightedFee(5000, 1)], config); // 2750 under weighted_average
 * ```
 */
export function resolveFee(
	contributions: readonly WeightedFee[],
	config: FeeConfiguration,
): number {
	const strategy = STRATEGIES[config.method];
	if (strategy === null) return fallbackFee(config);

	const valid = contributions.filter(isValidContribution);
	if (valid.length === 0) return fallbackFee(config);

	return strategy(valid);
}
