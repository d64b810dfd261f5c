/**
 * Fee resolution types.
 *
 * Fees are integers in hundredths of a basis point: `1_000_000` is 100%.
 */

/** Inclusive upper bound for any fee value. */
export const MAX_FEE = 1_000_000;

/** How competing sub-hook fee preferences collapse into one fee. */
export const FeeCalculationMethod = {
	WeightedAverage: "weighted_average",
	Mean: "mean",
	Median: "median",
	FirstOverride: "first_override",
	LastOverride: "last_override",
	MinFee: "min_fee",
	MaxFee: "max_fee",
	GovernanceOnly: "governance_only",
} as const;

export type FeeCalculationMethod = (typeof FeeCalculationMethod)[keyof typeof FeeCalculationMethod];

export const FEE_CALCULATION_METHODS: readonly FeeCalculationMethod[] =
	Object.values(FeeCalculationMethod);

export const DEFAULT_FEE_METHOD: FeeCalculationMethod = FeeCalculationMethod.WeightedAverage;

/** One sub-hook's fee preference for a single swap. Never persisted. */
export interface WeightedFee {
	readonly fee: number;
	readonly weight: number;
	readonly isValid: boolean;
}

/** Per-pool fee settings; created on first registration and updated in place. */
export interface PoolFeeSettings {
	readonly method: FeeCalculationMethod;
	readonly poolSpecificFee: number;
	readonly poolSpecificFeeSet: boolean;
}

/** Adapter-wide fee values merged with a pool's settings at query time. */
export interface FeeConfiguration extends PoolFeeSettings {
	readonly defaultFee: number;
	readonly governanceFee: number;
	readonly governanceFeeSet: boolean;
}

/** Fee options accepted together with a registration. */
export interface RegistrationFeeConfig {
	readonly method?: FeeCalculationMethod | undefined;
	/** `0` or omitted leaves the pool-specific fee unset. */
	readonly poolSpecificFee?: number | undefined;
}
