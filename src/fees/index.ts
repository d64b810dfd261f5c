export {
	MAX_FEE,
	FeeCalculationMethod,
	FEE_CALCULATION_METHODS,
	DEFAULT_FEE_METHOD,
	type WeightedFee,
	type PoolFeeSettings,
	type FeeConfiguration,
	type RegistrationFeeConfig,
} from "./types.js";

export {
	isValidFee,
	isValidFeeSetting,
	isValidContribution,
	weightedFee,
	fallbackFee,
	resolveFee,
} from "./fee-resolver.js";

export { FeeConfigStore } from "./fee-config-store.js";
