export {
	type BalanceDelta,
	type BeforeSwapDelta,
	type DeltaContribution,
	ZERO_BALANCE_DELTA,
	ZERO_BEFORE_SWAP_DELTA,
} from "./types.js";

export { INT128_MAX, INT128_MIN, isInt128, sumInt128, wrapInt128 } from "./int128.js";

export {
	aggregateBalanceDeltas,
	aggregateBeforeSwapDeltas,
	aggregateScalarDeltas,
	isZeroBalanceDelta,
	isZeroBeforeSwapDelta,
} from "./delta-aggregator.js";
