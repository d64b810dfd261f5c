/**
 * Delta types — signed 128-bit balance adjustments reported by sub-hooks.
 *
 * Components are plain `bigint`s expected to fit in int128.
 */

/** Per-currency balance adjustment (add/remove liquidity, swap settlement). */
export interface BalanceDelta {
	readonly amount0: bigint;
	readonly amount1: bigint;
}

/** Adjustment a before-swap hook applies to the specified and unspecified amounts. */
export interface BeforeSwapDelta {
	readonly specified: bigint;
	readonly unspecified: bigint;
}

/**
 * One hook's delta as seen by the aggregator.
 * `returnsDelta` mirrors the hook's declared capability; when false the delta is ignored.
 */
export interface DeltaContribution<D> {
	readonly returnsDelta: boolean;
	readonly delta: D;
}

export const ZERO_BALANCE_DELTA: BalanceDelta = Object.freeze({ amount0: 0n, amount1: 0n });

export const ZERO_BEFORE_SWAP_DELTA: BeforeSwapDelta = Object.freeze({
	specified: 0n,
	unspecified: 0n,
});
