/**
 * DeltaAggregator — combines per-hook deltas into one composite delta.
 *
 * Each component is summed independently. Contributions from hooks that do
 * not declare the matching return-delta capability are skipped.
 */

import { sumInt128 } from "./int128.js";
import {
	type BalanceDelta,
	type BeforeSwapDelta,
	type DeltaContribution,
	ZERO_BALANCE_DELTA,
	ZERO_BEFORE_SWAP_DELTA,
} from "./types.js";

function declared<D>(contributions: readonly DeltaContribution<D>[]): D[] {
	const out: D[] = [];
	for (const c of contributions) {
		if (c.returnsDelta) out.push(c.delta);
	}
	return out;
}

/** Component-wise int128 sum of `amount0` and `amount1`. */
export function aggregateBalanceDeltas(
	contributions: readonly DeltaContribution<BalanceDelta>[],
): BalanceDelta {
	const deltas = declared(contributions);
	if (deltas.length === 0) return ZERO_BALANCE_DELTA;
	return {
		amount0: sumInt128(deltas.map((d) => d.amount0)),
		amount1: sumInt128(deltas.map((d) => d.amount1)),
	};
}

/** Component-wise int128 sum of `specified` and `unspecified`. */
export function aggregateBeforeSwapDeltas(
	contributions: readonly DeltaContribution<BeforeSwapDelta>[],
): BeforeSwapDelta {
	const deltas = declared(contributions);
	if (deltas.length === 0) return ZERO_BEFORE_SWAP_DELTA;
	return {
		specified: sumInt128(deltas.map((d) => d.specified)),
		unspecified: sumInt128(deltas.map((d) => d.unspecified)),
	};
}

/** int128 sum of single-component (after-swap unspecified) deltas. */
export function aggregateScalarDeltas(contributions: readonly DeltaContribution<bigint>[]): bigint {
	return sumInt128(declared(contributions));
}

export function isZeroBalanceDelta(delta: BalanceDelta): boolean {
	return delta.amount0 === 0n && delta.amount1 === 0n;
}

export function isZeroBeforeSwapDelta(delta: BeforeSwapDelta): boolean {
	return delta.specified === 0n && delta.unspecified === 0n;
}
