/**
 * Fixed-width signed 128-bit helpers.
 *
 * Sums are accumulated as unbounded `bigint` and narrowed once at the end.
 * Narrowing wraps in two's complement: a sum outside int128 is truncated,
 * not saturated and not rejected. Callers bound realistic hook contributions.
 */

export const INT128_BITS = 128;
export const INT128_MAX = (1n << 127n) - 1n;
export const INT128_MIN = -(1n << 127n);

export function isInt128(value: bigint): boolean {
	return value >= INT128_MIN && value <= INT128_MAX;
}

/** Two's-complement narrowing to int128. */
export function wrapInt128(value: bigint): bigint {
	return BigInt.asIntN(INT128_BITS, value);
}

/** Sum with unbounded headroom, then wrap to int128. */
export function sumInt128(values: Iterable<bigint>): bigint {
	let acc = 0n;
	for (const v of values) acc += v;
	return wrapInt128(acc);
}
