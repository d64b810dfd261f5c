/**
 * TransientSwapStore — per-pool beforeSwap answers awaiting their afterSwap.
 *
 * Empty lists are not stored, so "no entry" and "empty record" are the same
 * state. Callers never overlap two swaps on one pool.
 */

import type { PoolId } from "../shared/identifiers.js";
import type { BeforeSwapRecord } from "./types.js";

const EMPTY: readonly BeforeSwapRecord[] = Object.freeze([]);

export class TransientSwapStore {
	private readonly records: Map<PoolId, readonly BeforeSwapRecord[]>;

	private constructor() {
		this.records = new Map();
	}

	static create(): TransientSwapStore {
		return new TransientSwapStore();
	}

	/**
	 * Overwrite the pool's record.
	 * @returns the record that was replaced; non-empty means an unmatched beforeSwap
	 */
	write(poolId: PoolId, records: readonly BeforeSwapRecord[]): readonly BeforeSwapRecord[] {
		const previous = this.peek(poolId);
		if (records.length === 0) this.records.delete(poolId);
		else this.records.set(poolId, Object.freeze([...records]));
		return previous;
	}

	/** Read and clear. */
	take(poolId: PoolId): readonly BeforeSwapRecord[] {
		const current = this.peek(poolId);
		this.records.delete(poolId);
		return current;
	}

	peek(poolId: PoolId): readonly BeforeSwapRecord[] {
		return this.records.get(poolId) ?? EMPTY;
	}

	discard(poolId: PoolId): void {
		this.records.delete(poolId);
	}

	/** Pools holding a non-empty record. */
	get size(): number {
		return this.records.size;
	}
}
