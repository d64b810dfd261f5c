/**
 * HookRegistry — per-pool ordered sub-hook lists.
 *
 * Order is execution order and fee tie-break order. A pool counts as
 * registered from its first registration on, even when its list is empty.
 * Lists are never deleted, only rewritten.
 */

import { sameAddress } from "../lib/ethereum/index.js";
import type { Address, PoolId } from "../shared/identifiers.js";
import type { HookEntry } from "./types.js";

const EMPTY: readonly HookEntry[] = Object.freeze([]);

export class HookRegistry {
	private readonly pools: Map<PoolId, HookEntry[]>;

	private constructor() {
		this.pools = new Map();
	}

	static create(): HookRegistry {
		return new HookRegistry();
	}

	// ── Queries ────────────────────────────────────────────────────

	isRegistered(poolId: PoolId): boolean {
		return this.pools.has(poolId);
	}

	/** Entries in execution order; empty for unknown pools. */
	entries(poolId: PoolId): readonly HookEntry[] {
		return this.pools.get(poolId) ?? EMPTY;
	}

	addresses(poolId: PoolId): readonly Address[] {
		return this.entries(poolId).map((e) => e.address);
	}

	indexOf(poolId: PoolId, hook: Address): number {
		return this.entries(poolId).findIndex((e) => sameAddress(e.address, hook));
	}

	contains(poolId: PoolId, hook: Address): boolean {
		return this.indexOf(poolId, hook) !== -1;
	}

	/** Number of pools with a registration record. */
	poolCount(): number {
		return this.pools.size;
	}

	// ── Mutations ──────────────────────────────────────────────────

	/** Replace the pool's list (clear-and-rewrite). */
	set(poolId: PoolId, entries: readonly HookEntry[]): void {
		this.pools.set(poolId, [...entries]);
	}

	append(poolId: PoolId, entries: readonly HookEntry[]): void {
		this.pools.set(poolId, [...this.entries(poolId), ...entries]);
	}

	/**
	 * Remove hooks by swapping each with the last entry and shrinking.
	 * Untouched entries before the removed slot keep their order; the tail does not.
	 * Addresses not present are ignored.
	 */
	remove(poolId: PoolId, hooks: readonly Address[]): void {
		const list = [...this.entries(poolId)];
		for (const hook of hooks) {
			const idx = list.findIndex((e) => sameAddress(e.address, hook));
			if (idx === -1) continue;
			const last = list[list.length - 1];
			if (last !== undefined) list[idx] = last;
			list.pop();
		}
		this.pools.set(poolId, list);
	}
}
