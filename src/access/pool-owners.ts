/**
 * PoolOwnerRegistry — first successful registrant owns the pool.
 *
 * Compare-and-set on an explicit sentinel: a pool without an entry is
 * unclaimed and `ownerOf` reports the zero address.
 */

import { ZERO_ADDRESS, sameAddress } from "../lib/ethereum/index.js";
import { UnauthorizedCode, UnauthorizedError } from "../shared/errors.js";
import type { Address, PoolId } from "../shared/identifiers.js";
import { OK_VOID, type Result, err } from "../shared/result.js";

export class PoolOwnerRegistry {
	private readonly owners: Map<PoolId, Address>;

	private constructor() {
		this.owners = new Map();
	}

	static create(): PoolOwnerRegistry {
		return new PoolOwnerRegistry();
	}

	ownerOf(poolId: PoolId): Address {
		return this.owners.get(poolId) ?? ZERO_ADDRESS;
	}

	isClaimed(poolId: PoolId): boolean {
		return this.owners.has(poolId);
	}

	/** Caller must be the recorded owner; unclaimed pools have no owner to match. */
	requirePoolOwner(poolId: PoolId, caller: Address): Result<void, UnauthorizedError> {
		const owner = this.owners.get(poolId);
		if (owner !== undefined && sameAddress(owner, caller)) return OK_VOID;
		return err(
			new UnauthorizedError(UnauthorizedCode.NotPoolOwner, caller, {
				poolId,
				owner: owner ?? ZERO_ADDRESS,
			}),
		);
	}

	/** Registration is open on unclaimed pools and owner-only afterwards. */
	authorizeRegistration(poolId: PoolId, caller: Address): Result<void, UnauthorizedError> {
		return this.isClaimed(poolId) ? this.requirePoolOwner(poolId, caller) : OK_VOID;
	}

	/**
	 * Record `caller` as owner if the pool is unclaimed.
	 * @returns true when this call made the claim
	 */
	claim(poolId: PoolId, caller: Address): boolean {
		if (this.owners.has(poolId)) return false;
		this.owners.set(poolId, caller);
		return true;
	}
}
