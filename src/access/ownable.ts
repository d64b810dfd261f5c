/**
 * Ownable — the global policy owner.
 *
 * Owns the governance fee and, on permissioned adapters, the right to
 * reassign the hook manager.
 */

import { isZeroAddress, sameAddress } from "../lib/ethereum/index.js";
import { ConfigError, UnauthorizedCode, UnauthorizedError } from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import { OK_VOID, type Result, err, ok } from "../shared/result.js";

export class Ownable {
	private current: Address;

	private constructor(owner: Address) {
		this.current = owner;
	}

	static create(owner: Address): Result<Ownable, ConfigError> {
		if (isZeroAddress(owner)) {
			return err(new ConfigError("Owner cannot be the zero address", { owner }));
		}
		return ok(new Ownable(owner));
	}

	owner(): Address {
		return this.current;
	}

	isOwner(caller: Address): boolean {
		return sameAddress(caller, this.current);
	}

	requireOwner(caller: Address): Result<void, UnauthorizedError> {
		return this.isOwner(caller)
			? OK_VOID
			: err(new UnauthorizedError(UnauthorizedCode.NotOwner, caller, { owner: this.current }));
	}

	/** Hand the role to `next`; returns the previous owner. */
	transferOwnership(
		caller: Address,
		next: Address,
	): Result<Address, UnauthorizedError | ConfigError> {
		const auth = this.requireOwner(caller);
		if (!auth.ok) return auth;
		if (isZeroAddress(next)) {
			return err(new ConfigError("New owner cannot be the zero address", { next }));
		}
		const previous = this.current;
		this.current = next;
		return ok(previous);
	}
}
