/**
 * ApprovedHookRegistry — allowlist of sub-hooks usable on a permissioned adapter.
 *
 * Mutated only by the hook manager. The manager role itself is reassigned
 * by the global policy owner. Addresses are keyed case-insensitively.
 */

import { isZeroAddress, sameAddress } from "../lib/ethereum/index.js";
import {
	type AdapterError,
	ArrayLengthMismatchError,
	ConfigError,
	InvalidHookAddressError,
	UnauthorizedCode,
	UnauthorizedError,
} from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import { OK_VOID, type Result, err, ok } from "../shared/result.js";
import type { Ownable } from "./ownable.js";
import type { ApprovalChange } from "./types.js";

function keyOf(hook: Address): string {
	return hook.toLowerCase();
}

export class ApprovedHookRegistry {
	private manager: Address;
	private readonly policy: Ownable;
	private readonly approved: Map<string, Address>;

	private constructor(manager: Address, policy: Ownable) {
		this.manager = manager;
		this.policy = policy;
		this.approved = new Map();
	}

	/** @param policy - Global owner allowed to reassign the manager */
	static create(manager: Address, policy: Ownable): Result<ApprovedHookRegistry, ConfigError> {
		if (isZeroAddress(manager)) {
			return err(new ConfigError("Hook manager cannot be the zero address", { manager }));
		}
		return ok(new ApprovedHookRegistry(manager, policy));
	}

	// ── Queries ────────────────────────────────────────────────────

	getManager(): Address {
		return this.manager;
	}

	isApproved(hook: Address): boolean {
		return this.approved.has(keyOf(hook));
	}

	/** Approved hooks in approval order. */
	list(): readonly Address[] {
		return [...this.approved.values()];
	}

	/** First hook in `hooks` that is not approved, if any. */
	firstUnapproved(hooks: readonly Address[]): Address | undefined {
		return hooks.find((h) => !this.isApproved(h));
	}

	// ── Mutations (manager only) ───────────────────────────────────

	approve(caller: Address, hook: Address): Result<readonly ApprovalChange[], AdapterError> {
		return this.setApprovals(caller, [hook], [true]);
	}

	revoke(caller: Address, hook: Address): Result<readonly ApprovalChange[], AdapterError> {
		return this.setApprovals(caller, [hook], [false]);
	}

	approveMany(caller: Address, hooks: readonly Address[]): Result<readonly ApprovalChange[], AdapterError> {
		return this.setApprovals(
			caller,
			hooks,
			hooks.map(() => true),
		);
	}

	revokeMany(caller: Address, hooks: readonly Address[]): Result<readonly ApprovalChange[], AdapterError> {
		return this.setApprovals(
			caller,
			hooks,
			hooks.map(() => false),
		);
	}

	/**
	 * Apply `approved[i]` to `hooks[i]`, all or nothing.
	 * Returns only the entries whose status actually changed.
	 */
	setApprovals(
		caller: Address,
		hooks: readonly Address[],
		approved: readonly boolean[],
	): Result<readonly ApprovalChange[], AdapterError> {
		const auth = this.requireManager(caller);
		if (!auth.ok) return auth;
		if (hooks.length !== approved.length) {
			return err(new ArrayLengthMismatchError(hooks.length, approved.length));
		}
		const zero = hooks.find(isZeroAddress);
		if (zero !== undefined) {
			return err(new InvalidHookAddressError("Hook address is zero", { hook: zero }));
		}

		const changes: ApprovalChange[] = [];
		hooks.forEach((hook, i) => {
			const want = approved[i] === true;
			if (this.isApproved(hook) === want) return;
			if (want) this.approved.set(keyOf(hook), hook);
			else this.approved.delete(keyOf(hook));
			changes.push({ hook, approved: want });
		});
		return ok(changes);
	}

	/** Reassign the manager role; global owner only. Returns the previous manager. */
	setManager(caller: Address, next: Address): Result<Address, AdapterError> {
		const auth = this.policy.requireOwner(caller);
		if (!auth.ok) return auth;
		if (isZeroAddress(next)) {
			return err(new ConfigError("Hook manager cannot be the zero address", { next }));
		}
		const previous = this.manager;
		this.manager = next;
		return ok(previous);
	}

	private requireManager(caller: Address): Result<void, UnauthorizedError> {
		return sameAddress(caller, this.manager)
			? OK_VOID
			: err(
					new UnauthorizedError(UnauthorizedCode.NotHookManager, caller, {
						manager: this.manager,
					}),
				);
	}
}
