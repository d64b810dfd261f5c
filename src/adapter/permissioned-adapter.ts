/**
 * PermissionedMultiHookAdapter — pool creators manage their own pools.
 *
 * The first caller to register a pool's hooks becomes its owner; every later
 * change to that pool's hooks or fee settings is owner-only. Each hook passed
 * to a hook-list operation must be on the approved-hook allowlist, which the
 * hook manager maintains.
 */

import { ApprovedHookRegistry } from "../access/approved-hooks.js";
import { PoolOwnerRegistry } from "../access/pool-owners.js";
import type { ApprovalChange } from "../access/types.js";
import type { FeeCalculationMethod, RegistrationFeeConfig } from "../fees/types.js";
import type { PoolKey, SubHook } from "../hooks/types.js";
import { sameAddress } from "../lib/ethereum/index.js";
import { describeHooks } from "../registry/hook-entry.js";
import type { HookEntry } from "../registry/types.js";
import type { AdapterConfig } from "../shared/config.js";
import {
	type AdapterError,
	HookAlreadyRegisteredError,
	HookNotApprovedError,
	HookNotRegisteredError,
} from "../shared/errors.js";
import type { Address, PoolId } from "../shared/identifiers.js";
import { OK_VOID, type Result, err, ok } from "../shared/result.js";
import {
	type AdapterOptions,
	type AdapterParts,
	MultiHookAdapterBase,
	type Notify,
	buildAdapterParts,
} from "./adapter-base.js";
import type { HookListChange } from "./events.js";

export class PermissionedMultiHookAdapter extends MultiHookAdapterBase {
	private readonly approvals: ApprovedHookRegistry;
	private readonly owners: PoolOwnerRegistry;

	private constructor(parts: AdapterParts, approvals: ApprovedHookRegistry) {
		super(parts);
		this.approvals = approvals;
		this.owners = PoolOwnerRegistry.create();
	}

	static create(
		config: AdapterConfig,
		options: AdapterOptions,
	): Result<PermissionedMultiHookAdapter, AdapterError> {
		const parts = buildAdapterParts(config, options);
		if (!parts.ok) return parts;
		const approvals = ApprovedHookRegistry.create(config.hookManager, parts.value.policy);
		if (!approvals.ok) return approvals;
		return ok(new PermissionedMultiHookAdapter(parts.value, approvals.value));
	}

	// ── Hook lists ─────────────────────────────────────────────────

	/**
	 * Open on an unclaimed pool, where the caller becomes its owner.
	 * On a claimed pool only the owner may call it, and the list is replaced.
	 */
	override registerHooks(
		caller: Address,
		key: PoolKey,
		hooks: readonly SubHook[],
		feeConfig?: RegistrationFeeConfig,
	): Result<void, AdapterError> {
		return this.mutate("registerHooks", (notify) => {
			const pool = this.checkPoolKey(key);
			if (!pool.ok) return pool;
			const poolId = pool.value;
			const auth = this.owners.authorizeRegistration(poolId, caller);
			if (!auth.ok) return auth;
			const entries = this.approvedEntries(hooks);
			if (!entries.ok) return entries;
			const fees = this.fees.validateRegistration(feeConfig);
			if (!fees.ok) return fees;

			this.registry.set(poolId, entries.value);
			this.fees.initializePool(poolId, feeConfig);
			if (this.owners.claim(poolId, caller)) {
				this.logger.info({ poolId, owner: caller }, "Pool owner claimed");
				notify("poolOwnerClaimed", { poolId, owner: caller });
			}
			this.hooksChanged(notify, poolId, caller, "register", entries.value);
			if (feeConfig !== undefined) {
				notify("poolFeeConfigurationUpdated", this.feeSettings(poolId));
			}
			return OK_VOID;
		});
	}

	/** Append hooks; none may already be registered or repeat within the batch. */
	addHooks(caller: Address, poolId: PoolId, hooks: readonly SubHook[]): Result<void, AdapterError> {
		return this.mutate("addHooks", (notify) => {
			const auth = this.owners.requirePoolOwner(poolId, caller);
			if (!auth.ok) return auth;
			const entries = this.approvedEntries(hooks);
			if (!entries.ok) return entries;

			const seen: Address[] = [];
			for (const entry of entries.value) {
				const repeated = seen.some((a) => sameAddress(a, entry.address));
				if (repeated || this.registry.contains(poolId, entry.address)) {
					return err(new HookAlreadyRegisteredError(poolId, entry.address));
				}
				seen.push(entry.address);
			}

			this.registry.append(poolId, entries.value);
			this.hooksChanged(notify, poolId, caller, "add", entries.value);
			return OK_VOID;
		});
	}

	/**
	 * Remove hooks by swapping each with the last entry. Every hook must be
	 * registered (a repeat in the batch counts as absent) and approved.
	 */
	removeHooks(
		caller: Address,
		poolId: PoolId,
		hooks: readonly Address[],
	): Result<void, AdapterError> {
		return this.mutate("removeHooks", (notify) => {
			const auth = this.owners.requirePoolOwner(poolId, caller);
			if (!auth.ok) return auth;
			const approved = this.requireApproved(hooks);
			if (!approved.ok) return approved;

			const seen: Address[] = [];
			for (const hook of hooks) {
				const repeated = seen.some((a) => sameAddress(a, hook));
				if (repeated || !this.registry.contains(poolId, hook)) {
					return err(new HookNotRegisteredError(poolId, hook));
				}
				seen.push(hook);
			}

			this.registry.remove(poolId, hooks);
			this.logger.info({ poolId, caller, removed: hooks }, "Hooks removed");
			notify("hooksRegistered", {
				poolId,
				caller,
				change: "remove",
				hooks: [...hooks],
				current: this.registry.addresses(poolId),
			});
			return OK_VOID;
		});
	}

	/** Clear the pool's list and write `hooks` in its place. */
	replaceHooks(
		caller: Address,
		poolId: PoolId,
		hooks: readonly SubHook[],
	): Result<void, AdapterError> {
		return this.mutate("replaceHooks", (notify) => {
			const auth = this.owners.requirePoolOwner(poolId, caller);
			if (!auth.ok) return auth;
			const entries = this.approvedEntries(hooks);
			if (!entries.ok) return entries;

			this.registry.set(poolId, entries.value);
			this.hooksChanged(notify, poolId, caller, "replace", entries.value);
			return OK_VOID;
		});
	}

	// ── Pool fee settings ──────────────────────────────────────────

	/** Pool owner only. `0` clears the pool-specific fee. */
	override setPoolSpecificFee(
		caller: Address,
		poolId: PoolId,
		fee: number,
	): Result<void, AdapterError> {
		return this.mutate("setPoolSpecificFee", (notify) => {
			const auth = this.owners.requirePoolOwner(poolId, caller);
			if (!auth.ok) return auth;
			const set = this.fees.setPoolSpecificFee(poolId, fee);
			if (!set.ok) return set;
			this.logger.info({ poolId, fee }, "Pool-specific fee updated");
			notify("poolFeeConfigurationUpdated", this.feeSettings(poolId));
			return OK_VOID;
		});
	}

	override setFeeMethod(
		caller: Address,
		poolId: PoolId,
		method: FeeCalculationMethod,
	): Result<void, AdapterError> {
		return this.mutate("setFeeMethod", (notify) => {
			const auth = this.owners.requirePoolOwner(poolId, caller);
			if (!auth.ok) return auth;
			const set = this.fees.setMethod(poolId, method);
			if (!set.ok) return set;
			this.logger.info({ poolId, method }, "Fee method updated");
			notify("poolFeeConfigurationUpdated", this.feeSettings(poolId));
			return OK_VOID;
		});
	}

	// ── Approved-hook registry ─────────────────────────────────────

	approveHook(caller: Address, hook: Address): Result<void, AdapterError> {
		return this.changeApprovals("approveHook", () => this.approvals.approve(caller, hook));
	}

	revokeHook(caller: Address, hook: Address): Result<void, AdapterError> {
		return this.changeApprovals("revokeHook", () => this.approvals.revoke(caller, hook));
	}

	approveHooks(caller: Address, hooks: readonly Address[]): Result<void, AdapterError> {
		return this.changeApprovals("approveHooks", () => this.approvals.approveMany(caller, hooks));
	}

	revokeHooks(caller: Address, hooks: readonly Address[]): Result<void, AdapterError> {
		return this.changeApprovals("revokeHooks", () => this.approvals.revokeMany(caller, hooks));
	}

	/** Set `approved[i]` for `hooks[i]`; the arrays must have equal length. */
	setHookApprovals(
		caller: Address,
		hooks: readonly Address[],
		approved: readonly boolean[],
	): Result<void, AdapterError> {
		return this.changeApprovals("setHookApprovals", () =>
			this.approvals.setApprovals(caller, hooks, approved),
		);
	}

	/** Global owner only. */
	setHookManager(caller: Address, next: Address): Result<void, AdapterError> {
		return this.mutate("setHookManager", (notify) => {
			const moved = this.approvals.setManager(caller, next);
			if (!moved.ok) return moved;
			this.logger.info({ previous: moved.value, current: next }, "Hook manager changed");
			notify("hookManagerChanged", { previous: moved.value, current: next });
			return OK_VOID;
		});
	}

	// ── Queries ────────────────────────────────────────────────────

	/** Recorded owner, or the zero address while unclaimed. */
	poolOwner(poolId: PoolId): Address {
		return this.owners.ownerOf(poolId);
	}

	hookManager(): Address {
		return this.approvals.getManager();
	}

	isHookApproved(hook: Address): boolean {
		return this.approvals.isApproved(hook);
	}

	approvedHooks(): readonly Address[] {
		return this.approvals.list();
	}

	// ── Internals ──────────────────────────────────────────────────

	private approvedEntries(hooks: readonly SubHook[]): Result<HookEntry[], AdapterError> {
		const entries = describeHooks(hooks, this.address);
		if (!entries.ok) return entries;
		const approved = this.requireApproved(entries.value.map((e) => e.address));
		if (!approved.ok) return approved;
		return entries;
	}

	private requireApproved(hooks: readonly Address[]): Result<void, HookNotApprovedError> {
		const missing = this.approvals.firstUnapproved(hooks);
		return missing === undefined ? OK_VOID : err(new HookNotApprovedError(missing));
	}

	private hooksChanged(
		notify: Notify,
		poolId: PoolId,
		caller: Address,
		change: HookListChange,
		entries: readonly HookEntry[],
	): void {
		const hooks = entries.map((e) => e.address);
		const current = this.registry.addresses(poolId);
		this.logger.info({ poolId, caller, change, hooks }, "Hook list changed");
		notify("hooksRegistered", { poolId, caller, change, hooks, current });
	}

	private changeApprovals(
		entryPoint: string,
		apply: () => Result<readonly ApprovalChange[], AdapterError>,
	): Result<void, AdapterError> {
		return this.mutate(entryPoint, (notify) => {
			const changes = apply();
			if (!changes.ok) return changes;
			for (const change of changes.value) {
				this.logger.info({ hook: change.hook, approved: change.approved }, "Hook approval changed");
				notify("hookApprovalChanged", change);
			}
			return OK_VOID;
		});
	}
}
