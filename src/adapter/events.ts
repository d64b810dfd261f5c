/**
 * Adapter events — emitted after an administrative mutation commits.
 */

import type { FeeCalculationMethod } from "../fees/types.js";
import type { Address, PoolId } from "../shared/identifiers.js";

/** Which operation changed a pool's hook list. */
export type HookListChange = "register" | "add" | "remove" | "replace";

export interface HooksRegisteredEvent {
	readonly poolId: PoolId;
	readonly caller: Address;
	readonly change: HookListChange;
	/** Hooks passed to the operation. */
	readonly hooks: readonly Address[];
	/** The pool's list after the change, in execution order. */
	readonly current: readonly Address[];
}

export interface PoolOwnerClaimedEvent {
	readonly poolId: PoolId;
	readonly owner: Address;
}

export interface PoolFeeConfigurationUpdatedEvent {
	readonly poolId: PoolId;
	readonly method: FeeCalculationMethod;
	readonly poolSpecificFee: number;
}

export interface GovernanceFeeUpdatedEvent {
	readonly previous: number;
	readonly current: number;
}

export interface HookApprovalChangedEvent {
	readonly hook: Address;
	readonly approved: boolean;
}

export interface RoleChangedEvent {
	readonly previous: Address;
	readonly current: Address;
}

export interface AdapterEvents {
	hooksRegistered: HooksRegisteredEvent;
	poolOwnerClaimed: PoolOwnerClaimedEvent;
	poolFeeConfigurationUpdated: PoolFeeConfigurationUpdatedEvent;
	governanceFeeUpdated: GovernanceFeeUpdatedEvent;
	hookApprovalChanged: HookApprovalChangedEvent;
	hookManagerChanged: RoleChangedEvent;
	ownershipTransferred: RoleChangedEvent;
}
