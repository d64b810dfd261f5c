/**
 * Dispatch types — composite results returned to the resource manager.
 */

import type { BalanceDelta, BeforeSwapDelta } from "../delta/types.js";
import type { WeightedFee } from "../fees/types.js";
import type {
	AfterInitializeArgs,
	AfterModifyLiquidityArgs,
	AfterSwapArgs,
	BeforeInitializeArgs,
	BeforeModifyLiquidityArgs,
	BeforeSwapArgs,
	DonateArgs,
	HookAck,
} from "../hooks/types.js";
import type { AdapterError } from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

/** Where a lifecycle event currently is. `idle` between events. */
export const DispatchPhase = {
	Idle: "idle",
	ValidatingRegistration: "validating_registration",
	FanningOut: "fanning_out",
	Aggregating: "aggregating",
	Passthrough: "passthrough",
	Returning: "returning",
} as const;

export type DispatchPhase = (typeof DispatchPhase)[keyof typeof DispatchPhase];

/** A delta-returning sub-hook's beforeSwap answer, kept until the matching afterSwap. */
export interface BeforeSwapRecord {
	readonly hook: Address;
	readonly delta: BeforeSwapDelta;
	readonly fee: WeightedFee;
}

export interface LiquidityResult extends HookAck {
	readonly delta: BalanceDelta;
}

export interface BeforeSwapResult extends HookAck {
	readonly delta: BeforeSwapDelta;
	/** Resolved LP fee, or null when no sub-hook handled the swap. */
	readonly fee: number | null;
	/** `fee | OVERRIDE_FEE_FLAG` on dynamic-fee pools, else `0`. */
	readonly lpFeeOverride: number;
}

export interface AfterSwapResult extends HookAck {
	/** Aggregated adjustment to the unspecified currency. */
	readonly delta: bigint;
	/** Per-hook beforeSwap answers consumed by this event. */
	readonly beforeSwap: readonly BeforeSwapRecord[];
}

type Outcome<T> = Result<T, AdapterError>;

/** The ten callbacks the resource manager invokes; `caller` must be the resource manager. */
export interface LifecycleHandler {
	beforeInitialize(caller: Address, args: BeforeInitializeArgs): Outcome<HookAck>;
	afterInitialize(caller: Address, args: AfterInitializeArgs): Outcome<HookAck>;
	beforeAddLiquidity(caller: Address, args: BeforeModifyLiquidityArgs): Outcome<HookAck>;
	afterAddLiquidity(caller: Address, args: AfterModifyLiquidityArgs): Outcome<LiquidityResult>;
	beforeRemoveLiquidity(caller: Address, args: BeforeModifyLiquidityArgs): Outcome<HookAck>;
	afterRemoveLiquidity(caller: Address, args: AfterModifyLiquidityArgs): Outcome<LiquidityResult>;
	beforeSwap(caller: Address, args: BeforeSwapArgs): Outcome<BeforeSwapResult>;
	afterSwap(caller: Address, args: AfterSwapArgs): Outcome<AfterSwapResult>;
	beforeDonate(caller: Address, args: DonateArgs): Outcome<HookAck>;
	afterDonate(caller: Address, args: DonateArgs): Outcome<HookAck>;
}
