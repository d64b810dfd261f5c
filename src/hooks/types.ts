/**
 * Hook domain types — pool keys, lifecycle arguments and sub-hook contract.
 *
 * The resource manager calls the adapter with these argument shapes; the
 * adapter forwards the very same objects to every eligible sub-hook.
 */

import type { BalanceDelta, BeforeSwapDelta } from "../delta/types.js";
import type { Hex, Selector } from "../lib/ethereum/index.js";
import type { Address } from "../shared/identifiers.js";
import type { HookPermissions } from "./permissions.js";

// ── Pool ─────────────────────────────────────────────────────────────

/** Defining parameters of a pool; hashed into its PoolId. */
export interface PoolKey {
	readonly currency0: Address;
	readonly currency1: Address;
	/** Static LP fee in hundredths of a bip, or `DYNAMIC_FEE_FLAG`. */
	readonly fee: number;
	readonly tickSpacing: number;
	/** Address of the hook contract for the pool (the adapter). */
	readonly hooks: Address;
}

export interface ModifyLiquidityParams {
	readonly tickLower: number;
	readonly tickUpper: number;
	readonly liquidityDelta: bigint;
	readonly salt: Hex;
}

export interface SwapParams {
	readonly zeroForOne: boolean;
	/** Negative for exact input, positive for exact output. */
	readonly amountSpecified: bigint;
	readonly sqrtPriceLimitX96: bigint;
}

// ── Lifecycle events ─────────────────────────────────────────────────

/** The ten lifecycle callbacks; values double as sub-hook method names. */
export const HookEvent = {
	BeforeInitialize: "beforeInitialize",
	AfterInitialize: "afterInitialize",
	BeforeAddLiquidity: "beforeAddLiquidity",
	AfterAddLiquidity: "afterAddLiquidity",
	BeforeRemoveLiquidity: "beforeRemoveLiquidity",
	AfterRemoveLiquidity: "afterRemoveLiquidity",
	BeforeSwap: "beforeSwap",
	AfterSwap: "afterSwap",
	BeforeDonate: "beforeDonate",
	AfterDonate: "afterDonate",
} as const;

export type HookEvent = (typeof HookEvent)[keyof typeof HookEvent];

export const HOOK_EVENTS: readonly HookEvent[] = Object.values(HookEvent);

// ── Arguments ────────────────────────────────────────────────────────

interface PoolCallArgs {
	/** Party that initiated the pool operation (e.g. a router). */
	readonly sender: Address;
	readonly key: PoolKey;
}

export interface BeforeInitializeArgs extends PoolCallArgs {
	readonly sqrtPriceX96: bigint;
}

export interface AfterInitializeArgs extends BeforeInitializeArgs {
	readonly tick: number;
}

export interface BeforeModifyLiquidityArgs extends PoolCallArgs {
	readonly params: ModifyLiquidityParams;
	readonly hookData: Hex;
}

export interface AfterModifyLiquidityArgs extends BeforeModifyLiquidityArgs {
	/** Caller delta including fees accrued. */
	readonly delta: BalanceDelta;
	readonly feesAccrued: BalanceDelta;
}

export interface BeforeSwapArgs extends PoolCallArgs {
	readonly params: SwapParams;
	readonly hookData: Hex;
}

export interface AfterSwapArgs extends BeforeSwapArgs {
	readonly delta: BalanceDelta;
}

export interface DonateArgs extends PoolCallArgs {
	readonly amount0: bigint;
	readonly amount1: bigint;
	readonly hookData: Hex;
}

/** Argument type of each lifecycle event. */
export interface HookEventArgs {
	beforeInitialize: BeforeInitializeArgs;
	afterInitialize: AfterInitializeArgs;
	beforeAddLiquidity: BeforeModifyLiquidityArgs;
	afterAddLiquidity: AfterModifyLiquidityArgs;
	beforeRemoveLiquidity: BeforeModifyLiquidityArgs;
	afterRemoveLiquidity: AfterModifyLiquidityArgs;
	beforeSwap: BeforeSwapArgs;
	afterSwap: AfterSwapArgs;
	beforeDonate: DonateArgs;
	afterDonate: DonateArgs;
}

// ── Sub-hook answers ─────────────────────────────────────────────────

/** Acknowledgement: the selector of the event being handled. */
export interface HookAck {
	readonly selector: Selector;
}

export interface HookDeltaAck extends HookAck {
	readonly delta: BalanceDelta;
}

export interface BeforeSwapAck extends HookAck {
	readonly delta: BeforeSwapDelta;
	/** Preferred LP fee, optionally carrying `OVERRIDE_FEE_FLAG`; `0` expresses no preference. */
	readonly lpFeeOverride: number;
	/** Weight of the fee preference; defaults to 1, `0` opts out. */
	readonly feeWeight?: number | undefined;
}

export interface AfterSwapAck extends HookAck {
	/** Adjustment to the unspecified currency. */
	readonly delta: bigint;
}

/** Answer type of each lifecycle event. */
export interface HookEventAcks {
	beforeInitialize: HookAck;
	afterInitialize: HookAck;
	beforeAddLiquidity: HookAck;
	afterAddLiquidity: HookDeltaAck;
	beforeRemoveLiquidity: HookAck;
	afterRemoveLiquidity: HookDeltaAck;
	beforeSwap: BeforeSwapAck;
	afterSwap: AfterSwapAck;
	beforeDonate: HookAck;
	afterDonate: HookAck;
}

// ── Sub-hook contract ────────────────────────────────────────────────

/** One optional handler method per lifecycle event. */
export type SubHookHandlers = {
	readonly [E in HookEvent]?: (args: HookEventArgs[E]) => HookEventAcks[E];
};

/**
 * A pluggable handler registered against one or more pools.
 *
 * `getHookPermissions()` is queried once at registration and trusted
 * afterwards; every event it declares must have a handler method.
 * A handler signals failure by throwing.
 */
export interface SubHook extends SubHookHandlers {
	readonly address: Address;
	getHookPermissions(): HookPermissions;
}
