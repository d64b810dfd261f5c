/**
 * Hook permissions — capability descriptor and its bitmask encoding.
 *
 * Bit positions follow the v4 hook-address convention (bit 13 is
 * beforeInitialize, bit 0 is afterRemoveLiquidityReturnDelta), so a cached
 * flag set can be compared against address-encoded permissions directly.
 */

import { InvalidHookCapabilitiesError } from "../shared/errors.js";
import { OK_VOID, type Result, err } from "../shared/result.js";
import { HOOK_EVENTS, type HookEvent, type SubHookHandlers } from "./types.js";

/** Which lifecycle events a sub-hook handles, and which of them return deltas. */
export interface HookPermissions {
	readonly beforeInitialize: boolean;
	readonly afterInitialize: boolean;
	readonly beforeAddLiquidity: boolean;
	readonly afterAddLiquidity: boolean;
	readonly beforeRemoveLiquidity: boolean;
	readonly afterRemoveLiquidity: boolean;
	readonly beforeSwap: boolean;
	readonly afterSwap: boolean;
	readonly beforeDonate: boolean;
	readonly afterDonate: boolean;
	readonly beforeSwapReturnDelta: boolean;
	readonly afterSwapReturnDelta: boolean;
	readonly afterAddLiquidityReturnDelta: boolean;
	readonly afterRemoveLiquidityReturnDelta: boolean;
}

export const HookFlag = {
	BeforeInitialize: 1 << 13,
	AfterInitialize: 1 << 12,
	BeforeAddLiquidity: 1 << 11,
	AfterAddLiquidity: 1 << 10,
	BeforeRemoveLiquidity: 1 << 9,
	AfterRemoveLiquidity: 1 << 8,
	BeforeSwap: 1 << 7,
	AfterSwap: 1 << 6,
	BeforeDonate: 1 << 5,
	AfterDonate: 1 << 4,
	BeforeSwapReturnsDelta: 1 << 3,
	AfterSwapReturnsDelta: 1 << 2,
	AfterAddLiquidityReturnsDelta: 1 << 1,
	AfterRemoveLiquidityReturnsDelta: 1 << 0,
} as const;

export type HookFlag = (typeof HookFlag)[keyof typeof HookFlag];

/** Encoded HookPermissions. */
export type HookFlags = number;

const FLAG_BY_PERMISSION: Readonly<Record<keyof HookPermissions, HookFlag>> = {
	beforeInitialize: HookFlag.BeforeInitialize,
	afterInitialize: HookFlag.AfterInitialize,
	beforeAddLiquidity: HookFlag.BeforeAddLiquidity,
	afterAddLiquidity: HookFlag.AfterAddLiquidity,
	beforeRemoveLiquidity: HookFlag.BeforeRemoveLiquidity,
	afterRemoveLiquidity: HookFlag.AfterRemoveLiquidity,
	beforeSwap: HookFlag.BeforeSwap,
	afterSwap: HookFlag.AfterSwap,
	beforeDonate: HookFlag.BeforeDonate,
	afterDonate: HookFlag.AfterDonate,
	beforeSwapReturnDelta: HookFlag.BeforeSwapReturnsDelta,
	afterSwapReturnDelta: HookFlag.AfterSwapReturnsDelta,
	afterAddLiquidityReturnDelta: HookFlag.AfterAddLiquidityReturnsDelta,
	afterRemoveLiquidityReturnDelta: HookFlag.AfterRemoveLiquidityReturnsDelta,
};

const PERMISSION_KEYS = [
	"beforeInitialize",
	"afterInitialize",
	"beforeAddLiquidity",
	"afterAddLiquidity",
	"beforeRemoveLiquidity",
	"afterRemoveLiquidity",
	"beforeSwap",
	"afterSwap",
	"beforeDonate",
	"afterDonate",
	"beforeSwapReturnDelta",
	"afterSwapReturnDelta",
	"afterAddLiquidityReturnDelta",
	"afterRemoveLiquidityReturnDelta",
] as const satisfies readonly (keyof HookPermissions)[];

/** Mask of every defined flag. */
export const ALL_HOOK_FLAGS: HookFlags = (1 << 14) - 1;

/** Flag that must be set for a sub-hook to receive the event. */
export const EVENT_FLAG: Readonly<Record<HookEvent, HookFlag>> = {
	beforeInitialize: HookFlag.BeforeInitialize,
	afterInitialize: HookFlag.AfterInitialize,
	beforeAddLiquidity: HookFlag.BeforeAddLiquidity,
	afterAddLiquidity: HookFlag.AfterAddLiquidity,
	beforeRemoveLiquidity: HookFlag.BeforeRemoveLiquidity,
	afterRemoveLiquidity: HookFlag.AfterRemoveLiquidity,
	beforeSwap: HookFlag.BeforeSwap,
	afterSwap: HookFlag.AfterSwap,
	beforeDonate: HookFlag.BeforeDonate,
	afterDonate: HookFlag.AfterDonate,
};

/** Return-delta flag paired with its event flag. */
const RETURN_DELTA_REQUIRES: ReadonlyArray<readonly [HookFlag, HookFlag]> = [
	[HookFlag.BeforeSwapReturnsDelta, HookFlag.BeforeSwap],
	[HookFlag.AfterSwapReturnsDelta, HookFlag.AfterSwap],
	[HookFlag.AfterAddLiquidityReturnsDelta, HookFlag.AfterAddLiquidity],
	[HookFlag.AfterRemoveLiquidityReturnsDelta, HookFlag.AfterRemoveLiquidity],
];

export function decodeFlags(flags: HookFlags): HookPermissions {
	return {
		beforeInitialize: hasFlag(flags, HookFlag.BeforeInitialize),
		afterInitialize: hasFlag(flags, HookFlag.AfterInitialize),
		beforeAddLiquidity: hasFlag(flags, HookFlag.BeforeAddLiquidity),
		afterAddLiquidity: hasFlag(flags, HookFlag.AfterAddLiquidity),
		beforeRemoveLiquidity: hasFlag(flags, HookFlag.BeforeRemoveLiquidity),
		afterRemoveLiquidity: hasFlag(flags, HookFlag.AfterRemoveLiquidity),
		beforeSwap: hasFlag(flags, HookFlag.BeforeSwap),
		afterSwap: hasFlag(flags, HookFlag.AfterSwap),
		beforeDonate: hasFlag(flags, HookFlag.BeforeDonate),
		afterDonate: hasFlag(flags, HookFlag.AfterDonate),
		beforeSwapReturnDelta: hasFlag(flags, HookFlag.BeforeSwapReturnsDelta),
		afterSwapReturnDelta: hasFlag(flags, HookFlag.AfterSwapReturnsDelta),
		afterAddLiquidityReturnDelta: hasFlag(flags, HookFlag.AfterAddLiquidityReturnsDelta),
		afterRemoveLiquidityReturnDelta: hasFlag(flags, HookFlag.AfterRemoveLiquidityReturnsDelta),
	};
}

export const NO_PERMISSIONS: HookPermissions = Object.freeze(decodeFlags(0));

/** Everything on: the adapter's own descriptor towards the resource manager. */
export const ALL_PERMISSIONS: HookPermissions = Object.freeze(decodeFlags(ALL_HOOK_FLAGS));

/** Build a descriptor from a partial one, defaulting missing entries to false. */
export function permissions(partial: Partial<HookPermissions>): HookPermissions {
	return { ...NO_PERMISSIONS, ...partial };
}

export function encodePermissions(p: HookPermissions): HookFlags {
	let flags = 0;
	for (const key of PERMISSION_KEYS) {
		if (p[key]) flags |= FLAG_BY_PERMISSION[key];
	}
	return flags;
}

export function hasFlag(flags: HookFlags, flag: HookFlag): boolean {
	return (flags & flag) !== 0;
}

/**
 * Check a descriptor for internal consistency and against the handler methods present.
 * A return-delta flag needs its event flag; every declared event needs a method.
 */
export function validatePermissions(
	flags: HookFlags,
	handlers: SubHookHandlers,
	hook: string,
): Result<void, InvalidHookCapabilitiesError> {
	for (const [deltaFlag, eventFlag] of RETURN_DELTA_REQUIRES) {
		if (hasFlag(flags, deltaFlag) && !hasFlag(flags, eventFlag)) {
			return err(
				new InvalidHookCapabilitiesError(
					`Hook ${hook} returns a delta for an event it does not handle`,
					{ hook, flags },
				),
			);
		}
	}
	for (const event of HOOK_EVENTS) {
		if (hasFlag(flags, EVENT_FLAG[event]) && typeof handlers[event] !== "function") {
			return err(
				new InvalidHookCapabilitiesError(
					`Hook ${hook} declares ${event} but does not implement it`,
					{ hook, event },
				),
			);
		}
	}
	return OK_VOID;
}
