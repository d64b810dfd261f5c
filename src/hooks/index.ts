export {
	HookEvent,
	HOOK_EVENTS,
	type PoolKey,
	type ModifyLiquidityParams,
	type SwapParams,
	type BeforeInitializeArgs,
	type AfterInitializeArgs,
	type BeforeModifyLiquidityArgs,
	type AfterModifyLiquidityArgs,
	type BeforeSwapArgs,
	type AfterSwapArgs,
	type DonateArgs,
	type HookEventArgs,
	type HookAck,
	type HookDeltaAck,
	type BeforeSwapAck,
	type AfterSwapAck,
	type HookEventAcks,
	type SubHook,
	type SubHookHandlers,
} from "./types.js";

export {
	type HookPermissions,
	type HookFlags,
	HookFlag,
	ALL_HOOK_FLAGS,
	ALL_PERMISSIONS,
	NO_PERMISSIONS,
	EVENT_FLAG,
	permissions,
	encodePermissions,
	decodeFlags,
	hasFlag,
	validatePermissions,
} from "./permissions.js";

export { HOOK_SELECTORS, HOOK_SIGNATURES, acknowledges } from "./selectors.js";

export {
	DYNAMIC_FEE_FLAG,
	OVERRIDE_FEE_FLAG,
	poolIdOf,
	poolKeySchema,
	validatePoolKey,
	isDynamicFee,
	withOverrideFlag,
	stripOverrideFlag,
} from "./pool-key.js";
